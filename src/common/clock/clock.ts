import { Injectable } from '@nestjs/common';

export const CLOCK = 'CLOCK';

/** Time source shared by TTL caches, snapshots and trade timestamps. */
export interface Clock {
  now(): Date;
}

@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
