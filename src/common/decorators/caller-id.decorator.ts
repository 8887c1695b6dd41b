import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { MissingCallerException } from '../errors/sandbox.errors';

export const CALLER_HEADER = 'x-user-id';

interface HeaderCarrier {
  headers: Record<string, string | string[] | undefined>;
}

/** Reads the caller id from the header and rejects blank ones. */
export function extractCallerId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  const callerId = value?.trim();
  if (!callerId) {
    throw new MissingCallerException();
  }
  return callerId;
}

/**
 * Authenticated caller id, set by the gateway in front of this service.
 */
export const CallerId = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<HeaderCarrier>();
  return extractCallerId(request.headers[CALLER_HEADER]);
});
