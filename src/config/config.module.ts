import { Global, Module } from '@nestjs/common';
import { APP_CONFIG, loadAppConfig } from './app.config';
import { CLOCK, SystemClock } from '../common/clock/clock';

@Global()
@Module({
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadAppConfig() },
    { provide: CLOCK, useClass: SystemClock },
  ],
  exports: [APP_CONFIG, CLOCK],
})
export class ConfigModule {}
