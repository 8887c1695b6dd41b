import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { MarketPriceModule } from './market-price/market-price.module';
import { SandboxModule } from './sandbox/sandbox.module';
import { SharingModule } from './sharing/sharing.module';

@Module({
  imports: [ConfigModule, MarketPriceModule, SharingModule, SandboxModule],
  controllers: [AppController],
})
export class AppModule {}
