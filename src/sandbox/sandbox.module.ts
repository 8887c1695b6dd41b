import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { SharingModule } from '../sharing/sharing.module';
import { MarketPriceModule } from '../market-price/market-price.module';
import { SandboxController } from './sandbox.controller';
import { SandboxService } from './sandbox.service';
import { SandboxQueryService } from './sandbox-query.service';
import { TradeEngineService } from './trade-engine.service';
import { EquityHistoryService } from './equity-history.service';
import { ValuationService } from './valuation.service';
import { KeyedMutex } from '../common/utils/keyed-mutex';

@Module({
  imports: [LedgerModule, SharingModule, MarketPriceModule],
  controllers: [SandboxController],
  providers: [
    KeyedMutex,            // one lock table shared by every sandbox writer
    ValuationService,
    EquityHistoryService,
    TradeEngineService,
    SandboxService,        // Mutations: create, delete, trade
    SandboxQueryService,   // Queries: list, portfolio, transactions
  ],
})
export class SandboxModule {}
