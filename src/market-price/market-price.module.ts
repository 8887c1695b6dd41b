import { Module } from '@nestjs/common';
import yahooFinance from 'yahoo-finance2';
import { MarketPriceService } from './market-price.service';
import { MarketPriceController } from './market-price.controller';
import { MARKET_DATA_PROVIDER } from './providers/market-data.provider';
import { YahooMarketDataProvider } from './providers/yahoo-market-data.provider';
import { YAHOO_FINANCE_CLIENT, YahooFinanceClient } from './providers/yahoo-finance.client';

const yahooFinanceClient: YahooFinanceClient = {
  quote: (symbol) => yahooFinance.quote(symbol),
  historical: (symbol, options) => yahooFinance.historical(symbol, options),
  search: (query, options) => yahooFinance.search(query, options),
};

@Module({
  controllers: [MarketPriceController],
  providers: [
    MarketPriceService,
    { provide: YAHOO_FINANCE_CLIENT, useValue: yahooFinanceClient },
    { provide: MARKET_DATA_PROVIDER, useClass: YahooMarketDataProvider },
  ],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}
