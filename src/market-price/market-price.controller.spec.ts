import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { MarketPriceController } from './market-price.controller';
import { createTestingModule, FakeClock, FakeMarketDataProvider } from '../testing/fakes';

describe('MarketPriceController', () => {
  let controller: MarketPriceController;
  let provider: FakeMarketDataProvider;

  beforeEach(async () => {
    provider = new FakeMarketDataProvider();
    const module: TestingModule = await createTestingModule(
      provider,
      new FakeClock(new Date('2026-01-12T15:00:00.000Z')),
    );
    controller = module.get<MarketPriceController>(MarketPriceController);
  });

  it('should return an uppercased quote', async () => {
    provider.setPrice('NVDA', 880.5);

    await expect(controller.getQuote(' nvda ')).resolves.toEqual({
      symbol: 'NVDA',
      price: 880.5,
      retrievedAt: '2026-01-12T15:00:00.000Z',
    });
  });

  it('should answer 503 when no quote is available', async () => {
    await expect(controller.getQuote('NOPE')).rejects.toThrow(ServiceUnavailableException);
  });

  it('should require a search query', async () => {
    await expect(controller.search('  ')).rejects.toThrow(BadRequestException);
    await expect(controller.search(undefined)).rejects.toThrow(BadRequestException);
  });
});
