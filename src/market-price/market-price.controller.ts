import { BadRequestException, Controller, Get, HttpCode, HttpStatus, Inject, Param, Query } from '@nestjs/common';
import { MarketPriceService } from './market-price.service';
import { QuoteResponseDto, SymbolMatchDto } from './dto/quote-response.dto';
import { QuoteUnavailableException } from '../common/errors/sandbox.errors';
import { CLOCK, Clock } from '../common/clock/clock';
import { toNumber } from '../common/utils/decimal.util';

@Controller('market')
export class MarketPriceController {
  constructor(
    private readonly marketPriceService: MarketPriceService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Current price through the quote cache.
   *
   * GET /market/quote/AAPL
   */
  @Get('quote/:symbol')
  @HttpCode(HttpStatus.OK)
  async getQuote(@Param('symbol') rawSymbol: string): Promise<QuoteResponseDto> {
    const symbol = rawSymbol.trim().toUpperCase();
    const price = await this.marketPriceService.currentPrice(symbol);
    if (!price) {
      throw new QuoteUnavailableException(symbol);
    }
    return {
      symbol,
      price: toNumber(price),
      retrievedAt: this.clock.now().toISOString(),
    };
  }

  /**
   * Symbol lookup by free text.
   *
   * GET /market/search?q=apple
   */
  @Get('search')
  @HttpCode(HttpStatus.OK)
  async search(@Query('q') query?: string): Promise<SymbolMatchDto[]> {
    const text = query?.trim();
    if (!text) {
      throw new BadRequestException('Query param q is required for search');
    }
    return this.marketPriceService.search(text);
  }
}
