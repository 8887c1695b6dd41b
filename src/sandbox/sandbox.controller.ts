import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { SandboxService } from './sandbox.service';
import { SandboxQueryService } from './sandbox-query.service';
import { CreateSandboxDto } from './dto/create-sandbox.dto';
import { TradeOrderDto } from './dto/trade-order.dto';
import { TradeResponseDto } from './dto/trade-response.dto';
import { PortfolioResponseDto } from './dto/portfolio-response.dto';
import { SandboxSummaryDto, SharedSandboxSummaryDto } from './dto/sandbox-summary.dto';
import { TransactionResponseDto } from './dto/transaction-response.dto';
import { CallerId } from '../common/decorators/caller-id.decorator';
import { toNumber } from '../common/utils/decimal.util';

@Controller('sandboxes')
export class SandboxController {
  constructor(
    private readonly sandboxService: SandboxService,
    private readonly queryService: SandboxQueryService,
  ) {}

  /**
   * Caller's sandboxes with live total equity.
   *
   * GET /sandboxes
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  listSandboxes(@CallerId() callerId: string): Promise<SandboxSummaryDto[]> {
    return this.queryService.listSandboxes(callerId);
  }

  /**
   * Sandboxes shared with the caller.
   *
   * GET /sandboxes/shared
   */
  @Get('shared')
  @HttpCode(HttpStatus.OK)
  listSharedSandboxes(@CallerId() callerId: string): Promise<SharedSandboxSummaryDto[]> {
    return this.queryService.listSharedSandboxes(callerId);
  }

  /**
   * POST /sandboxes
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  createSandbox(@CallerId() callerId: string, @Body() dto: CreateSandboxDto): SandboxSummaryDto {
    const sandbox = this.sandboxService.createSandbox(callerId, dto);
    return {
      id: sandbox.id,
      name: sandbox.name,
      cash: toNumber(sandbox.cashBalance),
      initialCash: toNumber(sandbox.initialCash),
      totalEquity: toNumber(sandbox.cashBalance),
      createdAt: sandbox.createdAt.toISOString(),
    };
  }

  /**
   * Deletes the sandbox and everything recorded under it. Owner only.
   *
   * DELETE /sandboxes/:sandboxId
   */
  @Delete(':sandboxId')
  @HttpCode(HttpStatus.OK)
  async deleteSandbox(@CallerId() callerId: string, @Param('sandboxId') sandboxId: string) {
    await this.sandboxService.deleteSandbox(callerId, sandboxId);
    return { ok: true, id: sandboxId };
  }

  /**
   * Holdings at live prices, cash, equity and equity curve.
   *
   * GET /sandboxes/:sandboxId/portfolio
   */
  @Get(':sandboxId/portfolio')
  @HttpCode(HttpStatus.OK)
  getPortfolio(
    @CallerId() callerId: string,
    @Param('sandboxId') sandboxId: string,
  ): Promise<PortfolioResponseDto> {
    return this.queryService.getPortfolio(callerId, sandboxId);
  }

  /**
   * GET /sandboxes/:sandboxId/transactions
   */
  @Get(':sandboxId/transactions')
  @HttpCode(HttpStatus.OK)
  getTransactions(
    @CallerId() callerId: string,
    @Param('sandboxId') sandboxId: string,
  ): TransactionResponseDto[] {
    return this.queryService.getTransactions(callerId, sandboxId);
  }

  /**
   * Executes a market BUY or SELL at the current price. Edit access required.
   *
   * POST /sandboxes/:sandboxId/trade
   * @returns 201 with execution price, quantity and new cash balance
   */
  @Post(':sandboxId/trade')
  @HttpCode(HttpStatus.CREATED)
  async trade(
    @CallerId() callerId: string,
    @Param('sandboxId') sandboxId: string,
    @Body() dto: TradeOrderDto,
  ): Promise<TradeResponseDto> {
    const { transaction, total, cashBalance } = await this.sandboxService.trade(callerId, sandboxId, dto);
    return {
      transactionId: transaction.id,
      side: transaction.side,
      symbol: transaction.symbol,
      price: toNumber(transaction.price),
      quantity: toNumber(transaction.quantity),
      total: toNumber(total),
      newCashBalance: toNumber(cashBalance),
      realizedPnl: transaction.realizedPnl ? toNumber(transaction.realizedPnl) : null,
      executedAt: transaction.executedAt.toISOString(),
    };
  }
}
