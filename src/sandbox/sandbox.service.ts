import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { LedgerStorageService } from '../ledger/ledger-storage.service';
import { SnapshotStorageService } from '../ledger/snapshot-storage.service';
import { Sandbox } from '../ledger/entities/sandbox.entity';
import { ShareStorageService } from '../sharing/share-storage.service';
import { AccessGuardService } from '../sharing/access-guard.service';
import { TradeEngineService, TradeResult } from './trade-engine.service';
import { EquityHistoryService } from './equity-history.service';
import { CreateSandboxDto } from './dto/create-sandbox.dto';
import { TradeOrderDto } from './dto/trade-order.dto';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { CLOCK, Clock } from '../common/clock/clock';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { toDecimal } from '../common/utils/decimal.util';

// Sandbox mutations: create, delete, trade.
@Injectable()
export class SandboxService {
  private readonly logger = new Logger(SandboxService.name);

  constructor(
    private readonly ledger: LedgerStorageService,
    private readonly snapshots: SnapshotStorageService,
    private readonly shares: ShareStorageService,
    private readonly accessGuard: AccessGuardService,
    private readonly tradeEngine: TradeEngineService,
    private readonly history: EquityHistoryService,
    private readonly mutex: KeyedMutex,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  createSandbox(ownerId: string, dto: CreateSandboxDto): Sandbox {
    const initialCash = toDecimal(dto.initialCash ?? this.config.defaultInitialCash);
    const sandbox = this.ledger.saveSandbox({
      id: uuidv4(),
      ownerId,
      name: dto.name.trim(),
      cashBalance: initialCash,
      initialCash,
      createdAt: this.clock.now(),
    });
    this.logger.log(`Sandbox ${sandbox.id} created for ${ownerId} with ${initialCash.toString()}`);
    return sandbox;
  }

  /**
   * Owner only. Removes lots, transactions, snapshots and shares with it.
   */
  async deleteSandbox(callerId: string, sandboxId: string): Promise<void> {
    this.accessGuard.require(sandboxId, callerId, 'owner');
    await this.mutex.runExclusive(sandboxId, async () => {
      this.ledger.deleteSandbox(sandboxId);
      this.snapshots.deleteSnapshots(sandboxId);
      const removedShares = this.shares.deleteSharesForSandbox(sandboxId);
      this.history.invalidate(sandboxId);
      this.logger.log(`Sandbox ${sandboxId} deleted (${removedShares} shares removed)`);
    });
  }

  trade(callerId: string, sandboxId: string, dto: TradeOrderDto): Promise<TradeResult> {
    return this.tradeEngine.execute({
      sandboxId,
      callerId,
      side: dto.side,
      symbol: dto.symbol,
      quantity: dto.quantity,
      amount: dto.amount,
    });
  }
}
