import { Module } from '@nestjs/common';
import { LedgerStorageService } from './ledger-storage.service';
import { SnapshotStorageService } from './snapshot-storage.service';

@Module({
  providers: [LedgerStorageService, SnapshotStorageService],
  exports: [LedgerStorageService, SnapshotStorageService],
})
export class LedgerModule {}
