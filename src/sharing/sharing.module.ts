import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { AccessGuardService } from './access-guard.service';
import { ShareStorageService } from './share-storage.service';
import { SharingService } from './sharing.service';
import { SharingController } from './sharing.controller';

@Module({
  imports: [LedgerModule],
  controllers: [SharingController],
  providers: [ShareStorageService, AccessGuardService, SharingService],
  exports: [AccessGuardService, ShareStorageService],
})
export class SharingModule {}
