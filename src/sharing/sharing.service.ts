import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AccessGuardService } from './access-guard.service';
import { ShareStorageService } from './share-storage.service';
import { SandboxShare, SharePermission } from './entities/share.entity';
import { ShareSandboxDto } from './dto/share-sandbox.dto';
import { ShareNotFoundException } from '../common/errors/sandbox.errors';
import { CLOCK, Clock } from '../common/clock/clock';

export interface ShareResult {
  share: SandboxShare;
  updated: boolean;
}

// Share management. Every operation requires the caller to own the sandbox.
@Injectable()
export class SharingService {
  private readonly logger = new Logger(SharingService.name);

  constructor(
    private readonly accessGuard: AccessGuardService,
    private readonly storage: ShareStorageService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  shareSandbox(callerId: string, sandboxId: string, dto: ShareSandboxDto): ShareResult {
    const { sandbox } = this.accessGuard.require(sandboxId, callerId, 'owner');
    const granteeId = dto.granteeId.trim();
    if (granteeId === sandbox.ownerId) {
      throw new BadRequestException('Cannot share a sandbox with its owner');
    }
    const permission: SharePermission = dto.permission ?? 'watch';

    const existing = this.storage.findShare(sandboxId, granteeId);
    if (existing) {
      const share = this.storage.updatePermission(existing.id, permission) ?? existing;
      this.logger.log(`Share ${share.id} on sandbox ${sandboxId} set to ${permission}`);
      return { share, updated: true };
    }

    const share = this.storage.saveShare({
      id: uuidv4(),
      sandboxId,
      ownerId: sandbox.ownerId,
      granteeId,
      permission,
      createdAt: this.clock.now(),
    });
    this.logger.log(`Sandbox ${sandboxId} shared with ${granteeId} (${permission})`);
    return { share, updated: false };
  }

  updateShare(
    callerId: string,
    sandboxId: string,
    shareId: string,
    permission: SharePermission,
  ): SandboxShare {
    this.accessGuard.require(sandboxId, callerId, 'owner');
    this.findOwnedShare(sandboxId, shareId);
    const updated = this.storage.updatePermission(shareId, permission);
    if (!updated) {
      throw new ShareNotFoundException(shareId);
    }
    return updated;
  }

  removeShare(callerId: string, sandboxId: string, shareId: string): void {
    this.accessGuard.require(sandboxId, callerId, 'owner');
    this.findOwnedShare(sandboxId, shareId);
    this.storage.deleteShare(shareId);
    this.logger.log(`Share ${shareId} removed from sandbox ${sandboxId}`);
  }

  listShares(callerId: string, sandboxId: string): SandboxShare[] {
    this.accessGuard.require(sandboxId, callerId, 'owner');
    return this.storage.getSharesBySandbox(sandboxId);
  }

  private findOwnedShare(sandboxId: string, shareId: string): SandboxShare {
    const share = this.storage.getShare(shareId);
    if (!share || share.sandboxId !== sandboxId) {
      throw new ShareNotFoundException(shareId);
    }
    return share;
  }
}
