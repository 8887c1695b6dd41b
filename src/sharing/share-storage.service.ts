import { Injectable } from '@nestjs/common';
import { SandboxShare, SharePermission } from './entities/share.entity';

@Injectable()
export class ShareStorageService {
  private shares: Map<string, SandboxShare> = new Map();

  saveShare(share: SandboxShare): SandboxShare {
    this.shares.set(share.id, { ...share });
    return { ...share };
  }

  getShare(shareId: string): SandboxShare | undefined {
    const share = this.shares.get(shareId);
    return share ? { ...share } : undefined;
  }

  findShare(sandboxId: string, granteeId: string): SandboxShare | undefined {
    for (const share of this.shares.values()) {
      if (share.sandboxId === sandboxId && share.granteeId === granteeId) {
        return { ...share };
      }
    }
    return undefined;
  }

  /** Shares of one sandbox, newest first */
  getSharesBySandbox(sandboxId: string): SandboxShare[] {
    return this.sorted((s) => s.sandboxId === sandboxId);
  }

  /** Everything shared with a user, newest first */
  getSharesByGrantee(granteeId: string): SandboxShare[] {
    return this.sorted((s) => s.granteeId === granteeId);
  }

  updatePermission(shareId: string, permission: SharePermission): SandboxShare | undefined {
    const share = this.shares.get(shareId);
    if (!share) {
      return undefined;
    }
    const updated = { ...share, permission };
    this.shares.set(shareId, updated);
    return { ...updated };
  }

  deleteShare(shareId: string): boolean {
    return this.shares.delete(shareId);
  }

  deleteSharesForSandbox(sandboxId: string): number {
    let removed = 0;
    for (const [id, share] of this.shares) {
      if (share.sandboxId === sandboxId) {
        this.shares.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.shares.clear();
  }

  private sorted(predicate: (share: SandboxShare) => boolean): SandboxShare[] {
    return Array.from(this.shares.values())
      .filter(predicate)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((s) => ({ ...s }));
  }
}
