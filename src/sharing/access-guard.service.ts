import { Injectable } from '@nestjs/common';
import { LedgerStorageService } from '../ledger/ledger-storage.service';
import { Sandbox } from '../ledger/entities/sandbox.entity';
import { ShareStorageService } from './share-storage.service';
import { AccessLevel, satisfies } from './entities/share.entity';
import { PermissionDeniedException, SandboxNotFoundException } from '../common/errors/sandbox.errors';

export interface ResolvedAccess {
  ownerId: string;
  permission: AccessLevel;
}

export interface GrantedSandbox {
  sandbox: Sandbox;
  access: ResolvedAccess;
}

/**
 * Resolves a caller against a sandbox's owner and share grants.
 * watch: read paths. edit: trading. owner: delete and share management.
 */
@Injectable()
export class AccessGuardService {
  constructor(
    private readonly ledger: LedgerStorageService,
    private readonly shares: ShareStorageService,
  ) {}

  /** Caller's access, or null when the sandbox is absent or not visible to them. */
  resolveAccess(sandboxId: string, callerId: string): ResolvedAccess | null {
    const sandbox = this.ledger.getSandbox(sandboxId);
    if (!sandbox) {
      return null;
    }
    return this.accessTo(sandbox, callerId);
  }

  /**
   * Loads the sandbox and checks the caller holds at least `required`.
   * @throws SandboxNotFoundException, PermissionDeniedException
   */
  require(sandboxId: string, callerId: string, required: AccessLevel): GrantedSandbox {
    const sandbox = this.ledger.getSandbox(sandboxId);
    if (!sandbox) {
      throw new SandboxNotFoundException(sandboxId);
    }
    const access = this.accessTo(sandbox, callerId);
    if (!access || !satisfies(access.permission, required)) {
      throw new PermissionDeniedException(sandboxId, required);
    }
    return { sandbox, access };
  }

  private accessTo(sandbox: Sandbox, callerId: string): ResolvedAccess | null {
    if (sandbox.ownerId === callerId) {
      return { ownerId: sandbox.ownerId, permission: 'owner' };
    }
    const share = this.shares.findShare(sandbox.id, callerId);
    if (!share) {
      return null;
    }
    return { ownerId: sandbox.ownerId, permission: share.permission };
  }
}
