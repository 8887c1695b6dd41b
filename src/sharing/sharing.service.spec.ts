import { BadRequestException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { SharingService } from './sharing.service';
import { SandboxService } from '../sandbox/sandbox.service';
import { createTestingModule, FakeClock, FakeMarketDataProvider } from '../testing/fakes';

describe('SharingService', () => {
  let sharing: SharingService;
  let sandboxes: SandboxService;
  let clock: FakeClock;
  let sandboxId: string;

  beforeEach(async () => {
    clock = new FakeClock(new Date(2026, 0, 5, 9));
    const module: TestingModule = await createTestingModule(new FakeMarketDataProvider(), clock);
    sharing = module.get<SharingService>(SharingService);
    sandboxes = module.get<SandboxService>(SandboxService);

    sandboxId = sandboxes.createSandbox('alice', { name: 'Growth' }).id;
  });

  it('should grant watch by default', () => {
    const { share, updated } = sharing.shareSandbox('alice', sandboxId, { granteeId: 'bob' });

    expect(updated).toBe(false);
    expect(share.permission).toBe('watch');
    expect(share.ownerId).toBe('alice');
    expect(sharing.listShares('alice', sandboxId).map((s) => s.id)).toEqual([share.id]);
  });

  it('should update an existing grant instead of duplicating it', () => {
    const first = sharing.shareSandbox('alice', sandboxId, { granteeId: 'bob' });
    clock.advanceSeconds(60);
    const second = sharing.shareSandbox('alice', sandboxId, { granteeId: 'bob', permission: 'edit' });

    expect(second.updated).toBe(true);
    expect(second.share.id).toBe(first.share.id);
    expect(second.share.permission).toBe('edit');
    expect(sharing.listShares('alice', sandboxId)).toHaveLength(1);
  });

  it('should refuse to share with the owner', () => {
    expect(() => sharing.shareSandbox('alice', sandboxId, { granteeId: 'alice' })).toThrow(BadRequestException);
  });

  it('should only let the owner manage shares', () => {
    sharing.shareSandbox('alice', sandboxId, { granteeId: 'bob', permission: 'edit' });

    expect(() => sharing.shareSandbox('bob', sandboxId, { granteeId: 'carol' })).toThrow(ForbiddenException);
    expect(() => sharing.listShares('bob', sandboxId)).toThrow(ForbiddenException);
  });

  it('should change and remove a share', () => {
    const { share } = sharing.shareSandbox('alice', sandboxId, { granteeId: 'bob' });

    expect(sharing.updateShare('alice', sandboxId, share.id, 'edit').permission).toBe('edit');

    sharing.removeShare('alice', sandboxId, share.id);
    expect(sharing.listShares('alice', sandboxId)).toEqual([]);
  });

  it('should not touch a share through another sandbox', () => {
    const other = sandboxes.createSandbox('alice', { name: 'Income' }).id;
    const { share } = sharing.shareSandbox('alice', other, { granteeId: 'bob' });

    expect(() => sharing.removeShare('alice', sandboxId, share.id)).toThrow(NotFoundException);
    expect(() => sharing.updateShare('alice', sandboxId, 'unknown', 'edit')).toThrow(NotFoundException);
  });
});
