export type SharePermission = 'watch' | 'edit';

/** Effective access of a caller to a sandbox. */
export type AccessLevel = 'owner' | SharePermission;

export const SHARE_PERMISSIONS: readonly SharePermission[] = ['watch', 'edit'];

const ACCESS_RANK: Record<AccessLevel, number> = {
  watch: 1,
  edit: 2,
  owner: 3,
};

/** True when `granted` is at least as strong as `required`. */
export function satisfies(granted: AccessLevel, required: AccessLevel): boolean {
  return ACCESS_RANK[granted] >= ACCESS_RANK[required];
}

// Grant of one sandbox to one other user. Unique per (sandboxId, granteeId).
export interface SandboxShare {
  id: string;
  sandboxId: string;
  ownerId: string;
  granteeId: string;
  permission: SharePermission;
  createdAt: Date;
}
