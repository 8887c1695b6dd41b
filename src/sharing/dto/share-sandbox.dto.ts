import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { SHARE_PERMISSIONS, SharePermission } from '../entities/share.entity';

// Grant another user access to a sandbox.
// Re-sharing with the same grantee updates the permission.
export class ShareSandboxDto {
  @IsString()
  @IsNotEmpty()
  granteeId!: string;

  @IsOptional()
  @IsIn(SHARE_PERMISSIONS)
  permission?: SharePermission;    // defaults to watch
}

export class UpdateShareDto {
  @IsIn(SHARE_PERMISSIONS)
  permission!: SharePermission;
}
