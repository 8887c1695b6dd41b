import { SharePermission } from '../entities/share.entity';

export class ShareResponseDto {
  id!: string;
  sandboxId!: string;
  granteeId!: string;
  permission!: SharePermission;
  createdAt!: string;
  updated!: boolean;               // true if an existing grant was changed
}
