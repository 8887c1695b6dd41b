import { AccessLevel } from '../../sharing/entities/share.entity';

// Sandbox list entry with live equity
export class SandboxSummaryDto {
  id!: string;
  name!: string;
  cash!: number;
  initialCash!: number;
  totalEquity!: number;            // cash + holdings at current prices
  createdAt!: string;
}

// Sandbox someone else shared with the caller
export class SharedSandboxSummaryDto extends SandboxSummaryDto {
  permission!: AccessLevel;
  shareId!: string;
  ownerId!: string;
  isShared!: true;
}
