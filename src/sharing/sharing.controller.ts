import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put } from '@nestjs/common';
import { SharingService } from './sharing.service';
import { ShareSandboxDto, UpdateShareDto } from './dto/share-sandbox.dto';
import { ShareResponseDto } from './dto/share-response.dto';
import { SandboxShare } from './entities/share.entity';
import { CallerId } from '../common/decorators/caller-id.decorator';

function toShareResponse(share: SandboxShare, updated = false): ShareResponseDto {
  return {
    id: share.id,
    sandboxId: share.sandboxId,
    granteeId: share.granteeId,
    permission: share.permission,
    createdAt: share.createdAt.toISOString(),
    updated,
  };
}

@Controller('sandboxes/:sandboxId/shares')
export class SharingController {
  constructor(private readonly sharingService: SharingService) {}

  /**
   * Lists who the sandbox is shared with. Owner only.
   *
   * GET /sandboxes/:sandboxId/shares
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  listShares(
    @CallerId() callerId: string,
    @Param('sandboxId') sandboxId: string,
  ): ShareResponseDto[] {
    return this.sharingService.listShares(callerId, sandboxId).map((s) => toShareResponse(s));
  }

  /**
   * Shares the sandbox, or changes the permission of an existing grant.
   *
   * POST /sandboxes/:sandboxId/shares
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  shareSandbox(
    @CallerId() callerId: string,
    @Param('sandboxId') sandboxId: string,
    @Body() dto: ShareSandboxDto,
  ): ShareResponseDto {
    const { share, updated } = this.sharingService.shareSandbox(callerId, sandboxId, dto);
    return toShareResponse(share, updated);
  }

  /**
   * PUT /sandboxes/:sandboxId/shares/:shareId
   */
  @Put(':shareId')
  @HttpCode(HttpStatus.OK)
  updateShare(
    @CallerId() callerId: string,
    @Param('sandboxId') sandboxId: string,
    @Param('shareId') shareId: string,
    @Body() dto: UpdateShareDto,
  ): ShareResponseDto {
    const share = this.sharingService.updateShare(callerId, sandboxId, shareId, dto.permission);
    return toShareResponse(share, true);
  }

  /**
   * DELETE /sandboxes/:sandboxId/shares/:shareId
   */
  @Delete(':shareId')
  @HttpCode(HttpStatus.OK)
  removeShare(
    @CallerId() callerId: string,
    @Param('sandboxId') sandboxId: string,
    @Param('shareId') shareId: string,
  ) {
    this.sharingService.removeShare(callerId, sandboxId, shareId);
    return { ok: true, id: shareId };
  }
}
