import {
  BadRequestException,
  ForbiddenException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import Decimal from 'decimal.js';
import { toNumber, toUSD } from '../utils/decimal.util';

export type ErrorCode =
  | 'PermissionDenied'
  | 'NotFound'
  | 'InvalidQuantity'
  | 'InsufficientFunds'
  | 'InsufficientShares'
  | 'QuoteUnavailable'
  | 'MissingCaller';

export class PermissionDeniedException extends ForbiddenException {
  constructor(sandboxId: string, required: string) {
    super({
      statusCode: HttpStatus.FORBIDDEN,
      error: 'PermissionDenied' satisfies ErrorCode,
      message: `Caller lacks ${required} access to sandbox ${sandboxId}`,
      required,
    });
  }
}

export class SandboxNotFoundException extends NotFoundException {
  constructor(sandboxId: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'NotFound' satisfies ErrorCode,
      message: `Sandbox ${sandboxId} not found`,
      sandboxId,
    });
  }
}

export class ShareNotFoundException extends NotFoundException {
  constructor(shareId: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'NotFound' satisfies ErrorCode,
      message: `Share ${shareId} not found`,
      shareId,
    });
  }
}

export class InvalidQuantityException extends BadRequestException {
  constructor(quantity: Decimal) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'InvalidQuantity' satisfies ErrorCode,
      message: `Quantity must be positive, got ${quantity.toString()}`,
      quantity: toNumber(quantity),
    });
  }
}

/** Rejected BUY. `shortfall` is how much more cash the order needed. */
export class InsufficientFundsException extends BadRequestException {
  constructor(available: Decimal, required: Decimal) {
    const shortfall = required.minus(available);
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'InsufficientFunds' satisfies ErrorCode,
      message: `Insufficient funds ($${toUSD(available)} < $${toUSD(required)})`,
      available: toNumber(available),
      required: toNumber(required),
      shortfall: toNumber(shortfall),
    });
  }
}

export class InsufficientSharesException extends BadRequestException {
  constructor(symbol: string, owned: Decimal, requested: Decimal) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'InsufficientShares' satisfies ErrorCode,
      message: `Insufficient shares of ${symbol} (${owned.toString()} < ${requested.toString()})`,
      owned: toNumber(owned),
      requested: toNumber(requested),
      shortfall: toNumber(requested.minus(owned)),
    });
  }
}

// Trades never retry a quote; the caller decides.
export class QuoteUnavailableException extends ServiceUnavailableException {
  constructor(symbol: string) {
    super({
      statusCode: HttpStatus.SERVICE_UNAVAILABLE,
      error: 'QuoteUnavailable' satisfies ErrorCode,
      message: `Could not fetch current price for ${symbol}`,
      symbol,
      retryable: true,
    });
  }
}

export class MissingCallerException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: HttpStatus.UNAUTHORIZED,
      error: 'MissingCaller' satisfies ErrorCode,
      message: 'x-user-id header is required',
    });
  }
}

/**
 * Raised inside history seeding. Never reaches the client: the
 * reconstructor converts it into a `historyError` advisory.
 */
export class HistorySeedError extends Error {
  constructor(
    readonly sandboxId: string,
    readonly reason?: unknown,
  ) {
    super(
      `Equity history could not be reconstructed for sandbox ${sandboxId}: ${
        reason instanceof Error ? reason.message : String(reason)
      }`,
    );
    this.name = 'HistorySeedError';
  }
}
