import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Every rejection the engine can produce, mapped to the HTTP status the API
 * answers with. Callers and tests assert on `code`, never on the message.
 */
export const SALE_ERROR_STATUS = {
  // input shape
  ZERO_AMOUNT: HttpStatus.BAD_REQUEST,
  ARRAY_LENGTH_MISMATCH: HttpStatus.BAD_REQUEST,
  BATCH_TOO_LARGE: HttpStatus.BAD_REQUEST,
  DUPLICATE_ITEM: HttpStatus.BAD_REQUEST,
  EMPTY_BATCH: HttpStatus.BAD_REQUEST,
  INVALID_PRICE: HttpStatus.BAD_REQUEST,
  INVALID_SUPPLY: HttpStatus.BAD_REQUEST,
  INVALID_ADDRESS: HttpStatus.BAD_REQUEST,
  INVALID_ITEM: HttpStatus.BAD_REQUEST,
  // state
  SALE_NOT_FOUND: HttpStatus.NOT_FOUND,
  SALE_NOT_ACTIVE: HttpStatus.CONFLICT,
  SALE_MUST_BE_INACTIVE: HttpStatus.CONFLICT,
  NOT_INITIALIZED: HttpStatus.SERVICE_UNAVAILABLE,
  ENGINE_PAUSED: HttpStatus.SERVICE_UNAVAILABLE,
  // admission
  INSUFFICIENT_PAYMENT: HttpStatus.PAYMENT_REQUIRED,
  INVALID_PAYMENT: HttpStatus.BAD_REQUEST,
  EXCEEDS_MAX_SUPPLY: HttpStatus.GONE,
  EXCEEDS_MAX_PER_ADDRESS: HttpStatus.CONFLICT,
  INSUFFICIENT_INVENTORY: HttpStatus.CONFLICT,
  INVALID_TIME_RANGE: HttpStatus.BAD_REQUEST,
  ACTIVE_SALE_INVENTORY_REQUIRED: HttpStatus.CONFLICT,
  // arithmetic
  ARITHMETIC_OVERFLOW: HttpStatus.UNPROCESSABLE_ENTITY,
  // authorization
  NOT_OWNER: HttpStatus.FORBIDDEN,
  UNAUTHORIZED_CALLBACK_SOURCE: HttpStatus.FORBIDDEN,
  REENTRANT_CALL: HttpStatus.CONFLICT,
  // settlement
  TRANSFER_FAILED: HttpStatus.BAD_GATEWAY,
} as const satisfies Record<string, HttpStatus>;

export type SaleErrorCode = keyof typeof SALE_ERROR_STATUS;

export class SaleEngineError extends HttpException {
  constructor(
    readonly code: SaleErrorCode,
    message: string,
  ) {
    super(
      { statusCode: SALE_ERROR_STATUS[code], message, error: code },
      SALE_ERROR_STATUS[code],
    );
    this.name = 'SaleEngineError';
  }
}
