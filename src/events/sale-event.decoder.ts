import type { EncodedPayload, SaleEvent } from './sale-event.types.js';

export class SaleEventDecodeError extends Error {
  constructor(type: string, field: string) {
    super(`Malformed ${type} event: field "${field}"`);
    this.name = 'SaleEventDecodeError';
  }
}

/** Typed reads over a stored payload. */
class PayloadReader {
  constructor(
    private readonly type: string,
    private readonly payload: EncodedPayload,
  ) {}

  string(field: string): string {
    const value = this.payload[field];
    if (typeof value !== 'string') {
      throw new SaleEventDecodeError(this.type, field);
    }
    return value;
  }

  nullableString(field: string): string | null {
    return this.payload[field] === null ? null : this.string(field);
  }

  number(field: string): number {
    const value = this.payload[field];
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      throw new SaleEventDecodeError(this.type, field);
    }
    return value;
  }

  boolean(field: string): boolean {
    const value = this.payload[field];
    if (typeof value !== 'boolean') {
      throw new SaleEventDecodeError(this.type, field);
    }
    return value;
  }

  amount(field: string): bigint {
    const value = this.string(field);
    if (!/^\d+$/.test(value)) {
      throw new SaleEventDecodeError(this.type, field);
    }
    return BigInt(value);
  }

  numbers(field: string): number[] {
    const value = this.payload[field];
    if (!Array.isArray(value)) {
      throw new SaleEventDecodeError(this.type, field);
    }
    return value.map((entry) => {
      if (typeof entry !== 'number' || !Number.isSafeInteger(entry)) {
        throw new SaleEventDecodeError(this.type, field);
      }
      return entry;
    });
  }
}

/** Inverse of encodeSaleEvent for a record read back from the event log. */
export function decodeSaleEvent(
  type: string,
  payload: EncodedPayload,
): SaleEvent {
  const read = new PayloadReader(type, payload);

  switch (type) {
    case 'SaleConfigured':
      return {
        type,
        itemId: read.number('itemId'),
        price: read.amount('price'),
        startTime: read.number('startTime'),
        endTime: read.number('endTime'),
        maxSupply: read.number('maxSupply'),
        maxPerAddress: read.number('maxPerAddress'),
        paymentToken: read.string('paymentToken'),
        saleVersion: read.number('saleVersion'),
      };
    case 'PurchaseCompleted':
      return {
        type,
        receiptId: read.string('receiptId'),
        buyer: read.string('buyer'),
        itemId: read.number('itemId'),
        quantity: read.number('quantity'),
        totalPaid: read.amount('totalPaid'),
        paymentToken: read.string('paymentToken'),
        saleVersion: read.number('saleVersion'),
      };
    case 'SaleStatusChanged':
      return { type, itemId: read.number('itemId'), active: read.boolean('active') };
    case 'SaleParamsUpdated':
      return {
        type,
        itemId: read.number('itemId'),
        price: read.amount('price'),
        endTime: read.number('endTime'),
      };
    case 'AssetLedgerUpdated':
      return {
        type,
        previous: read.nullableString('previous'),
        current: read.string('current'),
      };
    case 'PaymentRecipientUpdated':
      return {
        type,
        previous: read.nullableString('previous'),
        current: read.string('current'),
      };
    case 'PausedChanged':
      return { type, paused: read.boolean('paused') };
    case 'ItemsWithdrawn':
      return {
        type,
        to: read.string('to'),
        itemIds: read.numbers('itemIds'),
        amounts: read.numbers('amounts'),
      };
    case 'NativeWithdrawn':
      return { type, to: read.string('to'), amount: read.amount('amount') };
    case 'TokenWithdrawn':
      return {
        type,
        token: read.string('token'),
        to: read.string('to'),
        amount: read.amount('amount'),
      };
    case 'ItemsMinted':
      return {
        type,
        ledger: read.string('ledger'),
        to: read.string('to'),
        itemId: read.number('itemId'),
        amount: read.number('amount'),
      };
    case 'NativeDeposited':
      return { type, to: read.string('to'), amount: read.amount('amount') };
    case 'TokensMinted':
      return {
        type,
        token: read.string('token'),
        to: read.string('to'),
        amount: read.amount('amount'),
      };
    case 'AllowanceApproved':
      return {
        type,
        token: read.string('token'),
        owner: read.string('owner'),
        spender: read.string('spender'),
        amount: read.amount('amount'),
      };
    default:
      throw new SaleEventDecodeError(type, 'type');
  }
}
