export interface SaleConfiguredEvent {
  type: 'SaleConfigured';
  itemId: number;
  price: bigint;
  startTime: number;
  endTime: number;
  maxSupply: number;
  maxPerAddress: number;
  paymentToken: string;
  saleVersion: number;
}

export interface PurchaseCompletedEvent {
  type: 'PurchaseCompleted';
  receiptId: string;
  buyer: string;
  itemId: number;
  quantity: number;
  totalPaid: bigint;
  paymentToken: string;
  saleVersion: number;
}

export interface SaleStatusChangedEvent {
  type: 'SaleStatusChanged';
  itemId: number;
  active: boolean;
}

export interface SaleParamsUpdatedEvent {
  type: 'SaleParamsUpdated';
  itemId: number;
  price: bigint;
  endTime: number;
}

export interface AssetLedgerUpdatedEvent {
  type: 'AssetLedgerUpdated';
  previous: string | null;
  current: string;
}

export interface PaymentRecipientUpdatedEvent {
  type: 'PaymentRecipientUpdated';
  previous: string | null;
  current: string;
}

export interface PausedChangedEvent {
  type: 'PausedChanged';
  paused: boolean;
}

export interface ItemsWithdrawnEvent {
  type: 'ItemsWithdrawn';
  to: string;
  itemIds: number[];
  amounts: number[];
}

export interface NativeWithdrawnEvent {
  type: 'NativeWithdrawn';
  to: string;
  amount: bigint;
}

export interface TokenWithdrawnEvent {
  type: 'TokenWithdrawn';
  token: string;
  to: string;
  amount: bigint;
}

export interface ItemsMintedEvent {
  type: 'ItemsMinted';
  ledger: string;
  to: string;
  itemId: number;
  amount: number;
}

export interface NativeDepositedEvent {
  type: 'NativeDeposited';
  to: string;
  amount: bigint;
}

export interface TokensMintedEvent {
  type: 'TokensMinted';
  token: string;
  to: string;
  amount: bigint;
}

export interface AllowanceApprovedEvent {
  type: 'AllowanceApproved';
  token: string;
  owner: string;
  spender: string;
  amount: bigint;
}

export type SaleEvent =
  | SaleConfiguredEvent
  | PurchaseCompletedEvent
  | SaleStatusChangedEvent
  | SaleParamsUpdatedEvent
  | AssetLedgerUpdatedEvent
  | PaymentRecipientUpdatedEvent
  | PausedChangedEvent
  | ItemsWithdrawnEvent
  | NativeWithdrawnEvent
  | TokenWithdrawnEvent
  | ItemsMintedEvent
  | NativeDepositedEvent
  | TokensMintedEvent
  | AllowanceApprovedEvent;

export type SaleEventType = SaleEvent['type'];

/** Receives the events of a request once it has committed. Must not throw. */
export interface SaleEventSink {
  publish(events: readonly SaleEvent[]): void;
}

export type EncodedValue = string | number | boolean | null | (string | number)[];

export type EncodedPayload = Record<string, EncodedValue>;

function encodeValue(value: unknown): EncodedValue {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) =>
      typeof entry === 'number' ? entry : String(entry),
    );
  }
  return null;
}

/** JSON-safe form of an event: amounts become decimal strings. */
export function encodeSaleEvent(event: SaleEvent): EncodedPayload {
  const payload: EncodedPayload = {};
  for (const [key, value] of Object.entries(event)) {
    payload[key] = encodeValue(value);
  }
  return payload;
}
