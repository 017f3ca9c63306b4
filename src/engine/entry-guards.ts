import { SaleEngineError } from './sale-engine.error.js';

export interface CallContext {
  /** Identity of whoever invoked the entry point. */
  caller: string;
  /** Native currency tendered with the call. */
  value: bigint;
  /** Unix seconds. */
  now: number;
}

export interface EngineStatus {
  owner: string;
  paused: boolean;
  initialized: boolean;
}

/**
 * A precondition evaluated before the body of a mutating entry point.
 * Guards run in order; the first rejection aborts the request.
 */
export type EntryGuard = (
  status: EngineStatus,
  ctx: CallContext,
) => SaleEngineError | null;

export const onlyOwner: EntryGuard = (status, ctx) =>
  ctx.caller === status.owner
    ? null
    : new SaleEngineError('NOT_OWNER', 'Caller is not the administrator');

export const whenNotPaused: EntryGuard = (status) =>
  status.paused
    ? new SaleEngineError('ENGINE_PAUSED', 'Sales are paused')
    : null;

export const whenInitialized: EntryGuard = (status) =>
  status.initialized
    ? null
    : new SaleEngineError(
        'NOT_INITIALIZED',
        'Asset ledger and payment recipient must be set',
      );

export const nonPayable: EntryGuard = (_status, ctx) =>
  ctx.value > 0n
    ? new SaleEngineError(
        'INVALID_PAYMENT',
        'This operation does not accept native currency',
      )
    : null;

export const PURCHASE_GUARDS: readonly EntryGuard[] = [
  whenNotPaused,
  whenInitialized,
];

export const ADMIN_GUARDS: readonly EntryGuard[] = [onlyOwner, nonPayable];
