/**
 * Interfaces of the ledgers the engine settles against. They belong to the
 * hosting environment; the engine only queries and invokes them.
 */

export interface LedgerCheckpoint {
  /** Restores every value written since the checkpoint and closes it. */
  rollback(): void;
  /** Keeps the writes and stops recording. */
  release(): void;
}

/** Lets the host undo a request's collaborator effects when it aborts. */
export interface Checkpointable {
  checkpoint(): LedgerCheckpoint;
}

/** Callback invoked by the asset ledger on a holder that receives items. */
export interface ItemReceiver {
  onItemsReceived(
    source: string,
    from: string,
    itemIds: readonly number[],
    amounts: readonly number[],
  ): void;
}

export interface AssetLedger extends Checkpointable {
  readonly address: string;
  balanceOf(holder: string, itemId: number): number;
  safeTransferFrom(
    from: string,
    to: string,
    itemId: number,
    amount: number,
  ): void;
  safeBatchTransferFrom(
    from: string,
    to: string,
    itemIds: readonly number[],
    amounts: readonly number[],
  ): void;
  setReceiver(holder: string, receiver: ItemReceiver): void;
}

export interface AssetLedgerDirectory {
  resolve(address: string): AssetLedger | undefined;
}

export interface TokenLedger extends Checkpointable {
  balanceOf(token: string, holder: string): bigint;
  /** Moves `amount` from `from` to `to`, spending `spender`'s allowance. */
  transferFrom(
    token: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): void;
  transfer(token: string, from: string, to: string, amount: bigint): void;
}

export interface NativeLedger extends Checkpointable {
  balanceOf(holder: string): bigint;
  transfer(from: string, to: string, amount: bigint): void;
}
