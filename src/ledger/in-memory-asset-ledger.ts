import type {
  AssetLedger,
  AssetLedgerDirectory,
  ItemReceiver,
  LedgerCheckpoint,
} from './ledger.types.js';
import { LedgerError } from './ledger.error.js';
import { JournaledMap } from './journaled-map.js';

const MINT_SOURCE = '0x0000000000000000000000000000000000000000';

function balanceKey(holder: string, itemId: number): string {
  return `${holder}:${itemId}`;
}

/**
 * Process-local asset ledger. Transfers to a holder with a registered
 * receiver invoke its callback and are undone if the callback throws.
 */
export class InMemoryAssetLedger implements AssetLedger {
  private readonly balances = new JournaledMap<string, number>();
  private readonly receivers = new Map<string, ItemReceiver>();

  constructor(readonly address: string) {}

  balanceOf(holder: string, itemId: number): number {
    return this.balances.get(balanceKey(holder, itemId)) ?? 0;
  }

  mint(to: string, itemId: number, amount: number): void {
    this.atomically(() => {
      this.credit(to, itemId, amount);
      this.notify(MINT_SOURCE, to, [itemId], [amount]);
    });
  }

  safeTransferFrom(
    from: string,
    to: string,
    itemId: number,
    amount: number,
  ): void {
    this.safeBatchTransferFrom(from, to, [itemId], [amount]);
  }

  safeBatchTransferFrom(
    from: string,
    to: string,
    itemIds: readonly number[],
    amounts: readonly number[],
  ): void {
    if (itemIds.length !== amounts.length) {
      throw new LedgerError('Item and amount lists differ', 'INVALID_AMOUNT');
    }
    this.atomically(() => {
      itemIds.forEach((itemId, i) => {
        const amount = amounts[i] ?? 0;
        const held = this.balanceOf(from, itemId);
        if (held < amount) {
          throw new LedgerError(
            `${from} holds ${held} of item ${itemId}, needs ${amount}`,
            'INSUFFICIENT_BALANCE',
          );
        }
        this.balances.set(balanceKey(from, itemId), held - amount);
        this.credit(to, itemId, amount);
      });
      this.notify(from, to, itemIds, amounts);
    });
  }

  setReceiver(holder: string, receiver: ItemReceiver): void {
    this.receivers.set(holder, receiver);
  }

  checkpoint(): LedgerCheckpoint {
    return this.balances.checkpoint();
  }

  private atomically(body: () => void): void {
    const checkpoint = this.checkpoint();
    try {
      body();
    } catch (error) {
      checkpoint.rollback();
      throw error;
    }
    checkpoint.release();
  }

  private credit(to: string, itemId: number, amount: number): void {
    if (!Number.isInteger(amount) || amount < 0) {
      throw new LedgerError(`Invalid amount ${amount}`, 'INVALID_AMOUNT');
    }
    this.balances.set(balanceKey(to, itemId), this.balanceOf(to, itemId) + amount);
  }

  private notify(
    from: string,
    to: string,
    itemIds: readonly number[],
    amounts: readonly number[],
  ): void {
    this.receivers.get(to)?.onItemsReceived(this.address, from, itemIds, amounts);
  }
}

export class InMemoryAssetLedgerDirectory implements AssetLedgerDirectory {
  private readonly ledgers = new Map<string, InMemoryAssetLedger>();

  constructor(ledgers: readonly InMemoryAssetLedger[] = []) {
    ledgers.forEach((ledger) => this.register(ledger));
  }

  register(ledger: InMemoryAssetLedger): void {
    this.ledgers.set(ledger.address, ledger);
  }

  resolve(address: string): InMemoryAssetLedger | undefined {
    return this.ledgers.get(address);
  }
}
