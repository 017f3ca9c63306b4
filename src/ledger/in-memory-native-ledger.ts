import type { LedgerCheckpoint, NativeLedger } from './ledger.types.js';
import { LedgerError } from './ledger.error.js';
import { JournaledMap } from './journaled-map.js';

export class InMemoryNativeLedger implements NativeLedger {
  private readonly balances = new JournaledMap<string, bigint>();

  balanceOf(holder: string): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  deposit(holder: string, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError(`Invalid amount ${amount}`, 'INVALID_AMOUNT');
    }
    this.balances.set(holder, this.balanceOf(holder) + amount);
  }

  transfer(from: string, to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError(`Invalid amount ${amount}`, 'INVALID_AMOUNT');
    }
    const held = this.balanceOf(from);
    if (held < amount) {
      throw new LedgerError(
        `${from} holds ${held}, needs ${amount}`,
        'INSUFFICIENT_BALANCE',
      );
    }
    this.balances.set(from, held - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  checkpoint(): LedgerCheckpoint {
    return this.balances.checkpoint();
  }
}
