import type { LedgerCheckpoint, TokenLedger } from './ledger.types.js';
import { LedgerError } from './ledger.error.js';
import { combineCheckpoints, JournaledMap } from './journaled-map.js';

/** Process-local fungible token ledger covering any number of tokens. */
export class InMemoryTokenLedger implements TokenLedger {
  private readonly balances = new JournaledMap<string, bigint>();
  private readonly allowances = new JournaledMap<string, bigint>();

  balanceOf(token: string, holder: string): bigint {
    return this.balances.get(`${token}:${holder}`) ?? 0n;
  }

  allowance(token: string, owner: string, spender: string): bigint {
    return this.allowances.get(`${token}:${owner}:${spender}`) ?? 0n;
  }

  mint(token: string, to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError(`Invalid amount ${amount}`, 'INVALID_AMOUNT');
    }
    this.balances.set(`${token}:${to}`, this.balanceOf(token, to) + amount);
  }

  approve(token: string, owner: string, spender: string, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError(`Invalid amount ${amount}`, 'INVALID_AMOUNT');
    }
    this.allowances.set(`${token}:${owner}:${spender}`, amount);
  }

  transferFrom(
    token: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): void {
    const allowed = this.allowance(token, from, spender);
    if (allowed < amount) {
      throw new LedgerError(
        `Allowance ${allowed} of ${token} below ${amount}`,
        'INSUFFICIENT_ALLOWANCE',
      );
    }
    this.transfer(token, from, to, amount);
    this.allowances.set(`${token}:${from}:${spender}`, allowed - amount);
  }

  transfer(token: string, from: string, to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError(`Invalid amount ${amount}`, 'INVALID_AMOUNT');
    }
    const held = this.balanceOf(token, from);
    if (held < amount) {
      throw new LedgerError(
        `${from} holds ${held} of ${token}, needs ${amount}`,
        'INSUFFICIENT_BALANCE',
      );
    }
    this.balances.set(`${token}:${from}`, held - amount);
    this.balances.set(`${token}:${to}`, this.balanceOf(token, to) + amount);
  }

  checkpoint(): LedgerCheckpoint {
    return combineCheckpoints([
      this.balances.checkpoint(),
      this.allowances.checkpoint(),
    ]);
  }
}
