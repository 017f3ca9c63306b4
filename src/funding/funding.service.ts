import { Injectable, Logger } from '@nestjs/common';
import { isUint32, UINT256_MAX } from '../engine/checked-math.js';
import { NATIVE_CURRENCY } from '../engine/constants.js';
import { EngineStateService } from '../engine/engine-state.service.js';
import {
  ADMIN_GUARDS,
  CallContext,
  nonPayable,
} from '../engine/entry-guards.js';
import { SaleEngineError } from '../engine/sale-engine.error.js';
import { InMemoryAssetLedgerDirectory } from '../ledger/in-memory-asset-ledger.js';
import { InMemoryNativeLedger } from '../ledger/in-memory-native-ledger.js';
import { InMemoryTokenLedger } from '../ledger/in-memory-token-ledger.js';

export interface HolderBalances {
  holder: string;
  native: bigint;
  token: { token: string; balance: bigint; allowance: bigint } | null;
  item: { ledger: string; itemId: number; balance: number } | null;
}

function assertAmount(amount: bigint): void {
  if (amount <= 0n || amount > UINT256_MAX) {
    throw new SaleEngineError('ZERO_AMOUNT', 'Amount must be positive');
  }
}

/**
 * Funds the process-local ledgers: native deposits, token mints, item
 * mints and buyer allowances. Every operation is an engine request, so it
 * is serialized with purchases and recorded in the event log.
 */
@Injectable()
export class FundingService {
  private readonly logger = new Logger(FundingService.name);

  constructor(
    private readonly engine: EngineStateService,
    private readonly native: InMemoryNativeLedger,
    private readonly tokens: InMemoryTokenLedger,
    private readonly assets: InMemoryAssetLedgerDirectory,
  ) {}

  depositNative(ctx: CallContext, to: string, amount: bigint): bigint {
    const balance = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      assertAmount(amount);
      this.native.deposit(to, amount);
      scope.emit({ type: 'NativeDeposited', to, amount });
      return this.native.balanceOf(to);
    });
    this.logger.log(`Deposited ${amount} native to ${to}`);
    return balance;
  }

  mintTokens(ctx: CallContext, token: string, to: string, amount: bigint): bigint {
    const balance = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      if (token === NATIVE_CURRENCY) {
        throw new SaleEngineError(
          'INVALID_ADDRESS',
          'Use a native deposit for the native currency',
        );
      }
      assertAmount(amount);
      this.tokens.mint(token, to, amount);
      scope.emit({ type: 'TokensMinted', token, to, amount });
      return this.tokens.balanceOf(token, to);
    });
    this.logger.log(`Minted ${amount} of ${token} to ${to}`);
    return balance;
  }

  /**
   * Mints items on the engine's asset ledger. Minting to the engine goes
   * through its receiver callback like any other delivery.
   */
  mintItems(ctx: CallContext, to: string, itemId: number, amount: number): number {
    const balance = this.engine.run(ctx, ADMIN_GUARDS, (scope) => {
      if (!isUint32(amount) || amount === 0) {
        throw new SaleEngineError('ZERO_AMOUNT', 'Amount must be a positive 32-bit integer');
      }
      const address = this.engine.getAssetLedger().address;
      const ledger = this.assets.resolve(address);
      if (!ledger) {
        throw new SaleEngineError(
          'INVALID_ADDRESS',
          `Asset ledger ${address} cannot mint`,
        );
      }
      ledger.mint(to, itemId, amount);
      scope.emit({ type: 'ItemsMinted', ledger: address, to, itemId, amount });
      return ledger.balanceOf(to, itemId);
    });
    this.logger.log(`Minted ${amount} of item ${itemId} to ${to}`);
    return balance;
  }

  /** Sets the engine's allowance over the caller's tokens. */
  approve(ctx: CallContext, token: string, amount: bigint): bigint {
    this.engine.run(ctx, [nonPayable], (scope) => {
      if (token === NATIVE_CURRENCY) {
        throw new SaleEngineError(
          'INVALID_ADDRESS',
          'The native currency takes no allowance',
        );
      }
      if (amount < 0n || amount > UINT256_MAX) {
        throw new SaleEngineError('ZERO_AMOUNT', 'Allowance is out of range');
      }
      this.tokens.approve(token, ctx.caller, this.engine.address, amount);
      scope.emit({
        type: 'AllowanceApproved',
        token,
        owner: ctx.caller,
        spender: this.engine.address,
        amount,
      });
    });
    this.logger.log(`${ctx.caller} allowed the engine ${amount} of ${token}`);
    return amount;
  }

  balances(holder: string, token?: string, itemId?: number): HolderBalances {
    const ledger = this.engine.assetLedgerAddress();
    return {
      holder,
      native: this.native.balanceOf(holder),
      token:
        token === undefined
          ? null
          : {
              token,
              balance: this.tokens.balanceOf(token, holder),
              allowance: this.tokens.allowance(token, holder, this.engine.address),
            },
      item:
        itemId === undefined || ledger === null
          ? null
          : {
              ledger,
              itemId,
              balance: this.engine.getAssetLedger().balanceOf(holder, itemId),
            },
    };
  }
}
