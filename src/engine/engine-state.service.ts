import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { engineConfig } from '../config/engine.config.js';
import {
  ASSET_LEDGER_DIRECTORY,
  NATIVE_LEDGER,
  TOKEN_LEDGER,
} from '../ledger/constants.js';
import { LedgerError } from '../ledger/ledger.error.js';
import type {
  AssetLedger,
  AssetLedgerDirectory,
  Checkpointable,
  ItemReceiver,
  NativeLedger,
  TokenLedger,
} from '../ledger/ledger.types.js';
import type { SaleEvent, SaleEventSink } from '../events/sale-event.types.js';
import { NATIVE_CURRENCY, SALE_EVENT_SINK } from './constants.js';
import type { CallContext, EngineStatus, EntryGuard } from './entry-guards.js';
import { ReentrancyLock } from './reentrancy-lock.js';
import { SaleEngineError } from './sale-engine.error.js';

/** Handle given to the body of a mutating entry point. */
export interface RequestScope {
  /** Queues an event; it is published only if the request commits. */
  emit(event: SaleEvent): void;
  /** Registers an undo action, run in reverse order if the request aborts. */
  onRollback(undo: () => void): void;
}

/**
 * Engine-wide wiring and the request boundary every mutating entry point
 * goes through: reentrancy lock, guard chain, escrow of the tendered value
 * on demand, and all-or-nothing rollback of collaborator effects.
 */
@Injectable()
export class EngineStateService implements ItemReceiver {
  private readonly logger = new Logger(EngineStateService.name);
  private readonly lock = new ReentrancyLock();

  readonly address: string;
  readonly owner: string;
  private assetLedger: AssetLedger | null = null;
  private paymentRecipient: string | null;
  private paused = false;
  private tender: { ctx: CallContext; collected: boolean } | null = null;

  constructor(
    @Inject(engineConfig.KEY)
    config: ConfigType<typeof engineConfig>,
    @Inject(NATIVE_LEDGER) readonly native: NativeLedger,
    @Inject(TOKEN_LEDGER) readonly tokens: TokenLedger,
    @Inject(ASSET_LEDGER_DIRECTORY)
    private readonly directory: AssetLedgerDirectory,
    @Inject(SALE_EVENT_SINK) private readonly sink: SaleEventSink,
  ) {
    this.address = config.address;
    this.owner = config.owner;
    this.paymentRecipient = config.paymentRecipient || null;

    if (config.assetLedger) {
      const ledger = directory.resolve(config.assetLedger);
      if (ledger) {
        this.bindAssetLedger(ledger);
      } else {
        this.logger.warn(
          `Asset ledger ${config.assetLedger} is unknown, engine starts uninitialized`,
        );
      }
    }
  }

  status(): EngineStatus {
    return {
      owner: this.owner,
      paused: this.paused,
      initialized: this.assetLedger !== null && this.paymentRecipient !== null,
    };
  }

  get locked(): boolean {
    return this.lock.locked;
  }

  /**
   * Runs `body` as one atomic request. Either every effect of the body
   * (engine state, collaborator transfers, events) lands, or none does.
   * A positive `ctx.value` must be taken with collectTender() before the
   * body returns.
   */
  run<T>(
    ctx: CallContext,
    guards: readonly EntryGuard[],
    body: (scope: RequestScope) => T,
  ): T {
    return this.lock.run(() => {
      const status = this.status();
      for (const guard of guards) {
        const rejection = guard(status, ctx);
        if (rejection) {
          throw rejection;
        }
      }

      const checkpoints = this.collaborators().map((ledger) =>
        ledger.checkpoint(),
      );
      const events: SaleEvent[] = [];
      const undo: Array<() => void> = [];
      const tender = { ctx, collected: false };
      this.tender = tender;

      let result: T;
      try {
        result = body({
          emit: (event) => events.push(event),
          onRollback: (action) => undo.push(action),
        });
        if (ctx.value > 0n && !tender.collected) {
          throw new SaleEngineError(
            'INVALID_PAYMENT',
            'This operation does not accept native currency',
          );
        }
      } catch (error) {
        undo.reverse().forEach((action) => action());
        checkpoints.reverse().forEach((checkpoint) => checkpoint.rollback());
        if (error instanceof LedgerError) {
          throw new SaleEngineError('TRANSFER_FAILED', error.message);
        }
        throw error;
      } finally {
        this.tender = null;
      }

      checkpoints.forEach((checkpoint) => checkpoint.release());
      this.sink.publish(events);
      return result;
    });
  }

  /**
   * Moves the current request's tendered value into the engine account.
   * Idempotent within a request.
   */
  collectTender(): void {
    if (!this.tender) {
      throw new Error('collectTender() called outside a request');
    }
    if (this.tender.collected) {
      return;
    }
    const { ctx } = this.tender;
    if (ctx.value > 0n) {
      this.native.transfer(ctx.caller, this.address, ctx.value);
    }
    this.tender.collected = true;
  }

  getAssetLedger(): AssetLedger {
    if (!this.assetLedger) {
      throw new SaleEngineError('NOT_INITIALIZED', 'Asset ledger is not set');
    }
    return this.assetLedger;
  }

  assetLedgerAddress(): string | null {
    return this.assetLedger?.address ?? null;
  }

  getPaymentRecipient(): string {
    if (!this.paymentRecipient) {
      throw new SaleEngineError(
        'NOT_INITIALIZED',
        'Payment recipient is not set',
      );
    }
    return this.paymentRecipient;
  }

  paymentRecipientAddress(): string | null {
    return this.paymentRecipient;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /** Item balance the engine holds on the asset ledger. */
  heldBalance(itemId: number): number {
    return this.getAssetLedger().balanceOf(this.address, itemId);
  }

  resolveAssetLedger(address: string): AssetLedger {
    const ledger =
      address === NATIVE_CURRENCY ? undefined : this.directory.resolve(address);
    if (!ledger) {
      throw new SaleEngineError(
        'INVALID_ADDRESS',
        `No asset ledger at ${address}`,
      );
    }
    return ledger;
  }

  // The setters below are only called from inside run().

  setAssetLedger(ledger: AssetLedger): void {
    this.bindAssetLedger(ledger);
  }

  setPaymentRecipient(recipient: string): void {
    if (recipient === NATIVE_CURRENCY) {
      throw new SaleEngineError(
        'INVALID_ADDRESS',
        'Payment recipient cannot be the zero address',
      );
    }
    this.paymentRecipient = recipient;
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  onItemsReceived(
    source: string,
    from: string,
    itemIds: readonly number[],
    amounts: readonly number[],
  ): void {
    if (source !== this.assetLedgerAddress()) {
      throw new SaleEngineError(
        'UNAUTHORIZED_CALLBACK_SOURCE',
        `Items may only arrive from the configured asset ledger, not ${source}`,
      );
    }
    this.logger.log(
      `Received items [${itemIds.join(', ')}] x [${amounts.join(', ')}] from ${from}`,
    );
  }

  private bindAssetLedger(ledger: AssetLedger): void {
    this.assetLedger = ledger;
    ledger.setReceiver(this.address, this);
  }

  private collaborators(): Checkpointable[] {
    return this.assetLedger
      ? [this.native, this.tokens, this.assetLedger]
      : [this.native, this.tokens];
  }
}
