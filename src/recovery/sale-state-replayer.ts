import { Injectable } from '@nestjs/common';
import { NATIVE_CURRENCY } from '../engine/constants.js';
import { EngineStateService } from '../engine/engine-state.service.js';
import type {
  ItemsMintedEvent,
  PurchaseCompletedEvent,
  SaleEvent,
} from '../events/sale-event.types.js';
import { InMemoryAssetLedgerDirectory } from '../ledger/in-memory-asset-ledger.js';
import { InMemoryNativeLedger } from '../ledger/in-memory-native-ledger.js';
import { InMemoryTokenLedger } from '../ledger/in-memory-token-ledger.js';
import { PurchaseLedgerService } from '../purchase/purchase-ledger.service.js';
import { SaleRegistryService } from '../sale/sale-registry.service.js';

export class ReplayMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReplayMismatchError';
  }
}

/**
 * Rebuilds engine and ledger state by applying committed events in the
 * order they were published. Guards and time checks are not re-run: each
 * event already passed them when it was committed.
 */
@Injectable()
export class SaleStateReplayer {
  constructor(
    private readonly engine: EngineStateService,
    private readonly registry: SaleRegistryService,
    private readonly ledger: PurchaseLedgerService,
    private readonly native: InMemoryNativeLedger,
    private readonly tokens: InMemoryTokenLedger,
    private readonly assets: InMemoryAssetLedgerDirectory,
  ) {}

  apply(event: SaleEvent): void {
    switch (event.type) {
      case 'SaleConfigured':
        this.registry.restoreConfigured(
          event.itemId,
          {
            price: event.price,
            startTime: event.startTime,
            endTime: event.endTime,
            maxSupply: event.maxSupply,
            maxPerAddress: event.maxPerAddress,
            paymentToken: event.paymentToken,
          },
          event.saleVersion,
        );
        return;
      case 'SaleParamsUpdated':
        this.registry.updateParams(event.itemId, event.price, event.endTime);
        return;
      case 'SaleStatusChanged':
        this.registry.restoreActive(event.itemId, event.active);
        return;
      case 'PurchaseCompleted':
        this.applyPurchase(event);
        return;
      case 'AssetLedgerUpdated':
        this.engine.setAssetLedger(this.engine.resolveAssetLedger(event.current));
        return;
      case 'PaymentRecipientUpdated':
        this.engine.setPaymentRecipient(event.current);
        return;
      case 'PausedChanged':
        this.engine.setPaused(event.paused);
        return;
      case 'ItemsWithdrawn':
        this.engine
          .getAssetLedger()
          .safeBatchTransferFrom(
            this.engine.address,
            event.to,
            event.itemIds,
            event.amounts,
          );
        return;
      case 'NativeWithdrawn':
        this.native.transfer(this.engine.address, event.to, event.amount);
        return;
      case 'TokenWithdrawn':
        this.tokens.transfer(event.token, this.engine.address, event.to, event.amount);
        return;
      case 'ItemsMinted':
        this.applyMint(event);
        return;
      case 'NativeDeposited':
        this.native.deposit(event.to, event.amount);
        return;
      case 'TokensMinted':
        this.tokens.mint(event.token, event.to, event.amount);
        return;
      case 'AllowanceApproved':
        this.tokens.approve(event.token, event.owner, event.spender, event.amount);
        return;
    }
  }

  private applyPurchase(event: PurchaseCompletedEvent): void {
    const { saleVersion } = this.registry.require(event.itemId);
    if (saleVersion !== event.saleVersion) {
      throw new ReplayMismatchError(
        `Purchase ${event.receiptId} belongs to version ${event.saleVersion} of item ${event.itemId}, current is ${saleVersion}`,
      );
    }
    this.ledger.record(event.itemId, event.quantity, event.buyer);

    // Net effect of escrow, forward and refund
    const recipient = this.engine.getPaymentRecipient();
    if (event.paymentToken === NATIVE_CURRENCY) {
      this.native.transfer(event.buyer, recipient, event.totalPaid);
    } else {
      this.tokens.transferFrom(
        event.paymentToken,
        this.engine.address,
        event.buyer,
        recipient,
        event.totalPaid,
      );
    }
    this.engine
      .getAssetLedger()
      .safeTransferFrom(this.engine.address, event.buyer, event.itemId, event.quantity);
  }

  private applyMint(event: ItemsMintedEvent): void {
    const ledger = this.assets.resolve(event.ledger);
    if (!ledger) {
      throw new ReplayMismatchError(`Asset ledger ${event.ledger} is unknown`);
    }
    ledger.mint(event.to, event.itemId, event.amount);
  }
}
