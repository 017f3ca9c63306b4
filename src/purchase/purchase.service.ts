import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  EngineStateService,
  RequestScope,
} from '../engine/engine-state.service.js';
import { CallContext, PURCHASE_GUARDS } from '../engine/entry-guards.js';
import { SaleEngineError } from '../engine/sale-engine.error.js';
import { PaymentSettlementService } from '../payment/payment-settlement.service.js';
import { SaleRegistryService } from '../sale/sale-registry.service.js';
import {
  BatchOrchestrator,
  PlannedPurchase,
  PurchasePlan,
  SettlementStrategy,
} from './batch-orchestrator.js';
import { PurchaseLedgerService } from './purchase-ledger.service.js';
import { PurchaseValidatorService } from './purchase-validator.service.js';

export interface PurchaseReceipt {
  receiptId: string;
  buyer: string;
  strategy: SettlementStrategy;
  purchases: PlannedPurchase[];
  nativePaid: bigint;
  refunded: bigint;
  tokenTransfers: number;
}

export interface BuyerStatus {
  itemId: number;
  buyer: string;
  saleVersion: number | null;
  purchased: number;
  /** Units the buyer may still take; remaining supply when unlimited. */
  remaining: number;
  unlimited: boolean;
  eligible: boolean;
}

/**
 * Buyer-facing entry points. Each request is planned in full by the
 * BatchOrchestrator, then applied in order: ledger, payment, assets.
 */
@Injectable()
export class PurchaseService {
  private readonly logger = new Logger(PurchaseService.name);

  constructor(
    private readonly engine: EngineStateService,
    private readonly orchestrator: BatchOrchestrator,
    private readonly ledger: PurchaseLedgerService,
    private readonly validator: PurchaseValidatorService,
    private readonly payments: PaymentSettlementService,
    private readonly registry: SaleRegistryService,
  ) {}

  purchase(ctx: CallContext, itemId: number, quantity: number): PurchaseReceipt {
    return this.submit(ctx, [itemId], [quantity], 'per-item');
  }

  purchaseBatch(
    ctx: CallContext,
    itemIds: readonly number[],
    quantities: readonly number[],
  ): PurchaseReceipt {
    return this.submit(ctx, itemIds, quantities, 'per-item');
  }

  purchaseBatchAggregated(
    ctx: CallContext,
    itemIds: readonly number[],
    quantities: readonly number[],
  ): PurchaseReceipt {
    return this.submit(ctx, itemIds, quantities, 'aggregated');
  }

  getBuyerStatus(itemId: number, buyer: string, now: number): BuyerStatus {
    const config = this.registry.get(itemId);
    if (!config) {
      return {
        itemId,
        buyer,
        saleVersion: null,
        purchased: 0,
        remaining: 0,
        unlimited: false,
        eligible: false,
      };
    }

    const purchased = this.ledger.purchased(itemId, config.saleVersion, buyer);
    const unlimited = config.maxPerAddress === 0;
    const remaining = unlimited
      ? config.maxSupply - config.totalSold
      : Math.max(0, config.maxPerAddress - purchased);
    const status = this.engine.status();
    const eligible =
      status.initialized &&
      !status.paused &&
      this.validator.admit(itemId, 1, buyer, now).accepted;

    return {
      itemId,
      buyer,
      saleVersion: config.saleVersion,
      purchased,
      remaining,
      unlimited,
      eligible,
    };
  }

  private submit(
    ctx: CallContext,
    itemIds: readonly number[],
    quantities: readonly number[],
    strategy: SettlementStrategy,
  ): PurchaseReceipt {
    try {
      const receipt = this.engine.run(ctx, PURCHASE_GUARDS, (scope) =>
        this.execute(ctx, this.orchestrator.plan(ctx, itemIds, quantities, strategy), scope),
      );
      this.logger.log(
        `Purchase ${receipt.receiptId} by ${receipt.buyer}: ${receipt.purchases
          .map((entry) => `${entry.quantity}x item ${entry.itemId}`)
          .join(', ')} (${strategy})`,
      );
      return receipt;
    } catch (error) {
      if (error instanceof SaleEngineError) {
        this.logger.warn(
          `Purchase by ${ctx.caller} of [${itemIds.join(', ')}] rejected: ${error.code}`,
        );
      }
      throw error;
    }
  }

  private execute(
    ctx: CallContext,
    plan: PurchasePlan,
    scope: RequestScope,
  ): PurchaseReceipt {
    const recipient = this.engine.getPaymentRecipient();
    const assets = this.engine.getAssetLedger();
    this.payments.assertTender(ctx, plan.charges.native);

    for (const entry of plan.entries) {
      const change = this.ledger.record(entry.itemId, entry.quantity, plan.buyer);
      scope.onRollback(() => this.ledger.revert(change));
    }

    const settlement = this.payments.settleAll(ctx, plan.charges, recipient);

    const [single] = plan.entries;
    if (plan.entries.length === 1 && single) {
      assets.safeTransferFrom(
        this.engine.address,
        plan.buyer,
        single.itemId,
        single.quantity,
      );
    } else {
      assets.safeBatchTransferFrom(
        this.engine.address,
        plan.buyer,
        plan.entries.map((entry) => entry.itemId),
        plan.entries.map((entry) => entry.quantity),
      );
    }

    const receiptId = uuidv4();
    for (const entry of plan.entries) {
      scope.emit({
        type: 'PurchaseCompleted',
        receiptId,
        buyer: plan.buyer,
        itemId: entry.itemId,
        quantity: entry.quantity,
        totalPaid: entry.cost,
        paymentToken: entry.paymentToken,
        saleVersion: entry.saleVersion,
      });
    }

    return {
      receiptId,
      buyer: plan.buyer,
      strategy: plan.strategy,
      purchases: plan.entries,
      nativePaid: settlement.nativePaid,
      refunded: settlement.refunded,
      tokenTransfers: settlement.tokenTransfers.length,
    };
  }
}
