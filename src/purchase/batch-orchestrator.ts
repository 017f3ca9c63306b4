import { Injectable } from '@nestjs/common';
import { MAX_BATCH_SIZE, NATIVE_CURRENCY } from '../engine/constants.js';
import type { CallContext } from '../engine/entry-guards.js';
import {
  checkedAmountAdd,
  checkedAmountMul,
  isPositiveQuantity,
} from '../engine/checked-math.js';
import { SaleEngineError } from '../engine/sale-engine.error.js';
import type { PaymentCharges, TokenCharge } from '../payment/payment.types.js';
import {
  PurchaseValidatorService,
  StagedPurchases,
} from './purchase-validator.service.js';

/**
 * `per-item` issues one token transfer per token-priced entry;
 * `aggregated` issues one per distinct token.
 */
export type SettlementStrategy = 'per-item' | 'aggregated';

export interface PlannedPurchase {
  itemId: number;
  quantity: number;
  cost: bigint;
  paymentToken: string;
  saleVersion: number;
}

export interface PurchasePlan {
  buyer: string;
  strategy: SettlementStrategy;
  entries: PlannedPurchase[];
  charges: PaymentCharges;
}

/**
 * Rejects malformed batches: oversize, mismatched lengths, empty, a
 * non-positive quantity, or a repeated item.
 */
export function assertBatchShape(
  itemIds: readonly number[],
  quantities: readonly number[],
): void {
  if (itemIds.length > MAX_BATCH_SIZE || quantities.length > MAX_BATCH_SIZE) {
    throw new SaleEngineError(
      'BATCH_TOO_LARGE',
      `At most ${MAX_BATCH_SIZE} entries per batch`,
    );
  }
  if (itemIds.length !== quantities.length) {
    throw new SaleEngineError(
      'ARRAY_LENGTH_MISMATCH',
      `${itemIds.length} items but ${quantities.length} quantities`,
    );
  }
  if (itemIds.length === 0) {
    throw new SaleEngineError('EMPTY_BATCH', 'Batch has no entries');
  }
  for (const quantity of quantities) {
    if (!isPositiveQuantity(quantity)) {
      throw new SaleEngineError(
        'ZERO_AMOUNT',
        `Quantity must be a positive integer, got ${quantity}`,
      );
    }
  }
  // Pairwise scan; bounded by MAX_BATCH_SIZE.
  for (let i = 0; i < itemIds.length; i++) {
    for (let j = i + 1; j < itemIds.length; j++) {
      if (itemIds[i] === itemIds[j]) {
        throw new SaleEngineError(
          'DUPLICATE_ITEM',
          `Item ${itemIds[i]} appears more than once`,
        );
      }
    }
  }
}

function mergeCharge(charges: TokenCharge[], token: string, amount: bigint): void {
  const existing = charges.find((charge) => charge.token === token);
  if (existing) {
    existing.amount = checkedAmountAdd(existing.amount, amount, 'token total');
  } else {
    charges.push({ token, amount });
  }
}

/**
 * Builds the staged plan of a purchase request: every entry admitted, every
 * cost priced and grouped per the settlement strategy. Nothing is mutated
 * here; PurchaseService applies the plan.
 */
@Injectable()
export class BatchOrchestrator {
  constructor(private readonly validator: PurchaseValidatorService) {}

  plan(
    ctx: CallContext,
    itemIds: readonly number[],
    quantities: readonly number[],
    strategy: SettlementStrategy,
  ): PurchasePlan {
    assertBatchShape(itemIds, quantities);

    const staged = new StagedPurchases();
    const entries: PlannedPurchase[] = [];
    const tokens: TokenCharge[] = [];
    let native = 0n;

    itemIds.forEach((itemId, i) => {
      const quantity = quantities[i] ?? 0;
      const config = this.validator.assertAdmitted(
        itemId,
        quantity,
        ctx.caller,
        ctx.now,
        staged,
      );
      const cost = checkedAmountMul(config.price, BigInt(quantity), 'purchase cost');
      staged.add(itemId, quantity);
      entries.push({
        itemId,
        quantity,
        cost,
        paymentToken: config.paymentToken,
        saleVersion: config.saleVersion,
      });

      if (config.paymentToken === NATIVE_CURRENCY) {
        native = checkedAmountAdd(native, cost, 'native total');
      } else if (strategy === 'aggregated') {
        mergeCharge(tokens, config.paymentToken, cost);
      } else {
        tokens.push({ token: config.paymentToken, amount: cost });
      }
    });

    return { buyer: ctx.caller, strategy, entries, charges: { native, tokens } };
  }
}
