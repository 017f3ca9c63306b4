import { Injectable } from '@nestjs/common';
import { EngineStateService } from '../engine/engine-state.service.js';
import { UINT32_MAX } from '../engine/checked-math.js';
import {
  SaleEngineError,
  SaleErrorCode,
} from '../engine/sale-engine.error.js';
import { SaleRegistryService } from '../sale/sale-registry.service.js';
import type { SaleConfig } from '../sale/sale.types.js';
import { PurchaseLedgerService } from './purchase-ledger.service.js';

export type Admission =
  | { accepted: true; config: SaleConfig }
  | { accepted: false; reason: SaleErrorCode; message: string };

/** Quantities already admitted earlier in the same request. */
export class StagedPurchases {
  private readonly quantities = new Map<number, number>();

  quantityOf(itemId: number): number {
    return this.quantities.get(itemId) ?? 0;
  }

  add(itemId: number, quantity: number): void {
    this.quantities.set(itemId, this.quantityOf(itemId) + quantity);
  }
}

function reject(reason: SaleErrorCode, message: string): Admission {
  return { accepted: false, reason, message };
}

/**
 * Read-only admission control. Checks run in a fixed order and the first
 * failure decides the reason.
 */
@Injectable()
export class PurchaseValidatorService {
  constructor(
    private readonly registry: SaleRegistryService,
    private readonly ledger: PurchaseLedgerService,
    private readonly engine: EngineStateService,
  ) {}

  admit(
    itemId: number,
    quantity: number,
    buyer: string,
    now: number,
    staged?: StagedPurchases,
  ): Admission {
    const config = this.registry.get(itemId);
    if (!config || !config.active || !this.registry.isActive(itemId)) {
      return reject('SALE_NOT_ACTIVE', `Sale for item ${itemId} is not active`);
    }

    if (now < config.startTime || now > config.endTime) {
      return reject(
        'SALE_NOT_ACTIVE',
        `Sale for item ${itemId} runs from ${config.startTime} to ${config.endTime}`,
      );
    }

    const pending = staged?.quantityOf(itemId) ?? 0;
    const sold = config.totalSold + pending + quantity;
    if (sold > UINT32_MAX) {
      return reject('ARITHMETIC_OVERFLOW', `Total sold of item ${itemId} overflows`);
    }
    if (sold > config.maxSupply) {
      return reject(
        'EXCEEDS_MAX_SUPPLY',
        `Only ${config.maxSupply - config.totalSold - pending} of item ${itemId} left`,
      );
    }

    const held = this.engine.heldBalance(itemId) - pending;
    if (held < quantity) {
      return reject(
        'INSUFFICIENT_INVENTORY',
        `Engine holds ${held} of item ${itemId}, requested ${quantity}`,
      );
    }

    if (config.maxPerAddress > 0) {
      const bought =
        this.ledger.purchased(itemId, config.saleVersion, buyer) + pending + quantity;
      if (bought > UINT32_MAX) {
        return reject('ARITHMETIC_OVERFLOW', `Purchased quantity overflows`);
      }
      if (bought > config.maxPerAddress) {
        return reject(
          'EXCEEDS_MAX_PER_ADDRESS',
          `Buyer allocation for item ${itemId} is ${config.maxPerAddress}`,
        );
      }
    }

    return { accepted: true, config };
  }

  /** admit(), throwing the rejection as a SaleEngineError. */
  assertAdmitted(
    itemId: number,
    quantity: number,
    buyer: string,
    now: number,
    staged?: StagedPurchases,
  ): SaleConfig {
    const admission = this.admit(itemId, quantity, buyer, now, staged);
    if (!admission.accepted) {
      throw new SaleEngineError(admission.reason, admission.message);
    }
    return admission.config;
  }
}
