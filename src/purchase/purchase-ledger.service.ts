import { Injectable } from '@nestjs/common';
import { checkedAdd } from '../engine/checked-math.js';
import { SaleRegistryService } from '../sale/sale-registry.service.js';

export interface LedgerChange {
  itemId: number;
  saleVersion: number;
  buyer: string;
  previousSold: number;
  previousPurchased: number;
}

function ledgerKey(itemId: number, saleVersion: number, buyer: string): string {
  return `${itemId}:${saleVersion}:${buyer}`;
}

/**
 * Per-buyer purchased quantities keyed by (item, sale version, buyer).
 * A reconfiguration bumps the version, so earlier entries simply stop
 * being consulted.
 */
@Injectable()
export class PurchaseLedgerService {
  private readonly entries = new Map<string, number>();

  constructor(private readonly registry: SaleRegistryService) {}

  purchased(itemId: number, saleVersion: number, buyer: string): number {
    return this.entries.get(ledgerKey(itemId, saleVersion, buyer)) ?? 0;
  }

  /** Purchased quantity under the item's current sale version. */
  purchasedCurrent(itemId: number, buyer: string): number {
    const config = this.registry.get(itemId);
    return config ? this.purchased(itemId, config.saleVersion, buyer) : 0;
  }

  /**
   * Records an admitted purchase: bumps the item's `totalSold` and the
   * buyer's counter, both with checked arithmetic.
   */
  record(itemId: number, quantity: number, buyer: string): LedgerChange {
    const { saleVersion } = this.registry.require(itemId);
    const key = ledgerKey(itemId, saleVersion, buyer);
    const previousPurchased = this.entries.get(key) ?? 0;
    const nextPurchased = checkedAdd(
      previousPurchased,
      quantity,
      'purchased quantity',
    );
    const previousSold = this.registry.addSold(itemId, quantity);
    this.entries.set(key, nextPurchased);
    return { itemId, saleVersion, buyer, previousSold, previousPurchased };
  }

  revert(change: LedgerChange): void {
    const key = ledgerKey(change.itemId, change.saleVersion, change.buyer);
    if (change.previousPurchased === 0) {
      this.entries.delete(key);
    } else {
      this.entries.set(key, change.previousPurchased);
    }
    this.registry.restoreSold(
      change.itemId,
      change.saleVersion,
      change.previousSold,
    );
  }
}
