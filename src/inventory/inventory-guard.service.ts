import { Injectable } from '@nestjs/common';
import { EngineStateService } from '../engine/engine-state.service.js';
import { SaleEngineError } from '../engine/sale-engine.error.js';
import { SaleRegistryService } from '../sale/sale-registry.service.js';

/**
 * Keeps administrator withdrawals from eating into inventory that backs an
 * active sale's unsold supply.
 */
@Injectable()
export class InventoryGuardService {
  constructor(
    private readonly registry: SaleRegistryService,
    private readonly engine: EngineStateService,
  ) {}

  checkWithdrawable(itemId: number, amount: number): void {
    const config = this.registry.get(itemId);
    if (!config || !config.active) {
      return;
    }

    const needed = config.maxSupply - config.totalSold;
    const held = this.engine.heldBalance(itemId);
    if (held < amount + needed) {
      throw new SaleEngineError(
        'ACTIVE_SALE_INVENTORY_REQUIRED',
        `Item ${itemId}: ${needed} units back the active sale, ${held} held, ${amount} requested`,
      );
    }
  }
}
