import { Injectable } from '@nestjs/common';
import { EngineStateService } from '../engine/engine-state.service.js';
import { SaleEngineError } from '../engine/sale-engine.error.js';
import {
  checkedAdd,
  isTimestamp,
  isUint32,
  UINT128_MAX,
} from '../engine/checked-math.js';
import { ActiveSaleIndex } from './active-sale-index.js';
import type { SaleConfig, SaleParams } from './sale.types.js';

/**
 * Owns every item's SaleConfig and keeps the active index in step with
 * `SaleConfig.active`. Mutations are expected to run inside
 * EngineStateService.run() so they share the request lock.
 */
@Injectable()
export class SaleRegistryService {
  private readonly configs = new Map<number, SaleConfig>();
  private readonly activeIndex = new ActiveSaleIndex<number>();

  constructor(private readonly engine: EngineStateService) {}

  get(itemId: number): SaleConfig | undefined {
    const config = this.configs.get(itemId);
    return config ? { ...config } : undefined;
  }

  require(itemId: number): SaleConfig {
    return { ...this.find(itemId) };
  }

  isActive(itemId: number): boolean {
    return this.activeIndex.has(itemId);
  }

  activeItemIds(): number[] {
    return this.activeIndex.values();
  }

  activeCount(): number {
    return this.activeIndex.size;
  }

  activeItemIdsPage(offset: number, limit: number): number[] {
    return this.activeIndex.slice(offset, limit);
  }

  configure(
    itemId: number,
    params: SaleParams,
    verifyInventory: boolean,
  ): SaleConfig {
    if (!Number.isSafeInteger(itemId) || itemId < 0) {
      throw new SaleEngineError('INVALID_ITEM', `Invalid item id ${itemId}`);
    }
    if (params.price <= 0n || params.price > UINT128_MAX) {
      throw new SaleEngineError(
        'INVALID_PRICE',
        'Price must be a positive 128-bit amount',
      );
    }
    if (!isUint32(params.maxSupply) || params.maxSupply === 0) {
      throw new SaleEngineError(
        'INVALID_SUPPLY',
        'Max supply must be a positive 32-bit integer',
      );
    }
    if (!isUint32(params.maxPerAddress)) {
      throw new SaleEngineError(
        'INVALID_SUPPLY',
        'Max per address must be a 32-bit integer',
      );
    }
    this.assertTimeRange(params.startTime, params.endTime);

    const current = this.configs.get(itemId);
    if (current?.active) {
      throw new SaleEngineError(
        'SALE_MUST_BE_INACTIVE',
        `Sale for item ${itemId} must be deactivated before reconfiguring`,
      );
    }
    if (verifyInventory) {
      this.assertInventory(itemId, params.maxSupply);
    }

    const config: SaleConfig = {
      ...params,
      totalSold: 0,
      active: true,
      saleVersion: checkedAdd(current?.saleVersion ?? 0, 1, 'sale version'),
    };
    this.configs.set(itemId, config);
    this.activeIndex.add(itemId);
    return { ...config };
  }

  updateParams(itemId: number, newPrice: bigint, newEndTime: number): SaleConfig {
    const config = this.find(itemId);
    if (newPrice <= 0n || newPrice > UINT128_MAX) {
      throw new SaleEngineError(
        'INVALID_PRICE',
        'Price must be a positive 128-bit amount',
      );
    }
    if (!isTimestamp(newEndTime) || newEndTime < config.endTime) {
      throw new SaleEngineError(
        'INVALID_TIME_RANGE',
        `End time may only be extended beyond ${config.endTime}`,
      );
    }
    config.price = newPrice;
    config.endTime = newEndTime;
    return { ...config };
  }

  setActive(itemId: number, active: boolean): SaleConfig {
    const config = this.find(itemId);
    if (active) {
      this.assertTimeRange(config.startTime, config.endTime);
      this.assertInventory(itemId, config.maxSupply - config.totalSold);
      config.active = true;
      this.activeIndex.add(itemId);
    } else {
      config.active = false;
      this.activeIndex.delete(itemId);
    }
    return { ...config };
  }

  /**
   * Reinstates a configuration read back from the event log. Versions must
   * arrive in order, so a rebuilt registry never reuses one.
   */
  restoreConfigured(itemId: number, params: SaleParams, saleVersion: number): void {
    const expected = (this.configs.get(itemId)?.saleVersion ?? 0) + 1;
    if (saleVersion !== expected) {
      throw new Error(
        `Item ${itemId} replays sale version ${saleVersion}, expected ${expected}`,
      );
    }
    this.configs.set(itemId, { ...params, totalSold: 0, active: true, saleVersion });
    this.activeIndex.add(itemId);
  }

  /** setActive() without the checks that held when the change was made. */
  restoreActive(itemId: number, active: boolean): void {
    const config = this.find(itemId);
    config.active = active;
    if (active) {
      this.activeIndex.add(itemId);
    } else {
      this.activeIndex.delete(itemId);
    }
  }

  /** Checked increment of `totalSold`; returns the previous value. */
  addSold(itemId: number, quantity: number): number {
    const config = this.find(itemId);
    const previous = config.totalSold;
    const next = checkedAdd(previous, quantity, 'total sold');
    if (next > config.maxSupply) {
      throw new SaleEngineError(
        'EXCEEDS_MAX_SUPPLY',
        `Item ${itemId} would sell ${next} of ${config.maxSupply}`,
      );
    }
    config.totalSold = next;
    return previous;
  }

  /** Undo of addSold for an aborted request, scoped to the same version. */
  restoreSold(itemId: number, saleVersion: number, previous: number): void {
    const config = this.configs.get(itemId);
    if (config && config.saleVersion === saleVersion) {
      config.totalSold = previous;
    }
  }

  private find(itemId: number): SaleConfig {
    const config = this.configs.get(itemId);
    if (!config) {
      throw new SaleEngineError(
        'SALE_NOT_FOUND',
        `No sale configured for item ${itemId}`,
      );
    }
    return config;
  }

  private assertTimeRange(startTime: number, endTime: number): void {
    if (!isTimestamp(startTime) || !isTimestamp(endTime) || startTime >= endTime) {
      throw new SaleEngineError(
        'INVALID_TIME_RANGE',
        'Start time must precede end time',
      );
    }
  }

  private assertInventory(itemId: number, required: number): void {
    const held = this.engine.heldBalance(itemId);
    if (held < required) {
      throw new SaleEngineError(
        'INSUFFICIENT_INVENTORY',
        `Engine holds ${held} of item ${itemId}, sale needs ${required}`,
      );
    }
  }
}
