import { Inject, Injectable } from '@nestjs/common';
import type { Clock } from '../engine/clock.js';
import { CLOCK } from '../engine/constants.js';
import { EngineStateService } from '../engine/engine-state.service.js';
import { SaleRegistryService } from './sale-registry.service.js';
import type { SaleConfig } from './sale.types.js';
import { MAX_PAGE_SIZE } from './dto/active-page-query.dto.js';
import {
  ActiveSalesPageDto,
  RemainingSupplyDto,
  SaleActiveDto,
  SaleSnapshotDto,
  SaleStatus,
} from './dto/sale-status.dto.js';

export function saleStatusAt(config: SaleConfig, now: number): SaleStatus {
  if (!config.active) {
    return SaleStatus.INACTIVE;
  }
  if (now < config.startTime) {
    return SaleStatus.UPCOMING;
  }
  if (now > config.endTime) {
    return SaleStatus.ENDED;
  }
  if (config.totalSold >= config.maxSupply) {
    return SaleStatus.SOLD_OUT;
  }
  return SaleStatus.LIVE;
}

/** Read-only views over the registry for the public sale routes. */
@Injectable()
export class SaleService {
  constructor(
    private readonly registry: SaleRegistryService,
    private readonly engine: EngineStateService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  activeItems(): number[] {
    return this.registry.activeItemIds();
  }

  activeSalesPage(offset: number, limit: number): ActiveSalesPageDto {
    const size = Math.min(Math.max(limit, 0), MAX_PAGE_SIZE);
    const now = this.clock.now();
    return {
      total: this.registry.activeCount(),
      offset,
      limit: size,
      sales: this.registry
        .activeItemIdsPage(offset, size)
        .map((itemId) => this.toSnapshot(itemId, this.registry.require(itemId), now)),
    };
  }

  /** Active items inside their window with supply left. */
  liveItems(): number[] {
    const now = this.clock.now();
    return this.registry.activeItemIds().filter((itemId) => {
      const config = this.registry.get(itemId);
      return config !== undefined && saleStatusAt(config, now) === SaleStatus.LIVE;
    });
  }

  saleSnapshot(itemId: number): SaleSnapshotDto {
    return this.toSnapshot(itemId, this.registry.require(itemId), this.clock.now());
  }

  isActive(itemId: number): SaleActiveDto {
    return { itemId, active: this.registry.isActive(itemId) };
  }

  remainingSupply(itemId: number): RemainingSupplyDto {
    const config = this.registry.require(itemId);
    const heldBalance = this.engine.assetLedgerAddress()
      ? this.engine.heldBalance(itemId)
      : 0;
    return {
      itemId,
      remainingSupply: config.maxSupply - config.totalSold,
      heldBalance,
    };
  }

  private toSnapshot(
    itemId: number,
    config: SaleConfig,
    now: number,
  ): SaleSnapshotDto {
    return {
      itemId,
      status: saleStatusAt(config, now),
      price: config.price.toString(),
      paymentToken: config.paymentToken,
      startTime: config.startTime,
      endTime: config.endTime,
      maxSupply: config.maxSupply,
      maxPerAddress: config.maxPerAddress,
      totalSold: config.totalSold,
      remainingSupply: config.maxSupply - config.totalSold,
      active: config.active,
      saleVersion: config.saleVersion,
    };
  }
}
