import { ADMIN_GUARDS } from '../engine/entry-guards.js';
import { UINT128_MAX, UINT32_MAX } from '../engine/checked-math.js';
import type { SaleErrorCode } from '../engine/sale-engine.error.js';
import {
  createEngineFixture,
  ENGINE,
  EngineFixture,
  nativeSale,
  OWNER,
  ownerCtx,
} from '../../test/support/engine-fixture.js';
import { catchSaleError } from '../../test/support/sale-error.js';
import type { SaleParams } from './sale.types.js';

describe('SaleRegistryService', () => {
  let fx: EngineFixture;

  const configure = (itemId: number, params: SaleParams, verify = true) =>
    fx.engine.run(ownerCtx(), ADMIN_GUARDS, () =>
      fx.registry.configure(itemId, params, verify),
    );

  beforeEach(() => {
    fx = createEngineFixture();
    fx.assets.mint(ENGINE, 7, 10);
  });

  describe('configure', () => {
    it('should store a fresh active config at version 1', () => {
      const config = configure(7, nativeSale());

      expect(config).toEqual({
        ...nativeSale(),
        totalSold: 0,
        active: true,
        saleVersion: 1,
      });
      expect(fx.registry.isActive(7)).toBe(true);
      expect(fx.registry.activeItemIds()).toEqual([7]);
    });

    it.each<[string, number, SaleParams, SaleErrorCode]>([
      ['a negative item id', -1, nativeSale(), 'INVALID_ITEM'],
      ['a fractional item id', 1.5, nativeSale(), 'INVALID_ITEM'],
      ['a zero price', 7, nativeSale({ price: 0n }), 'INVALID_PRICE'],
      ['a price above 128 bits', 7, nativeSale({ price: UINT128_MAX + 1n }), 'INVALID_PRICE'],
      ['a zero supply', 7, nativeSale({ maxSupply: 0 }), 'INVALID_SUPPLY'],
      ['a supply above 32 bits', 7, nativeSale({ maxSupply: UINT32_MAX + 1 }), 'INVALID_SUPPLY'],
      ['a per-buyer cap above 32 bits', 7, nativeSale({ maxPerAddress: UINT32_MAX + 1 }), 'INVALID_SUPPLY'],
      ['an empty window', 7, nativeSale({ startTime: 200, endTime: 200 }), 'INVALID_TIME_RANGE'],
      ['a reversed window', 7, nativeSale({ startTime: 300, endTime: 200 }), 'INVALID_TIME_RANGE'],
      ['more supply than held', 7, nativeSale({ maxSupply: 11 }), 'INSUFFICIENT_INVENTORY'],
    ])('should reject %s', (_label, itemId, params, code) => {
      expect(catchSaleError(() => configure(itemId, params)).code).toBe(code);
      expect(fx.registry.get(7)).toBeUndefined();
    });

    it('should check the price before the supply', () => {
      const error = catchSaleError(() =>
        configure(7, nativeSale({ price: 0n, maxSupply: 0 })),
      );
      expect(error.code).toBe('INVALID_PRICE');
    });

    it('should skip the inventory check when not asked to verify', () => {
      const config = configure(8, nativeSale({ maxSupply: 50 }), false);
      expect(config.maxSupply).toBe(50);
    });

    it('should refuse to reconfigure an active sale', () => {
      configure(7, nativeSale());

      expect(catchSaleError(() => configure(7, nativeSale())).code).toBe(
        'SALE_MUST_BE_INACTIVE',
      );
    });

    it('should bump the version and reset sales on reconfiguration', () => {
      configure(7, nativeSale());
      fx.registry.addSold(7, 4);
      fx.registry.setActive(7, false);

      const config = configure(7, nativeSale({ maxSupply: 6 }));

      expect(config.saleVersion).toBe(2);
      expect(config.totalSold).toBe(0);
      expect(fx.registry.isActive(7)).toBe(true);
    });
  });

  describe('updateParams', () => {
    beforeEach(() => {
      configure(7, nativeSale());
    });

    it('should change price and extend the window only', () => {
      fx.registry.addSold(7, 2);

      const config = fx.registry.updateParams(7, 9n, 250);

      expect(config.price).toBe(9n);
      expect(config.endTime).toBe(250);
      expect(config.totalSold).toBe(2);
      expect(config.saleVersion).toBe(1);
      expect(config.active).toBe(true);
    });

    it('should reject a missing sale, a zero price and a shorter window', () => {
      expect(catchSaleError(() => fx.registry.updateParams(99, 1n, 300)).code).toBe(
        'SALE_NOT_FOUND',
      );
      expect(catchSaleError(() => fx.registry.updateParams(7, 0n, 300)).code).toBe(
        'INVALID_PRICE',
      );
      expect(catchSaleError(() => fx.registry.updateParams(7, 3n, 199)).code).toBe(
        'INVALID_TIME_RANGE',
      );
    });

    it('should accept keeping the same end time', () => {
      expect(fx.registry.updateParams(7, 3n, 200).endTime).toBe(200);
    });
  });

  describe('setActive', () => {
    beforeEach(() => {
      configure(7, nativeSale());
    });

    it('should remove the item from the index unconditionally', () => {
      fx.registry.setActive(7, false);

      expect(fx.registry.isActive(7)).toBe(false);
      expect(fx.registry.get(7)?.active).toBe(false);
    });

    it('should require inventory for the unsold supply on activation', () => {
      fx.registry.setActive(7, false);
      fx.registry.addSold(7, 3);
      fx.assets.safeTransferFrom(ENGINE, OWNER, 7, 4);

      expect(catchSaleError(() => fx.registry.setActive(7, true)).code).toBe(
        'INSUFFICIENT_INVENTORY',
      );

      fx.registry.restoreSold(7, 1, 4);
      expect(fx.registry.setActive(7, true).active).toBe(true);
    });

    it('should reject a missing sale', () => {
      expect(catchSaleError(() => fx.registry.setActive(3, true)).code).toBe(
        'SALE_NOT_FOUND',
      );
    });
  });

  describe('addSold', () => {
    beforeEach(() => {
      configure(7, nativeSale());
    });

    it('should return the previous total and refuse to pass max supply', () => {
      expect(fx.registry.addSold(7, 10)).toBe(0);
      expect(catchSaleError(() => fx.registry.addSold(7, 1)).code).toBe(
        'EXCEEDS_MAX_SUPPLY',
      );
      expect(fx.registry.get(7)?.totalSold).toBe(10);
    });

    it('should ignore a restore aimed at an older version', () => {
      fx.registry.addSold(7, 5);
      fx.registry.restoreSold(7, 0, 0);
      expect(fx.registry.get(7)?.totalSold).toBe(5);
    });
  });

  it('should hand out copies of its configs', () => {
    configure(7, nativeSale());
    const copy = fx.registry.require(7);
    copy.totalSold = 9;

    expect(fx.registry.get(7)?.totalSold).toBe(0);
  });

  it('should keep the index equal to the set of active configs', () => {
    fx.assets.mint(ENGINE, 8, 10);
    fx.assets.mint(ENGINE, 9, 10);
    configure(7, nativeSale());
    configure(8, nativeSale());
    configure(9, nativeSale());
    fx.registry.setActive(7, false);

    expect(fx.registry.activeItemIds().sort()).toEqual([8, 9]);
    expect(fx.registry.activeCount()).toBe(2);
    expect(fx.registry.activeItemIdsPage(1, 5)).toEqual([8]);
  });
});
