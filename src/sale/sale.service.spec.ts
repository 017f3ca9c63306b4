import {
  BUYER_A,
  buyerCtx,
  createEngineFixture,
  EngineFixture,
  fundNative,
  nativeSale,
  openSale,
  ownerCtx,
} from '../../test/support/engine-fixture.js';
import { catchSaleError } from '../../test/support/sale-error.js';
import { SaleStatus } from './dto/sale-status.dto.js';
import { saleStatusAt } from './sale.service.js';
import type { SaleConfig } from './sale.types.js';

describe('SaleService', () => {
  let fx: EngineFixture;

  beforeEach(() => {
    fx = createEngineFixture();
  });

  describe('saleStatusAt', () => {
    const config: SaleConfig = {
      ...nativeSale(),
      totalSold: 0,
      active: true,
      saleVersion: 1,
    };

    it.each<[number, Partial<SaleConfig>, SaleStatus]>([
      [150, { active: false }, SaleStatus.INACTIVE],
      [99, {}, SaleStatus.UPCOMING],
      [100, {}, SaleStatus.LIVE],
      [200, {}, SaleStatus.LIVE],
      [201, {}, SaleStatus.ENDED],
      [150, { totalSold: 10 }, SaleStatus.SOLD_OUT],
    ])('at %i with %o should be %s', (now, overrides, status) => {
      expect(saleStatusAt({ ...config, ...overrides }, now)).toBe(status);
    });
  });

  it('should render a snapshot with amounts as strings', () => {
    openSale(fx, 7, nativeSale());
    fundNative(fx, BUYER_A, 4n);
    fx.purchases.purchase(buyerCtx(BUYER_A, 4n), 7, 2);

    expect(fx.sales.saleSnapshot(7)).toEqual({
      itemId: 7,
      status: SaleStatus.LIVE,
      price: '2',
      paymentToken: '0x0000000000000000000000000000000000000000',
      startTime: 100,
      endTime: 200,
      maxSupply: 10,
      maxPerAddress: 3,
      totalSold: 2,
      remainingSupply: 8,
      active: true,
      saleVersion: 1,
    });
    expect(fx.sales.remainingSupply(7)).toEqual({
      itemId: 7,
      remainingSupply: 8,
      heldBalance: 8,
    });
  });

  it('should report missing sales as not found', () => {
    expect(catchSaleError(() => fx.sales.saleSnapshot(3)).code).toBe('SALE_NOT_FOUND');
    expect(fx.sales.isActive(3)).toEqual({ itemId: 3, active: false });
  });

  it('should list only live items', () => {
    openSale(fx, 1, nativeSale());
    openSale(fx, 2, nativeSale({ startTime: 160, endTime: 300 }));
    openSale(fx, 3, nativeSale({ maxSupply: 1, maxPerAddress: 0 }));
    fundNative(fx, BUYER_A, 2n);
    fx.purchases.purchase(buyerCtx(BUYER_A, 2n), 3, 1);

    expect(fx.sales.activeItems()).toEqual([1, 2, 3]);
    expect(fx.sales.liveItems()).toEqual([1]);
  });

  it('should page active sales and cap the page size', () => {
    openSale(fx, 1, nativeSale());
    openSale(fx, 2, nativeSale());
    openSale(fx, 3, nativeSale());
    fx.admin.setSaleActive(ownerCtx(), 1, false);

    const page = fx.sales.activeSalesPage(1, 500);

    expect(page.total).toBe(2);
    expect(page.limit).toBe(100);
    expect(page.sales.map((sale) => sale.itemId)).toEqual([2]);
  });
});
