import {
  BUYER_A,
  buyerCtx,
  createEngineFixture,
  ENGINE,
  EngineFixture,
  fundNative,
  nativeSale,
  openSale,
  ownerCtx,
} from '../../test/support/engine-fixture.js';
import { catchSaleError } from '../../test/support/sale-error.js';

describe('InventoryGuardService', () => {
  let fx: EngineFixture;

  beforeEach(() => {
    fx = createEngineFixture();
    openSale(fx, 7, nativeSale(), 15);
    fundNative(fx, BUYER_A, 6n);
    fx.purchases.purchase(buyerCtx(BUYER_A, 6n), 7, 3);
  });

  it('should allow withdrawing the surplus over unsold supply', () => {
    // held 12, unsold 7
    expect(() => fx.inventory.checkWithdrawable(7, 5)).not.toThrow();
  });

  it('should refuse to dip into inventory backing the active sale', () => {
    const error = catchSaleError(() => fx.inventory.checkWithdrawable(7, 6));

    expect(error.code).toBe('ACTIVE_SALE_INVENTORY_REQUIRED');
    expect(error.message).toBe(
      'Item 7: 7 units back the active sale, 12 held, 6 requested',
    );
  });

  it('should not constrain inactive or unconfigured items', () => {
    fx.admin.setSaleActive(ownerCtx(), 7, false);
    fx.assets.mint(ENGINE, 9, 1);

    expect(() => fx.inventory.checkWithdrawable(7, 12)).not.toThrow();
    expect(() => fx.inventory.checkWithdrawable(9, 1)).not.toThrow();
  });
});
