import { NATIVE_CURRENCY } from '../engine/constants.js';
import {
  BUYER_A,
  buyerCtx,
  createEngineFixture,
  ENGINE,
  EngineFixture,
  fundToken,
  RECIPIENT,
  TOKEN_T,
  TOKEN_U,
} from '../../test/support/engine-fixture.js';
import { catchSaleError } from '../../test/support/sale-error.js';

describe('PaymentSettlementService', () => {
  let fx: EngineFixture;

  beforeEach(() => {
    fx = createEngineFixture();
  });

  describe('assertTender', () => {
    it('should return the excess over the native total', () => {
      expect(fx.payments.assertTender(buyerCtx(BUYER_A, 10n), 6n)).toBe(4n);
      expect(fx.payments.assertTender(buyerCtx(BUYER_A, 6n), 6n)).toBe(0n);
    });

    it('should reject a short tender', () => {
      const error = catchSaleError(() =>
        fx.payments.assertTender(buyerCtx(BUYER_A, 5n), 6n),
      );
      expect(error.code).toBe('INSUFFICIENT_PAYMENT');
      expect(error.getStatus()).toBe(402);
    });

    it('should reject native currency sent for a token-only purchase', () => {
      expect(
        catchSaleError(() => fx.payments.assertTender(buyerCtx(BUYER_A, 1n), 0n)).code,
      ).toBe('INVALID_PAYMENT');
      expect(fx.payments.assertTender(buyerCtx(BUYER_A), 0n)).toBe(0n);
    });
  });

  describe('settle', () => {
    it('should forward the native cost and refund the excess', () => {
      fx.native.deposit(BUYER_A, 10n);
      const receipt = fx.engine.run(buyerCtx(BUYER_A, 10n), [], () =>
        fx.payments.settle(buyerCtx(BUYER_A, 10n), NATIVE_CURRENCY, 6n, RECIPIENT),
      );

      expect(receipt).toEqual({ nativePaid: 6n, refunded: 4n, tokenTransfers: [] });
      expect(fx.native.balanceOf(RECIPIENT)).toBe(6n);
      expect(fx.native.balanceOf(BUYER_A)).toBe(4n);
      expect(fx.native.balanceOf(ENGINE)).toBe(0n);
    });

    it('should pull exactly the token amount from the buyer', () => {
      fundToken(fx, TOKEN_T, BUYER_A, 50n);
      const receipt = fx.engine.run(buyerCtx(BUYER_A), [], () =>
        fx.payments.settle(buyerCtx(BUYER_A), TOKEN_T, 30n, RECIPIENT),
      );

      expect(receipt.tokenTransfers).toEqual([{ token: TOKEN_T, amount: 30n }]);
      expect(fx.tokens.balanceOf(TOKEN_T, RECIPIENT)).toBe(30n);
      expect(fx.tokens.balanceOf(TOKEN_T, BUYER_A)).toBe(20n);
      expect(fx.tokens.allowance(TOKEN_T, BUYER_A, ENGINE)).toBe(20n);
    });
  });

  describe('settleAll', () => {
    it('should pull tokens in charge order and move native once', () => {
      fundToken(fx, TOKEN_T, BUYER_A, 100n);
      fundToken(fx, TOKEN_U, BUYER_A, 100n);
      fx.native.deposit(BUYER_A, 20n);
      const transferFrom = jest.spyOn(fx.tokens, 'transferFrom');
      const nativeTransfer = jest.spyOn(fx.native, 'transfer');
      const ctx = buyerCtx(BUYER_A, 20n);

      fx.engine.run(ctx, [], () =>
        fx.payments.settleAll(
          ctx,
          {
            native: 12n,
            tokens: [
              { token: TOKEN_U, amount: 7n },
              { token: TOKEN_T, amount: 5n },
            ],
          },
          RECIPIENT,
        ),
      );

      expect(transferFrom.mock.calls).toEqual([
        [TOKEN_U, ENGINE, BUYER_A, RECIPIENT, 7n],
        [TOKEN_T, ENGINE, BUYER_A, RECIPIENT, 5n],
      ]);
      expect(nativeTransfer.mock.calls).toEqual([
        [BUYER_A, ENGINE, 20n],
        [ENGINE, RECIPIENT, 12n],
        [ENGINE, BUYER_A, 8n],
      ]);
    });

    it('should fail the request when an allowance is short', () => {
      fx.tokens.mint(TOKEN_T, BUYER_A, 50n);
      fx.tokens.approve(TOKEN_T, BUYER_A, ENGINE, 10n);

      const error = catchSaleError(() =>
        fx.engine.run(buyerCtx(BUYER_A), [], () =>
          fx.payments.settle(buyerCtx(BUYER_A), TOKEN_T, 30n, RECIPIENT),
        ),
      );

      expect(error.code).toBe('TRANSFER_FAILED');
      expect(fx.tokens.balanceOf(TOKEN_T, BUYER_A)).toBe(50n);
    });
  });
});
