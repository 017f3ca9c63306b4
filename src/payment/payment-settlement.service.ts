import { Injectable } from '@nestjs/common';
import { EngineStateService } from '../engine/engine-state.service.js';
import { NATIVE_CURRENCY } from '../engine/constants.js';
import type { CallContext } from '../engine/entry-guards.js';
import { SaleEngineError } from '../engine/sale-engine.error.js';
import type {
  PaymentCharges,
  SettlementReceipt,
} from './payment.types.js';

/**
 * Moves the currency side of a purchase. The tendered native value is
 * escrowed into the engine's account once the tender has been checked;
 * whatever is not forwarded is refunded within the same request.
 */
@Injectable()
export class PaymentSettlementService {
  constructor(private readonly engine: EngineStateService) {}

  /** Single charge: native "pay and refund the excess", or exact token pull. */
  settle(
    ctx: CallContext,
    paymentToken: string,
    amount: bigint,
    recipient: string,
  ): SettlementReceipt {
    const charges: PaymentCharges =
      paymentToken === NATIVE_CURRENCY
        ? { native: amount, tokens: [] }
        : { native: 0n, tokens: [{ token: paymentToken, amount }] };
    return this.settleAll(ctx, charges, recipient);
  }

  settleAll(
    ctx: CallContext,
    charges: PaymentCharges,
    recipient: string,
  ): SettlementReceipt {
    const refund = this.assertTender(ctx, charges.native);
    this.engine.collectTender();

    for (const charge of charges.tokens) {
      this.engine.tokens.transferFrom(
        charge.token,
        this.engine.address,
        ctx.caller,
        recipient,
        charge.amount,
      );
    }
    if (charges.native > 0n) {
      this.engine.native.transfer(this.engine.address, recipient, charges.native);
    }
    if (refund > 0n) {
      this.engine.native.transfer(this.engine.address, ctx.caller, refund);
    }

    return {
      nativePaid: charges.native,
      refunded: refund,
      tokenTransfers: charges.tokens,
    };
  }

  /**
   * Checks the tendered native value against what is owed in native
   * currency and returns the excess to refund.
   */
  assertTender(ctx: CallContext, nativeDue: bigint): bigint {
    if (nativeDue === 0n) {
      if (ctx.value > 0n) {
        throw new SaleEngineError(
          'INVALID_PAYMENT',
          'Native currency sent for a token-denominated purchase',
        );
      }
      return 0n;
    }
    if (ctx.value < nativeDue) {
      throw new SaleEngineError(
        'INSUFFICIENT_PAYMENT',
        `Sent ${ctx.value}, required ${nativeDue}`,
      );
    }
    return ctx.value - nativeDue;
  }
}
