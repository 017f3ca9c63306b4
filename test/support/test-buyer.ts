import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import {
  BUYER_ADDRESS_HEADER,
  BUYER_ISSUED_AT_HEADER,
  BUYER_NONCE_HEADER,
  BUYER_SIGNATURE_HEADER,
  buyerAuthMessage,
} from '../../src/common/guards/buyer-signature.guard.js';

let nonceCounter = 0;

/** A buyer with a signing key, producing the headers of a signed request. */
export class TestBuyer {
  private readonly account: PrivateKeyAccount;
  readonly address: string;

  constructor(privateKey: `0x${string}`) {
    this.account = privateKeyToAccount(privateKey);
    this.address = this.account.address.toLowerCase();
  }

  async headers(
    issuedAt = 150,
    nonce = `test-nonce-${++nonceCounter}`,
  ): Promise<Record<string, string>> {
    const signature = await this.account.signMessage({
      message: buyerAuthMessage(this.address, nonce, issuedAt),
    });
    return {
      [BUYER_ADDRESS_HEADER]: this.address,
      [BUYER_NONCE_HEADER]: nonce,
      [BUYER_ISSUED_AT_HEADER]: String(issuedAt),
      [BUYER_SIGNATURE_HEADER]: signature,
    };
  }
}

export const SIGNER_A = new TestBuyer(`0x${'1'.repeat(64)}`);
export const SIGNER_B = new TestBuyer(`0x${'2'.repeat(64)}`);
