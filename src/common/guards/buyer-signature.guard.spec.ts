import { ServiceUnavailableException, UnauthorizedException } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host.js';
import { purchaseConfig } from '../../config/purchase.config.js';
import { FixedClock } from '../../../test/support/engine-fixture.js';
import { InProcessRedis } from '../../../test/support/in-process-redis.js';
import { SIGNER_A, SIGNER_B } from '../../../test/support/test-buyer.js';
import {
  BUYER_ADDRESS_HEADER,
  BUYER_SIGNATURE_HEADER,
  BuyerSignatureGuard,
  NonceStore,
} from './buyer-signature.guard.js';

interface HttpPair {
  context: ExecutionContextHost;
  locals: Record<string, unknown>;
}

function signedContext(headers: Record<string, string>): HttpPair {
  const locals: Record<string, unknown> = {};
  const request = {
    url: '/api/purchases',
    header: (name: string): string | undefined => headers[name.toLowerCase()],
  };
  return { context: new ExecutionContextHost([request, { locals }]), locals };
}

describe('BuyerSignatureGuard', () => {
  const config: ConfigType<typeof purchaseConfig> = {
    maxAttemptsPerBuyer: 30,
    attemptWindowSeconds: 60,
    signatureTtlSeconds: 300,
  };
  let clock: FixedClock;
  let nonces: InProcessRedis;
  let guard: BuyerSignatureGuard;

  beforeEach(() => {
    clock = new FixedClock(150);
    nonces = new InProcessRedis();
    guard = new BuyerSignatureGuard(nonces, config, clock);
  });

  it('should attach the signing buyer to the response', async () => {
    const { context, locals } = signedContext(await SIGNER_A.headers(150, 'nonce-0001'));

    await expect(guard.canActivate(context)).resolves.toBe(true);

    expect(locals['authenticatedBuyer']).toBe(SIGNER_A.address);
  });

  it('should refuse a request claiming another buyer', async () => {
    const headers = await SIGNER_B.headers(150, 'nonce-0002');
    const { context, locals } = signedContext({
      ...headers,
      [BUYER_ADDRESS_HEADER]: SIGNER_A.address,
    });

    await expect(guard.canActivate(context)).rejects.toThrow('Invalid buyer signature');
    expect(locals['authenticatedBuyer']).toBeUndefined();
  });

  it('should refuse an unsigned request', async () => {
    const { context } = signedContext({ [BUYER_ADDRESS_HEADER]: SIGNER_A.address });

    await expect(guard.canActivate(context)).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
  });

  it('should refuse a replayed nonce', async () => {
    const headers = await SIGNER_A.headers(150, 'nonce-0003');

    await guard.canActivate(signedContext(headers).context);

    await expect(guard.canActivate(signedContext(headers).context)).rejects.toThrow(
      'Request nonce was already used',
    );
  });

  it('should refuse a signature issued outside the accepted window', async () => {
    const headers = await SIGNER_A.headers(150 - 301, 'nonce-0004');

    await expect(guard.canActivate(signedContext(headers).context)).rejects.toThrow(
      'Buyer signature has expired',
    );
  });

  it('should refuse a garbled signature', async () => {
    const headers = await SIGNER_A.headers(150, 'nonce-0005');
    const { context } = signedContext({
      ...headers,
      [BUYER_SIGNATURE_HEADER]: `0x${'ab'.repeat(65)}`,
    });

    await expect(guard.canActivate(context)).rejects.toThrow('Invalid buyer signature');
  });

  it('should fail closed when the nonce store is down', async () => {
    const broken: NonceStore = {
      set: jest.fn().mockRejectedValue(new Error('ECONNREFUSED')),
    };
    guard = new BuyerSignatureGuard(broken, config, clock);

    await expect(
      guard.canActivate(signedContext(await SIGNER_A.headers(150, 'nonce-0006')).context),
    ).rejects.toBeInstanceOf(ServiceUnavailableException);
  });
});
