import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import type { Request, Response } from 'express';
import { getAddress, isAddress, isHex, verifyMessage } from 'viem';
import { purchaseConfig } from '../../config/purchase.config.js';
import type { Clock } from '../../engine/clock.js';
import { CLOCK } from '../../engine/constants.js';
import { REDIS_CLIENT } from '../../redis/constants.js';
import { setAuthenticatedBuyer } from '../decorators/authenticated-buyer.decorator.js';

export const BUYER_ADDRESS_HEADER = 'x-buyer-address';
export const BUYER_NONCE_HEADER = 'x-buyer-nonce';
export const BUYER_ISSUED_AT_HEADER = 'x-buyer-issued-at';
export const BUYER_SIGNATURE_HEADER = 'x-buyer-signature';

const NONCE_KEY_PREFIX = 'sale:nonce:';
const NONCE_PATTERN = /^[A-Za-z0-9_-]{8,64}$/;

/** EIP-191 message a buyer signs to authorize one request. */
export function buyerAuthMessage(
  buyer: string,
  nonce: string,
  issuedAt: number,
): string {
  return [
    'Allotment sale buyer request',
    `Buyer: ${buyer.toLowerCase()}`,
    `Nonce: ${nonce}`,
    `Issued At: ${issuedAt}`,
  ].join('\n');
}

export interface NonceStore {
  set(
    key: string,
    value: string,
    secondsToken: 'EX',
    seconds: number,
    nx: 'NX',
  ): Promise<'OK' | null>;
}

/**
 * Authenticates the buyer of a request by an EIP-191 signature over a
 * single-use nonce. Nonces are claimed in Redis with SET NX, so a captured
 * signature cannot be replayed.
 */
@Injectable()
export class BuyerSignatureGuard implements CanActivate {
  private readonly logger = new Logger(BuyerSignatureGuard.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly nonces: NonceStore,
    @Inject(purchaseConfig.KEY)
    private readonly config: ConfigType<typeof purchaseConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const buyer = request.header(BUYER_ADDRESS_HEADER)?.toLowerCase() ?? '';
    const nonce = request.header(BUYER_NONCE_HEADER) ?? '';
    const issuedAt = Number(request.header(BUYER_ISSUED_AT_HEADER));
    const signature = request.header(BUYER_SIGNATURE_HEADER);

    if (!isAddress(buyer)) {
      throw new UnauthorizedException('Missing or malformed buyer address');
    }
    if (!NONCE_PATTERN.test(nonce)) {
      throw new UnauthorizedException('Missing or malformed request nonce');
    }
    if (!Number.isSafeInteger(issuedAt)) {
      throw new UnauthorizedException('Missing or malformed issue time');
    }
    const ttl = this.config.signatureTtlSeconds;
    if (Math.abs(this.clock.now() - issuedAt) > ttl) {
      throw new UnauthorizedException('Buyer signature has expired');
    }
    if (!isHex(signature)) {
      throw new UnauthorizedException('Missing or malformed buyer signature');
    }

    const valid = await this.verify(buyer, nonce, issuedAt, signature);
    if (!valid) {
      this.logger.warn(`Rejected signature for ${buyer} on ${request.url}`);
      throw new UnauthorizedException('Invalid buyer signature');
    }

    let claimed: 'OK' | null;
    try {
      claimed = await this.nonces.set(
        `${NONCE_KEY_PREFIX}${buyer}:${nonce}`,
        '1',
        'EX',
        ttl * 2,
        'NX',
      );
    } catch (error) {
      this.logger.error(
        `Nonce store unavailable: ${error instanceof Error ? error.message : error}`,
      );
      throw new ServiceUnavailableException('Cannot verify request nonce');
    }
    if (claimed !== 'OK') {
      throw new UnauthorizedException('Request nonce was already used');
    }

    setAuthenticatedBuyer(http.getResponse<Response>(), buyer);
    return true;
  }

  private async verify(
    buyer: string,
    nonce: string,
    issuedAt: number,
    signature: `0x${string}`,
  ): Promise<boolean> {
    try {
      return await verifyMessage({
        address: getAddress(buyer),
        message: buyerAuthMessage(buyer, nonce, issuedAt),
        signature,
      });
    } catch (error) {
      this.logger.debug(
        `Signature check failed for ${buyer}: ${error instanceof Error ? error.message : error}`,
      );
      return false;
    }
  }
}
