import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Logger,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import type { Response } from 'express';
import type Redis from 'ioredis';
import { purchaseConfig } from '../../config/purchase.config.js';
import { REDIS_CLIENT } from '../../redis/constants.js';
import { getAuthenticatedBuyer } from '../decorators/authenticated-buyer.decorator.js';

const BUYER_ATTEMPT_KEY_PREFIX = 'sale:attempts:';

export type AttemptCounter = Pick<Redis, 'incr' | 'expire'>;

/**
 * Caps purchase attempts per authenticated buyer within a rolling window.
 * Runs after BuyerSignatureGuard. Uses Redis INCR with TTL for atomic
 * counting.
 */
@Injectable()
export class BuyerRateLimitGuard implements CanActivate {
  private readonly logger = new Logger(BuyerRateLimitGuard.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: AttemptCounter,
    @Inject(purchaseConfig.KEY)
    private readonly config: ConfigType<typeof purchaseConfig>,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const buyer = getAuthenticatedBuyer(
      context.switchToHttp().getResponse<Response>(),
    );
    if (!buyer) {
      return true; // Unsigned routes are throttled per IP only
    }

    const key = `${BUYER_ATTEMPT_KEY_PREFIX}${buyer}`;
    const limit = this.config.maxAttemptsPerBuyer;

    let attempts: number;
    try {
      attempts = await this.redis.incr(key);
      if (attempts === 1) {
        await this.redis.expire(key, this.config.attemptWindowSeconds);
      }
    } catch (error) {
      // Redis down: fail open
      this.logger.error(
        `Buyer rate limit check failed: ${error instanceof Error ? error.message : error}`,
      );
      return true;
    }

    if (attempts > limit) {
      this.logger.warn(
        `Buyer ${buyer} exceeded purchase attempt limit (${attempts}/${limit})`,
      );
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          message: `Too many purchase attempts. Maximum ${limit} per ${this.config.attemptWindowSeconds}s.`,
          error: 'Too Many Requests',
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }
    return true;
  }
}
