import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import type { Request } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { engineConfig } from '../../config/engine.config.js';

export const ADMIN_KEY_HEADER = 'x-admin-key';

/**
 * Admits administrator requests carrying the configured API key. With no key
 * configured every request is refused.
 */
@Injectable()
export class AdminKeyGuard implements CanActivate {
  private readonly logger = new Logger(AdminKeyGuard.name);

  constructor(
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const presented = request.header(ADMIN_KEY_HEADER) ?? '';
    const expected = this.config.adminApiKey;

    if (!expected || !this.matches(presented, expected)) {
      this.logger.warn(`Rejected admin request to ${request.url}`);
      throw new UnauthorizedException('Invalid or missing admin key');
    }
    return true;
  }

  private matches(presented: string, expected: string): boolean {
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
  }
}
