import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { Response } from 'express';

const BUYER_LOCAL = 'authenticatedBuyer';

export function setAuthenticatedBuyer(response: Response, buyer: string): void {
  response.locals[BUYER_LOCAL] = buyer;
}

/** Lower-cased address proven by BuyerSignatureGuard, if any. */
export function getAuthenticatedBuyer(response: Response): string | undefined {
  const buyer: unknown = response.locals[BUYER_LOCAL];
  return typeof buyer === 'string' ? buyer : undefined;
}

export const AuthenticatedBuyer = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string => {
    const buyer = getAuthenticatedBuyer(
      context.switchToHttp().getResponse<Response>(),
    );
    if (!buyer) {
      throw new UnauthorizedException('Request is not signed by a buyer');
    }
    return buyer;
  },
);
