import { registerAs } from '@nestjs/config';

export const purchaseConfig = registerAs('purchase', () => ({
  maxAttemptsPerBuyer: parseInt(process.env['BUYER_MAX_ATTEMPTS'] || '30', 10),
  attemptWindowSeconds: parseInt(
    process.env['BUYER_ATTEMPT_WINDOW_SECONDS'] || '60',
    10,
  ),
  // Accepted clock skew of a signed buyer request, in seconds
  signatureTtlSeconds: parseInt(
    process.env['BUYER_SIGNATURE_TTL_SECONDS'] || '300',
    10,
  ),
}));

export type PurchaseConfig = ReturnType<typeof purchaseConfig>;
