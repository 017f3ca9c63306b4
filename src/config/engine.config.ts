import { registerAs } from '@nestjs/config';

export const engineConfig = registerAs('engine', () => ({
  address: (
    process.env['ENGINE_ADDRESS'] || '0x00000000000000000000000000000000000000e0'
  ).toLowerCase(),
  owner: (
    process.env['OWNER_ADDRESS'] || '0x00000000000000000000000000000000000000a1'
  ).toLowerCase(),
  paymentRecipient: (process.env['PAYMENT_RECIPIENT'] || '').toLowerCase(),
  assetLedger: (
    process.env['ASSET_LEDGER_ADDRESS'] ||
    '0x0000000000000000000000000000000000000a55'
  ).toLowerCase(),
  adminApiKey: process.env['ADMIN_API_KEY'] || '',
  replayOnBoot: process.env['ENGINE_REPLAY_ON_BOOT'] !== 'false',
  replayQueueTimeoutMs: parseInt(
    process.env['ENGINE_REPLAY_QUEUE_TIMEOUT_MS'] || '30000',
    10,
  ),
}));

export type EngineConfig = ReturnType<typeof engineConfig>;
