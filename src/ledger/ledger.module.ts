import { Global, Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { engineConfig } from '../config/engine.config.js';
import {
  InMemoryAssetLedger,
  InMemoryAssetLedgerDirectory,
} from './in-memory-asset-ledger.js';
import { InMemoryTokenLedger } from './in-memory-token-ledger.js';
import { InMemoryNativeLedger } from './in-memory-native-ledger.js';
import {
  ASSET_LEDGER_DIRECTORY,
  NATIVE_LEDGER,
  TOKEN_LEDGER,
} from './constants.js';

/**
 * Binds the collaborator ledgers. The in-process implementations stand in
 * for the host's ledgers; swapping a provider here is all a deployment needs.
 * Their balances are funded through the funding routes and rebuilt from the
 * event log on boot.
 */
@Global()
@Module({
  providers: [
    {
      provide: InMemoryAssetLedger,
      useFactory: (config: ConfigType<typeof engineConfig>) =>
        new InMemoryAssetLedger(config.assetLedger),
      inject: [engineConfig.KEY],
    },
    { provide: InMemoryTokenLedger, useFactory: () => new InMemoryTokenLedger() },
    { provide: InMemoryNativeLedger, useFactory: () => new InMemoryNativeLedger() },
    {
      provide: InMemoryAssetLedgerDirectory,
      useFactory: (ledger: InMemoryAssetLedger) =>
        new InMemoryAssetLedgerDirectory([ledger]),
      inject: [InMemoryAssetLedger],
    },
    { provide: ASSET_LEDGER_DIRECTORY, useExisting: InMemoryAssetLedgerDirectory },
    { provide: TOKEN_LEDGER, useExisting: InMemoryTokenLedger },
    { provide: NATIVE_LEDGER, useExisting: InMemoryNativeLedger },
  ],
  exports: [
    InMemoryAssetLedger,
    InMemoryTokenLedger,
    InMemoryNativeLedger,
    InMemoryAssetLedgerDirectory,
    ASSET_LEDGER_DIRECTORY,
    TOKEN_LEDGER,
    NATIVE_LEDGER,
  ],
})
export class LedgerModule {}
