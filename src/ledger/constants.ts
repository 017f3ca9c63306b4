/** Injection tokens for the collaborator ledgers. */
export const NATIVE_LEDGER = 'NATIVE_LEDGER';
export const TOKEN_LEDGER = 'TOKEN_LEDGER';
export const ASSET_LEDGER_DIRECTORY = 'ASSET_LEDGER_DIRECTORY';
