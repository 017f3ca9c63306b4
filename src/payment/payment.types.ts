export interface TokenCharge {
  token: string;
  amount: bigint;
}

/** Everything a request owes: one native total plus token transfers in order. */
export interface PaymentCharges {
  native: bigint;
  tokens: TokenCharge[];
}

export interface SettlementReceipt {
  nativePaid: bigint;
  refunded: bigint;
  tokenTransfers: TokenCharge[];
}
