export interface SaleConfig {
  /** Units of the payment currency per item. */
  price: bigint;
  startTime: number;
  endTime: number;
  maxSupply: number;
  /** 0 means no per-buyer limit. */
  maxPerAddress: number;
  totalSold: number;
  /** Token address, or NATIVE_CURRENCY. */
  paymentToken: string;
  active: boolean;
  saleVersion: number;
}

export type SaleParams = Pick<
  SaleConfig,
  | 'price'
  | 'startTime'
  | 'endTime'
  | 'maxSupply'
  | 'maxPerAddress'
  | 'paymentToken'
>;
