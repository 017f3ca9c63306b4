export enum SaleStatus {
  INACTIVE = 'inactive',
  UPCOMING = 'upcoming',
  LIVE = 'live',
  SOLD_OUT = 'sold_out',
  ENDED = 'ended',
}

export class SaleSnapshotDto {
  itemId!: number;
  status!: SaleStatus;
  price!: string;
  paymentToken!: string;
  startTime!: number;
  endTime!: number;
  maxSupply!: number;
  maxPerAddress!: number;
  totalSold!: number;
  remainingSupply!: number;
  active!: boolean;
  saleVersion!: number;
}

export class ActiveSalesPageDto {
  total!: number;
  offset!: number;
  limit!: number;
  sales!: SaleSnapshotDto[];
}

export class SaleActiveDto {
  itemId!: number;
  active!: boolean;
}

export class RemainingSupplyDto {
  itemId!: number;
  remainingSupply!: number;
  heldBalance!: number;
}
