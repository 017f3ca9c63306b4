import { IsArray, IsInt, Min } from 'class-validator';

export class WithdrawItemsDto {
  @IsArray()
  @IsInt({ each: true })
  @Min(0, { each: true })
  itemIds!: number[];

  @IsArray()
  @IsInt({ each: true })
  @Min(0, { each: true })
  amounts!: number[];
}

export class ItemWithdrawalDto {
  to!: string;
  itemIds!: number[];
  amounts!: number[];
}

export class BalanceWithdrawalDto {
  token!: string;
  to!: string;
  amount!: string;
}
