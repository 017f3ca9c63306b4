import { Transform, Type } from 'class-transformer';
import {
  IsEthereumAddress,
  IsInt,
  IsNumberString,
  IsOptional,
  Min,
} from 'class-validator';
import { toLowerCase } from '../../purchase/dto/create-purchase.dto.js';

export class NativeDepositDto {
  @IsEthereumAddress()
  @Transform(toLowerCase)
  to!: string;

  @IsNumberString({ no_symbols: true })
  amount!: string;
}

export class TokenMintDto {
  @IsEthereumAddress()
  @Transform(toLowerCase)
  token!: string;

  @IsEthereumAddress()
  @Transform(toLowerCase)
  to!: string;

  @IsNumberString({ no_symbols: true })
  amount!: string;
}

export class ItemMintDto {
  @IsEthereumAddress()
  @Transform(toLowerCase)
  to!: string;

  @IsInt()
  @Min(0)
  itemId!: number;

  @IsInt()
  @Min(1)
  amount!: number;
}

export class ApproveDto {
  @IsNumberString({ no_symbols: true })
  amount!: string;
}

export class BalanceQueryDto {
  @IsOptional()
  @IsEthereumAddress()
  @Transform(toLowerCase)
  token?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  itemId?: number;
}

export class FundedBalanceDto {
  holder!: string;
  balance!: string;
}

export class AllowanceDto {
  token!: string;
  owner!: string;
  spender!: string;
  amount!: string;
}

export class HolderBalancesDto {
  holder!: string;
  native!: string;
  token!: { token: string; balance: string; allowance: string } | null;
  item!: { ledger: string; itemId: number; balance: number } | null;
}
