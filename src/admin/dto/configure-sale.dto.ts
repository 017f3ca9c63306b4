import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsEthereumAddress,
  IsInt,
  IsNumberString,
  IsOptional,
  Min,
} from 'class-validator';
import { toLowerCase } from '../../purchase/dto/create-purchase.dto.js';

export class ConfigureSaleDto {
  @IsInt()
  @Min(0)
  itemId!: number;

  /** Base units of the payment currency per item. */
  @IsNumberString({ no_symbols: true })
  price!: string;

  @IsInt()
  @Min(0)
  startTime!: number;

  @IsInt()
  @Min(0)
  endTime!: number;

  @IsInt()
  @Min(0)
  maxSupply!: number;

  /** 0 disables the per-buyer limit. */
  @IsInt()
  @Min(0)
  maxPerAddress!: number;

  /** Token address, or the zero address for the native currency. */
  @IsEthereumAddress()
  @Transform(toLowerCase)
  paymentToken!: string;

  @IsOptional()
  @IsBoolean()
  verifyInventory?: boolean;
}

export class UpdateSaleParamsDto {
  @IsNumberString({ no_symbols: true })
  price!: string;

  @IsInt()
  @Min(0)
  endTime!: number;
}

export class SetSaleActiveDto {
  @IsBoolean()
  active!: boolean;
}
