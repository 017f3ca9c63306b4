import { Transform } from 'class-transformer';
import {
  IsArray,
  IsEthereumAddress,
  IsInt,
  IsNumberString,
  IsOptional,
  Min,
} from 'class-validator';
import { toLowerCase } from './create-purchase.dto.js';

export class BatchPurchaseDto {
  @IsEthereumAddress()
  @Transform(toLowerCase)
  buyer!: string;

  @IsArray()
  @IsInt({ each: true })
  @Min(0, { each: true })
  itemIds!: number[];

  @IsArray()
  @IsInt({ each: true })
  @Min(0, { each: true })
  quantities!: number[];

  @IsOptional()
  @IsNumberString({ no_symbols: true })
  value?: string;
}
