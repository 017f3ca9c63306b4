import { Transform } from 'class-transformer';
import {
  IsEthereumAddress,
  IsInt,
  IsNumberString,
  IsOptional,
  Min,
} from 'class-validator';

export const toLowerCase = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.toLowerCase() : value;

export class CreatePurchaseDto {
  @IsEthereumAddress()
  @Transform(toLowerCase)
  buyer!: string;

  @IsInt()
  @Min(0)
  itemId!: number;

  @IsInt()
  @Min(0)
  quantity!: number;

  /** Native amount tendered, in base units. */
  @IsOptional()
  @IsNumberString({ no_symbols: true })
  value?: string;
}
