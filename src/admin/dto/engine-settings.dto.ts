import { Transform } from 'class-transformer';
import { IsBoolean, IsEthereumAddress } from 'class-validator';
import { toLowerCase } from '../../purchase/dto/create-purchase.dto.js';

export class AddressDto {
  @IsEthereumAddress()
  @Transform(toLowerCase)
  address!: string;
}

export class SetPausedDto {
  @IsBoolean()
  paused!: boolean;
}

export class EngineSettingsDto {
  owner!: string;
  assetLedger!: string | null;
  paymentRecipient!: string | null;
  paused!: boolean;
  initialized!: boolean;
}
