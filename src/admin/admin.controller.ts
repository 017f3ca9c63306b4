import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { AdminKeyGuard } from '../common/guards/admin-key.guard.js';
import { engineConfig } from '../config/engine.config.js';
import type { Clock } from '../engine/clock.js';
import { CLOCK } from '../engine/constants.js';
import { EngineStateService } from '../engine/engine-state.service.js';
import type { CallContext } from '../engine/entry-guards.js';
import { SaleSnapshotDto } from '../sale/dto/sale-status.dto.js';
import { SaleService } from '../sale/sale.service.js';
import { AdminService, BalanceWithdrawal } from './admin.service.js';
import {
  ConfigureSaleDto,
  SetSaleActiveDto,
  UpdateSaleParamsDto,
} from './dto/configure-sale.dto.js';
import {
  AddressDto,
  EngineSettingsDto,
  SetPausedDto,
} from './dto/engine-settings.dto.js';
import {
  BalanceWithdrawalDto,
  ItemWithdrawalDto,
  WithdrawItemsDto,
} from './dto/withdraw-items.dto.js';

function toBalanceWithdrawalDto(
  withdrawal: BalanceWithdrawal,
): BalanceWithdrawalDto {
  return { ...withdrawal, amount: withdrawal.amount.toString() };
}

/** Administrator routes. The admin key maps every call to the engine owner. */
@Controller('api/admin')
@UseGuards(AdminKeyGuard)
export class AdminController {
  constructor(
    private readonly adminService: AdminService,
    private readonly saleService: SaleService,
    private readonly engine: EngineStateService,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Post('sales')
  @HttpCode(HttpStatus.CREATED)
  configureSale(@Body() dto: ConfigureSaleDto): SaleSnapshotDto {
    this.adminService.configureSale(
      this.context(),
      dto.itemId,
      {
        price: BigInt(dto.price),
        startTime: dto.startTime,
        endTime: dto.endTime,
        maxSupply: dto.maxSupply,
        maxPerAddress: dto.maxPerAddress,
        paymentToken: dto.paymentToken,
      },
      dto.verifyInventory ?? true,
    );
    return this.saleService.saleSnapshot(dto.itemId);
  }

  @Patch('sales/:itemId')
  updateSaleParams(
    @Param('itemId', ParseIntPipe) itemId: number,
    @Body() dto: UpdateSaleParamsDto,
  ): SaleSnapshotDto {
    this.adminService.updateSaleParams(
      this.context(),
      itemId,
      BigInt(dto.price),
      dto.endTime,
    );
    return this.saleService.saleSnapshot(itemId);
  }

  @Put('sales/:itemId/active')
  setSaleActive(
    @Param('itemId', ParseIntPipe) itemId: number,
    @Body() dto: SetSaleActiveDto,
  ): SaleSnapshotDto {
    this.adminService.setSaleActive(this.context(), itemId, dto.active);
    return this.saleService.saleSnapshot(itemId);
  }

  @Put('asset-ledger')
  setAssetLedger(@Body() dto: AddressDto): EngineSettingsDto {
    this.adminService.setAssetLedger(this.context(), dto.address);
    return this.settings();
  }

  @Put('payment-recipient')
  setPaymentRecipient(@Body() dto: AddressDto): EngineSettingsDto {
    this.adminService.setPaymentRecipient(this.context(), dto.address);
    return this.settings();
  }

  @Put('paused')
  setPaused(@Body() dto: SetPausedDto): EngineSettingsDto {
    this.adminService.setPaused(this.context(), dto.paused);
    return this.settings();
  }

  @Post('withdrawals/items')
  @HttpCode(HttpStatus.OK)
  withdrawItems(@Body() dto: WithdrawItemsDto): ItemWithdrawalDto {
    return this.adminService.withdrawItems(
      this.context(),
      dto.itemIds,
      dto.amounts,
    );
  }

  @Post('withdrawals/native')
  @HttpCode(HttpStatus.OK)
  withdrawNative(): BalanceWithdrawalDto {
    return toBalanceWithdrawalDto(
      this.adminService.withdrawNativeBalance(this.context()),
    );
  }

  @Post('withdrawals/tokens/:token')
  @HttpCode(HttpStatus.OK)
  withdrawToken(@Param('token') token: string): BalanceWithdrawalDto {
    return toBalanceWithdrawalDto(
      this.adminService.withdrawTokenBalance(this.context(), token.toLowerCase()),
    );
  }

  private context(): CallContext {
    return { caller: this.config.owner, value: 0n, now: this.clock.now() };
  }

  private settings(): EngineSettingsDto {
    const status = this.engine.status();
    return {
      owner: status.owner,
      assetLedger: this.engine.assetLedgerAddress(),
      paymentRecipient: this.engine.paymentRecipientAddress(),
      paused: status.paused,
      initialized: status.initialized,
    };
  }
}
