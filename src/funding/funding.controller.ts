import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { ThrottlerGuard } from '@nestjs/throttler';
import { AuthenticatedBuyer } from '../common/decorators/authenticated-buyer.decorator.js';
import { AdminKeyGuard } from '../common/guards/admin-key.guard.js';
import { BuyerSignatureGuard } from '../common/guards/buyer-signature.guard.js';
import { engineConfig } from '../config/engine.config.js';
import type { Clock } from '../engine/clock.js';
import { CLOCK } from '../engine/constants.js';
import { EngineStateService } from '../engine/engine-state.service.js';
import type { CallContext } from '../engine/entry-guards.js';
import {
  AllowanceDto,
  ApproveDto,
  BalanceQueryDto,
  FundedBalanceDto,
  HolderBalancesDto,
  ItemMintDto,
  NativeDepositDto,
  TokenMintDto,
} from './dto/funding.dto.js';
import { FundingService } from './funding.service.js';

@Controller('api/funding')
@UseGuards(ThrottlerGuard)
export class FundingController {
  constructor(
    private readonly fundingService: FundingService,
    private readonly engine: EngineStateService,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Post('native-deposits')
  @UseGuards(AdminKeyGuard)
  @HttpCode(HttpStatus.CREATED)
  depositNative(@Body() dto: NativeDepositDto): FundedBalanceDto {
    const balance = this.fundingService.depositNative(
      this.context(this.config.owner),
      dto.to,
      BigInt(dto.amount),
    );
    return { holder: dto.to, balance: balance.toString() };
  }

  @Post('token-mints')
  @UseGuards(AdminKeyGuard)
  @HttpCode(HttpStatus.CREATED)
  mintTokens(@Body() dto: TokenMintDto): FundedBalanceDto {
    const balance = this.fundingService.mintTokens(
      this.context(this.config.owner),
      dto.token,
      dto.to,
      BigInt(dto.amount),
    );
    return { holder: dto.to, balance: balance.toString() };
  }

  @Post('item-mints')
  @UseGuards(AdminKeyGuard)
  @HttpCode(HttpStatus.CREATED)
  mintItems(@Body() dto: ItemMintDto): FundedBalanceDto {
    const balance = this.fundingService.mintItems(
      this.context(this.config.owner),
      dto.to,
      dto.itemId,
      dto.amount,
    );
    return { holder: dto.to, balance: balance.toString() };
  }

  /** Signed by the buyer whose tokens the engine may then spend. */
  @Put('allowances/:token')
  @UseGuards(BuyerSignatureGuard)
  approve(
    @Param('token') token: string,
    @Body() dto: ApproveDto,
    @AuthenticatedBuyer() buyer: string,
  ): AllowanceDto {
    const amount = this.fundingService.approve(
      this.context(buyer),
      token.toLowerCase(),
      BigInt(dto.amount),
    );
    return {
      token: token.toLowerCase(),
      owner: buyer,
      spender: this.engine.address,
      amount: amount.toString(),
    };
  }

  @Get('balances/:holder')
  balances(
    @Param('holder') holder: string,
    @Query() query: BalanceQueryDto,
  ): HolderBalancesDto {
    const balances = this.fundingService.balances(
      holder.toLowerCase(),
      query.token,
      query.itemId,
    );
    return {
      holder: balances.holder,
      native: balances.native.toString(),
      token: balances.token && {
        token: balances.token.token,
        balance: balances.token.balance.toString(),
        allowance: balances.token.allowance.toString(),
      },
      item: balances.item,
    };
  }

  private context(caller: string): CallContext {
    return { caller, value: 0n, now: this.clock.now() };
  }
}
