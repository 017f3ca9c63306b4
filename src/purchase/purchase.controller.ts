import {
  Body,
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { Throttle, ThrottlerGuard } from '@nestjs/throttler';
import { AuthenticatedBuyer } from '../common/decorators/authenticated-buyer.decorator.js';
import { BuyerRateLimitGuard } from '../common/guards/buyer-rate-limit.guard.js';
import { BuyerSignatureGuard } from '../common/guards/buyer-signature.guard.js';
import type { Clock } from '../engine/clock.js';
import { CLOCK } from '../engine/constants.js';
import type { CallContext } from '../engine/entry-guards.js';
import { PurchaseService } from './purchase.service.js';
import { BatchPurchaseDto } from './dto/batch-purchase.dto.js';
import { CreatePurchaseDto } from './dto/create-purchase.dto.js';
import {
  BuyerStatusDto,
  PurchaseReceiptDto,
  toReceiptDto,
} from './dto/purchase-receipt.dto.js';

@Controller('api/purchases')
@UseGuards(ThrottlerGuard)
export class PurchaseController {
  constructor(
    private readonly purchaseService: PurchaseService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Post()
  @UseGuards(BuyerSignatureGuard, BuyerRateLimitGuard)
  @Throttle({ short: { ttl: 1000, limit: 3 }, medium: { ttl: 10000, limit: 10 } })
  @HttpCode(HttpStatus.CREATED)
  purchase(
    @Body() dto: CreatePurchaseDto,
    @AuthenticatedBuyer() buyer: string,
  ): PurchaseReceiptDto {
    const receipt = this.purchaseService.purchase(
      this.context(buyer, dto.buyer, dto.value),
      dto.itemId,
      dto.quantity,
    );
    return toReceiptDto(receipt);
  }

  @Post('batch')
  @UseGuards(BuyerSignatureGuard, BuyerRateLimitGuard)
  @Throttle({ short: { ttl: 1000, limit: 3 }, medium: { ttl: 10000, limit: 10 } })
  @HttpCode(HttpStatus.CREATED)
  purchaseBatch(
    @Body() dto: BatchPurchaseDto,
    @AuthenticatedBuyer() buyer: string,
  ): PurchaseReceiptDto {
    const receipt = this.purchaseService.purchaseBatch(
      this.context(buyer, dto.buyer, dto.value),
      dto.itemIds,
      dto.quantities,
    );
    return toReceiptDto(receipt);
  }

  @Post('batch/aggregated')
  @UseGuards(BuyerSignatureGuard, BuyerRateLimitGuard)
  @Throttle({ short: { ttl: 1000, limit: 3 }, medium: { ttl: 10000, limit: 10 } })
  @HttpCode(HttpStatus.CREATED)
  purchaseBatchAggregated(
    @Body() dto: BatchPurchaseDto,
    @AuthenticatedBuyer() buyer: string,
  ): PurchaseReceiptDto {
    const receipt = this.purchaseService.purchaseBatchAggregated(
      this.context(buyer, dto.buyer, dto.value),
      dto.itemIds,
      dto.quantities,
    );
    return toReceiptDto(receipt);
  }

  @Get(':itemId/:buyer')
  getStatus(
    @Param('itemId', ParseIntPipe) itemId: number,
    @Param('buyer') buyer: string,
  ): BuyerStatusDto {
    return this.purchaseService.getBuyerStatus(
      itemId,
      buyer.toLowerCase(),
      this.clock.now(),
    );
  }

  /** The signed buyer is the caller; a body `buyer` must name the same address. */
  private context(
    signedBuyer: string,
    claimedBuyer: string,
    value?: string,
  ): CallContext {
    if (claimedBuyer !== signedBuyer) {
      throw new ForbiddenException(
        `Request is signed by ${signedBuyer}, not ${claimedBuyer}`,
      );
    }
    return {
      caller: signedBuyer,
      value: BigInt(value ?? '0'),
      now: this.clock.now(),
    };
  }
}
