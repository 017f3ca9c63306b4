import { Module } from '@nestjs/common';
import { AdminKeyGuard } from '../common/guards/admin-key.guard.js';
import { BuyerSignatureGuard } from '../common/guards/buyer-signature.guard.js';
import { FundingController } from './funding.controller.js';
import { FundingService } from './funding.service.js';

@Module({
  controllers: [FundingController],
  providers: [FundingService, AdminKeyGuard, BuyerSignatureGuard],
  exports: [FundingService],
})
export class FundingModule {}
