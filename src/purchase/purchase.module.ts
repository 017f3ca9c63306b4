import { Module } from '@nestjs/common';
import { SaleModule } from '../sale/sale.module.js';
import { PaymentModule } from '../payment/payment.module.js';
import { BuyerRateLimitGuard } from '../common/guards/buyer-rate-limit.guard.js';
import { BuyerSignatureGuard } from '../common/guards/buyer-signature.guard.js';
import { PurchaseService } from './purchase.service.js';
import { PurchaseController } from './purchase.controller.js';
import { PurchaseLedgerService } from './purchase-ledger.service.js';
import { PurchaseValidatorService } from './purchase-validator.service.js';
import { BatchOrchestrator } from './batch-orchestrator.js';

@Module({
  imports: [SaleModule, PaymentModule],
  controllers: [PurchaseController],
  providers: [
    PurchaseService,
    PurchaseLedgerService,
    PurchaseValidatorService,
    BatchOrchestrator,
    BuyerSignatureGuard,
    BuyerRateLimitGuard,
  ],
  exports: [PurchaseService, PurchaseLedgerService, PurchaseValidatorService],
})
export class PurchaseModule {}
