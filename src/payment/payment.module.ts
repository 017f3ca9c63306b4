import { Module } from '@nestjs/common';
import { PaymentSettlementService } from './payment-settlement.service.js';

@Module({
  providers: [PaymentSettlementService],
  exports: [PaymentSettlementService],
})
export class PaymentModule {}
