import { Module } from '@nestjs/common';
import { PurchaseModule } from '../purchase/purchase.module.js';
import { SaleModule } from '../sale/sale.module.js';
import { SaleEventReplayService } from './sale-event-replay.service.js';
import { SaleStateReplayer } from './sale-state-replayer.js';

@Module({
  imports: [SaleModule, PurchaseModule],
  providers: [SaleStateReplayer, SaleEventReplayService],
})
export class RecoveryModule {}
