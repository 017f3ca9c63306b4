import { Module } from '@nestjs/common';
import { SaleModule } from '../sale/sale.module.js';
import { InventoryGuardService } from './inventory-guard.service.js';

@Module({
  imports: [SaleModule],
  providers: [InventoryGuardService],
  exports: [InventoryGuardService],
})
export class InventoryModule {}
