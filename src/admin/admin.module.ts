import { Module } from '@nestjs/common';
import { SaleModule } from '../sale/sale.module.js';
import { InventoryModule } from '../inventory/inventory.module.js';
import { AdminKeyGuard } from '../common/guards/admin-key.guard.js';
import { AdminService } from './admin.service.js';
import { AdminController } from './admin.controller.js';

@Module({
  imports: [SaleModule, InventoryModule],
  controllers: [AdminController],
  providers: [AdminService, AdminKeyGuard],
  exports: [AdminService],
})
export class AdminModule {}
