import { Module } from '@nestjs/common';
import { SaleService } from './sale.service.js';
import { SaleController } from './sale.controller.js';
import { SaleRegistryService } from './sale-registry.service.js';

@Module({
  controllers: [SaleController],
  providers: [SaleRegistryService, SaleService],
  exports: [SaleRegistryService, SaleService],
})
export class SaleModule {}
