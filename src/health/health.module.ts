import { Module } from '@nestjs/common';
import { SaleModule } from '../sale/sale.module.js';
import { HealthController } from './health.controller.js';

@Module({
  imports: [SaleModule],
  controllers: [HealthController],
})
export class HealthModule {}
