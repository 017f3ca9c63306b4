import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { SaleService } from './sale.service.js';
import { ActivePageQueryDto } from './dto/active-page-query.dto.js';
import {
  ActiveSalesPageDto,
  RemainingSupplyDto,
  SaleActiveDto,
  SaleSnapshotDto,
} from './dto/sale-status.dto.js';

@Controller('api/sales')
export class SaleController {
  constructor(private readonly saleService: SaleService) {}

  @Get('active')
  getActive(): number[] {
    return this.saleService.activeItems();
  }

  @Get('active/page')
  getActivePage(@Query() query: ActivePageQueryDto): ActiveSalesPageDto {
    return this.saleService.activeSalesPage(query.offset, query.limit);
  }

  @Get('live')
  getLive(): number[] {
    return this.saleService.liveItems();
  }

  @Get(':itemId')
  getSale(@Param('itemId', ParseIntPipe) itemId: number): SaleSnapshotDto {
    return this.saleService.saleSnapshot(itemId);
  }

  @Get(':itemId/active')
  getActiveFlag(@Param('itemId', ParseIntPipe) itemId: number): SaleActiveDto {
    return this.saleService.isActive(itemId);
  }

  @Get(':itemId/remaining')
  getRemaining(
    @Param('itemId', ParseIntPipe) itemId: number,
  ): RemainingSupplyDto {
    return this.saleService.remainingSupply(itemId);
  }
}
