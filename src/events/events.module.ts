import { Global, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SALE_EVENT_SINK } from '../engine/constants.js';
import { SALE_EVENTS_QUEUE } from './constants.js';
import { SaleEventRecord } from './sale-event.entity.js';
import { SaleEventPublisher } from './sale-event.publisher.js';
import { SaleEventsProcessor } from './sale-events.processor.js';

@Global()
@Module({
  imports: [
    TypeOrmModule.forFeature([SaleEventRecord]),
    BullModule.registerQueue({ name: SALE_EVENTS_QUEUE }),
  ],
  providers: [
    SaleEventPublisher,
    { provide: SALE_EVENT_SINK, useExisting: SaleEventPublisher },
    SaleEventsProcessor,
  ],
  exports: [SALE_EVENT_SINK, SaleEventPublisher, TypeOrmModule, BullModule],
})
export class EventsModule {}
