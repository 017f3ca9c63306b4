import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import type { Repository } from 'typeorm';
import type { Job } from 'bullmq';
import { SaleEventRecord } from './sale-event.entity.js';
import { SALE_EVENTS_QUEUE } from './constants.js';
import type { SaleEventJobData } from './sale-event.publisher.js';

export type SaleEventRepository = Pick<
  Repository<SaleEventRecord>,
  'create' | 'save'
>;

@Processor(SALE_EVENTS_QUEUE)
export class SaleEventsProcessor extends WorkerHost {
  private readonly logger = new Logger(SaleEventsProcessor.name);

  constructor(
    @InjectRepository(SaleEventRecord)
    private readonly eventRepository: SaleEventRepository,
  ) {
    super();
  }

  async process(job: Job<SaleEventJobData>): Promise<void> {
    this.logger.debug(
      `Processing ${job.data.type} ${job.data.eventId} (attempt ${job.attemptsMade + 1})`,
    );
    await this.persist(job.data);
  }

  async persist(data: SaleEventJobData): Promise<void> {
    try {
      const record = this.eventRepository.create({
        id: data.eventId,
        sequence: data.sequence,
        type: data.type,
        itemId: data.itemId,
        payload: data.payload,
        occurredAt: new Date(data.occurredAt),
      });

      await this.eventRepository.save(record);

      this.logger.log(`Event ${data.type} ${data.eventId} persisted`);
    } catch (error: unknown) {
      // A retried job may find its row already written
      const isUniqueViolation =
        error instanceof Error &&
        'code' in error &&
        error.code === '23505';

      if (isUniqueViolation) {
        this.logger.warn(
          `Event ${data.eventId} already persisted, skipping`,
        );
        return;
      }

      this.logger.error(
        `Failed to persist event ${data.eventId}: ${error instanceof Error ? error.message : error}`,
      );
      throw error; // BullMQ retries
    }
  }
}
