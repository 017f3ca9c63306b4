import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import type { Queue } from 'bullmq';
import { v4 as uuidv4 } from 'uuid';
import { SALE_EVENTS_QUEUE } from './constants.js';
import {
  encodeSaleEvent,
  EncodedPayload,
  SaleEvent,
  SaleEventSink,
  SaleEventType,
} from './sale-event.types.js';

export interface SaleEventJobData {
  eventId: string;
  /** Commit order across the whole log; replay follows it. */
  sequence: number;
  type: SaleEventType;
  itemId: number | null;
  occurredAt: string;
  payload: EncodedPayload;
}

export type SaleEventQueue = Pick<Queue<SaleEventJobData>, 'addBulk'>;

type SaleEventJobs = Parameters<SaleEventQueue['addBulk']>[0];

/**
 * Hands committed events to the `sale-events` queue for persistence.
 * Enqueueing happens off the request path; pending enqueues are drained on
 * shutdown. Each event gets the next sequence number, continuing from the
 * last one in the log once replay has run.
 */
@Injectable()
export class SaleEventPublisher implements SaleEventSink, OnModuleDestroy {
  private readonly logger = new Logger(SaleEventPublisher.name);
  private readonly pending = new Set<Promise<void>>();
  private sequence = 0;

  constructor(
    @InjectQueue(SALE_EVENTS_QUEUE)
    private readonly queue: SaleEventQueue,
  ) {}

  publish(events: readonly SaleEvent[]): void {
    if (events.length === 0) {
      return;
    }
    const occurredAt = new Date().toISOString();
    const jobs: SaleEventJobs = events.map((event) => ({
      name: event.type,
      data: {
        eventId: uuidv4(),
        sequence: ++this.sequence,
        type: event.type,
        itemId: 'itemId' in event ? event.itemId : null,
        occurredAt,
        payload: encodeSaleEvent(event),
      },
      opts: {
        attempts: 5,
        backoff: { type: 'exponential', delay: 1000 },
        removeOnComplete: 100,
        removeOnFail: 50,
      },
    }));

    const job: Promise<void> = this.enqueue(jobs).finally(() => {
      this.pending.delete(job);
    });
    this.pending.add(job);
  }

  /** Continues numbering after the last event already in the log. */
  resumeAfter(sequence: number): void {
    this.sequence = Math.max(this.sequence, sequence);
  }

  get lastSequence(): number {
    return this.sequence;
  }

  /** Resolves once every enqueue started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  async onModuleDestroy(): Promise<void> {
    await this.drain();
  }

  private async enqueue(jobs: SaleEventJobs): Promise<void> {
    try {
      await this.queue.addBulk(jobs);
    } catch (error) {
      this.logger.error(
        `Failed to enqueue ${jobs.length} sale event(s) [${jobs
          .map((job) => job.name)
          .join(', ')}]: ${error instanceof Error ? error.message : error}`,
      );
    }
  }
}
