import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bullmq';
import { InjectRepository } from '@nestjs/typeorm';
import type { Queue } from 'bullmq';
import { setTimeout as sleep } from 'node:timers/promises';
import { MoreThan, Repository } from 'typeorm';
import { engineConfig } from '../config/engine.config.js';
import { SALE_EVENTS_QUEUE } from '../events/constants.js';
import { decodeSaleEvent } from '../events/sale-event.decoder.js';
import { SaleEventRecord } from '../events/sale-event.entity.js';
import { SaleEventPublisher } from '../events/sale-event.publisher.js';
import { SaleStateReplayer } from './sale-state-replayer.js';

export type SaleEventLog = Pick<Repository<SaleEventRecord>, 'find'>;
export type PendingJobCounter = Pick<Queue, 'getJobCounts'>;
export type SequenceCursor = Pick<SaleEventPublisher, 'resumeAfter'>;

const REPLAY_PAGE_SIZE = 500;
const QUEUE_POLL_MS = 200;

/**
 * Rebuilds in-process state from the `sale_events` log before the HTTP
 * server starts taking requests. Events still waiting in the queue from a
 * previous run are persisted first, so the log is complete when it is read.
 * Assumes a single engine instance writes the log.
 */
@Injectable()
export class SaleEventReplayService implements OnApplicationBootstrap {
  private readonly logger = new Logger(SaleEventReplayService.name);

  constructor(
    @InjectRepository(SaleEventRecord)
    private readonly events: SaleEventLog,
    @InjectQueue(SALE_EVENTS_QUEUE)
    private readonly queue: PendingJobCounter,
    @Inject(SaleEventPublisher)
    private readonly publisher: SequenceCursor,
    private readonly replayer: SaleStateReplayer,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.replayOnBoot) {
      this.logger.warn('Replay on boot is disabled, starting from empty state');
      return;
    }
    await this.waitForQueue();
    const { applied, lastSequence } = await this.replay();
    this.publisher.resumeAfter(lastSequence);
    this.logger.log(`Replayed ${applied} sale event(s), last sequence ${lastSequence}`);
  }

  async replay(): Promise<{ applied: number; lastSequence: number }> {
    let applied = 0;
    let lastSequence = 0;

    for (;;) {
      const page = await this.events.find({
        where: { sequence: MoreThan(lastSequence) },
        order: { sequence: 'ASC' },
        take: REPLAY_PAGE_SIZE,
      });
      for (const record of page) {
        if (record.sequence !== lastSequence + 1) {
          this.logger.warn(
            `Event log skips from sequence ${lastSequence} to ${record.sequence}`,
          );
        }
        this.replayer.apply(decodeSaleEvent(record.type, record.payload));
        lastSequence = record.sequence;
        applied += 1;
      }
      if (page.length < REPLAY_PAGE_SIZE) {
        return { applied, lastSequence };
      }
    }
  }

  private async waitForQueue(): Promise<void> {
    const deadline = Date.now() + this.config.replayQueueTimeoutMs;
    for (;;) {
      const counts = await this.queue.getJobCounts('waiting', 'active', 'delayed');
      const pending =
        (counts['waiting'] ?? 0) + (counts['active'] ?? 0) + (counts['delayed'] ?? 0);
      if (pending === 0) {
        return;
      }
      if (Date.now() >= deadline) {
        throw new Error(
          `${pending} sale event(s) still queued after ${this.config.replayQueueTimeoutMs}ms, refusing to replay a partial log`,
        );
      }
      this.logger.log(`Waiting for ${pending} queued sale event(s) to persist`);
      await sleep(QUEUE_POLL_MS);
    }
  }
}
