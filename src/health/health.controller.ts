import { Controller, Get, Inject, Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { DataSource } from 'typeorm';
import { EngineStateService } from '../engine/engine-state.service.js';
import { REDIS_CLIENT } from '../redis/constants.js';
import { SaleRegistryService } from '../sale/sale-registry.service.js';

export type RedisPing = Pick<Redis, 'ping'>;
export type SqlRunner = Pick<DataSource, 'query'>;

interface HealthStatus {
  status: 'ok' | 'degraded' | 'down';
  timestamp: string;
  engine: EngineHealth;
  services: {
    redis: ServiceStatus;
    database: ServiceStatus;
  };
}

interface EngineHealth {
  initialized: boolean;
  paused: boolean;
  activeSales: number;
}

interface ServiceStatus {
  status: 'up' | 'down';
  latencyMs?: number;
  error?: string;
}

@Controller('api/health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: RedisPing,
    @Inject(DataSource) private readonly dataSource: SqlRunner,
    private readonly engine: EngineStateService,
    private readonly registry: SaleRegistryService,
  ) {}

  @Get()
  async check(): Promise<HealthStatus> {
    const [redisStatus, dbStatus] = await Promise.all([
      this.checkRedis(),
      this.checkDatabase(),
    ]);

    const allUp = redisStatus.status === 'up' && dbStatus.status === 'up';
    const allDown = redisStatus.status === 'down' && dbStatus.status === 'down';

    const engine = this.engine.status();

    return {
      status: allUp ? 'ok' : allDown ? 'down' : 'degraded',
      timestamp: new Date().toISOString(),
      engine: {
        initialized: engine.initialized,
        paused: engine.paused,
        activeSales: this.registry.activeCount(),
      },
      services: {
        redis: redisStatus,
        database: dbStatus,
      },
    };
  }

  private async checkRedis(): Promise<ServiceStatus> {
    const start = Date.now();
    try {
      await this.redis.ping();
      return { status: 'up', latencyMs: Date.now() - start };
    } catch (error) {
      this.logger.warn(
        `Redis health check failed: ${error instanceof Error ? error.message : error}`,
      );
      return {
        status: 'down',
        latencyMs: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  private async checkDatabase(): Promise<ServiceStatus> {
    const start = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'up', latencyMs: Date.now() - start };
    } catch (error) {
      this.logger.warn(
        `Database health check failed: ${error instanceof Error ? error.message : error}`,
      );
      return {
        status: 'down',
        latencyMs: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
