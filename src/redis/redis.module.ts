import { Global, Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import Redis from 'ioredis';
import { redisConfig } from '../config/redis.config.js';
import { REDIS_CLIENT } from './constants.js';

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: (config: ConfigType<typeof redisConfig>) => {
        return new Redis({
          host: config.host,
          port: config.port,
          password: config.password,
          enableReadyCheck: true,
          lazyConnect: false,
          connectTimeout: 5000,
          retryStrategy: (times: number) => {
            if (times > 10) return null;
            return Math.min(times * 200, 5000);
          },
        });
      },
      inject: [redisConfig.KEY],
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisModule.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async onApplicationShutdown(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.warn(
        `Redis shutdown failed: ${error instanceof Error ? error.message : error}`,
      );
    }
  }
}
