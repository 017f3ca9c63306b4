import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { engineConfig } from './engine.config.js';
import { purchaseConfig } from './purchase.config.js';
import { redisConfig } from './redis.config.js';
import { databaseConfig } from './database.config.js';

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [engineConfig, purchaseConfig, redisConfig, databaseConfig],
      envFilePath: ['.env', '../.env'],
    }),
  ],
})
export class ConfigModule {}
