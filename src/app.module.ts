import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { ThrottlerModule } from '@nestjs/throttler';
import { ConfigService } from '@nestjs/config';
import { ConfigModule } from './config/config.module.js';
import { LedgerModule } from './ledger/ledger.module.js';
import { EngineModule } from './engine/engine.module.js';
import { EventsModule } from './events/events.module.js';
import { RedisModule } from './redis/redis.module.js';
import { SaleModule } from './sale/sale.module.js';
import { PaymentModule } from './payment/payment.module.js';
import { PurchaseModule } from './purchase/purchase.module.js';
import { InventoryModule } from './inventory/inventory.module.js';
import { AdminModule } from './admin/admin.module.js';
import { HealthModule } from './health/health.module.js';
import { FundingModule } from './funding/funding.module.js';
import { RecoveryModule } from './recovery/recovery.module.js';
import { SaleEventRecord } from './events/sale-event.entity.js';

@Module({
  imports: [
    // Configuration (loads .env, makes config globally available)
    ConfigModule,

    // Rate limiting (per-IP throttling)
    ThrottlerModule.forRoot([
      {
        name: 'short',
        ttl: 1000,   // 1 second window
        limit: 10,   // 10 requests per second per IP
      },
      {
        name: 'medium',
        ttl: 10000,  // 10 second window
        limit: 50,   // 50 requests per 10 seconds per IP
      },
    ]),

    // Event log (PostgreSQL via TypeORM)
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        url: configService.get<string>('database.url'),
        entities: [SaleEventRecord],
        synchronize: configService.get<string>('NODE_ENV') !== 'production',
        logging: false,
      }),
      inject: [ConfigService],
    }),

    // Event queue (BullMQ backed by Redis)
    BullModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('redis.host'),
          port: configService.get<number>('redis.port'),
          password: configService.get<string>('redis.password') || undefined,
          maxRetriesPerRequest: null,
        },
      }),
      inject: [ConfigService],
    }),

    // Engine and collaborators
    LedgerModule,
    EngineModule,
    EventsModule,
    RedisModule,

    // Domain modules
    SaleModule,
    PaymentModule,
    PurchaseModule,
    InventoryModule,
    AdminModule,
    FundingModule,
    HealthModule,

    // Rebuilds state from the event log before serving
    RecoveryModule,
  ],
})
export class AppModule {}
