import { Module, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { BullModule } from '@nestjs/bull';
import Redis from 'ioredis';

import { CommonModule } from './common/common.module';
import { DatabaseModule } from './database/database.module';
import { CalendarModule } from './modules/calendar/calendar.module';
import { RunLogModule } from './modules/run-log/run-log.module';
import { PipelineModule } from './modules/pipeline/pipeline.module';
import { HealthController } from './health.controller';

import configuration, { RedisSettings } from './config/configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ScheduleModule.forRoot(),
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const redisConfig = configService.get<RedisSettings>('redis');
        const logger = new Logger('BullModule');
        if (!redisConfig?.enabled) {
          logger.warn('Redis disabled - pipeline jobs will run inline');
        }
        const redisOptions = {
          host: redisConfig?.host || 'localhost',
          port: redisConfig?.port ?? 6379,
          password: redisConfig?.password,
          maxRetriesPerRequest: null,
          enableReadyCheck: false,
          lazyConnect: true,
          enableOfflineQueue: false,
          connectTimeout: 5000,
          retryStrategy: (times: number) => Math.min(times * 1000, 30000),
        };
        return {
          redis: redisOptions,
          createClient: () => {
            const client = new Redis(redisOptions);
            client.on('error', (err) => {
              logger.warn(`Bull Redis client error: ${err.message}`);
            });
            return client;
          },
        };
      },
    }),
    CommonModule,
    DatabaseModule,
    CalendarModule,
    RunLogModule,
    PipelineModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
