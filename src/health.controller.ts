import { Controller, Get, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { DatabaseService } from './database/database.service';
import { errorMessage } from './common/errors/pipeline.errors';
import { RedisSettings } from './config/configuration';

type ServiceState = 'unknown' | 'healthy' | 'unhealthy' | 'disabled';

@Controller('health')
export class HealthController implements OnModuleDestroy {
  private redis: Redis | null = null;
  private readonly redisEnabled: boolean;

  constructor(
    private readonly db: DatabaseService,
    private readonly configService: ConfigService,
  ) {
    const redisConfig = this.configService.get<RedisSettings>('redis');
    this.redisEnabled = Boolean(redisConfig?.enabled);
    if (this.redisEnabled) {
      this.redis = new Redis({
        host: redisConfig?.host || 'localhost',
        port: redisConfig?.port || 6379,
        password: redisConfig?.password,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        lazyConnect: true,
        connectTimeout: 5000,
      });
      // connection failures surface through ping() below
      this.redis.on('error', () => null);
    }
  }

  @Get()
  async check() {
    const services: Record<'database' | 'redis', ServiceState> = {
      database: 'unknown',
      redis: this.redisEnabled ? 'unknown' : 'disabled',
    };
    const checks = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: this.configService.get<string>('nodeEnv', 'development'),
      services,
    };

    try {
      await this.db.query('SELECT 1');
      checks.services.database = 'healthy';
    } catch {
      checks.services.database = 'unhealthy';
      checks.status = 'degraded';
    }

    if (this.redisEnabled && this.redis) {
      try {
        await this.redis.ping();
        checks.services.redis = 'healthy';
      } catch {
        checks.services.redis = 'unhealthy';
        checks.status = 'degraded';
      }
    }

    return checks;
  }

  @Get('live')
  live() {
    return { status: 'ok' };
  }

  @Get('ready')
  async ready() {
    try {
      await this.db.query('SELECT 1');
      if (this.redisEnabled && this.redis) {
        await this.redis.ping();
      }
      return { status: 'ready' };
    } catch (error) {
      return { status: 'not_ready', error: errorMessage(error) };
    }
  }

  onModuleDestroy() {
    this.redis?.disconnect();
  }
}
