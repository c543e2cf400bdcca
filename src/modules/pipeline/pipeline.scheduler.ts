import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { errorMessage } from '../../common/errors/pipeline.errors';
import { MARKET_TIME_ZONE } from '../calendar/standardization';
import { PipelineService } from './pipeline.service';

@Injectable()
export class PipelineScheduler {
  private readonly logger = new Logger(PipelineScheduler.name);
  private readonly enabled: boolean;

  constructor(
    private readonly pipelineService: PipelineService,
    configService: ConfigService,
  ) {
    this.enabled = configService.get<boolean>('scheduleEnabled', true);
  }

  // Weekdays, half an hour after the close. Labels follow collection within one job.
  @Cron('30 16 * * 1-5', { name: 'daily-collection', timeZone: MARKET_TIME_ZONE })
  async dailyCollection(): Promise<void> {
    if (!this.enabled) {
      return;
    }

    this.logger.log('Starting scheduled collection');
    try {
      await this.pipelineService.dispatch('collect-and-label');
    } catch (error) {
      this.logger.error(`Scheduled collection failed: ${errorMessage(error)}`);
    }
  }
}
