import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from './common/common.module';
import { DatabaseModule } from './database/database.module';
import { CalendarModule } from './modules/calendar/calendar.module';
import { RunLogModule } from './modules/run-log/run-log.module';
import { PipelineRunnerModule } from './modules/pipeline/pipeline-runner.module';
import configuration from './config/configuration';

/** Application context for one-shot command-line runs: no queue worker, no cron. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    CommonModule,
    DatabaseModule,
    CalendarModule,
    RunLogModule,
    PipelineRunnerModule,
  ],
})
export class CliModule {}
