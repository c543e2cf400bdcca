import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bull';
import { PipelineRunnerModule } from './pipeline-runner.module';
import { PipelineController } from './pipeline.controller';
import { PipelineService } from './pipeline.service';
import { PipelineProcessor } from './pipeline.processor';
import { PipelineScheduler } from './pipeline.scheduler';
import { PIPELINE_QUEUE } from './pipeline.constants';

@Module({
  imports: [
    BullModule.registerQueue({
      name: PIPELINE_QUEUE,
    }),
    PipelineRunnerModule,
  ],
  controllers: [PipelineController],
  providers: [PipelineService, PipelineProcessor, PipelineScheduler],
  exports: [PipelineService],
})
export class PipelineModule {}
