import { Module } from '@nestjs/common';
import { PricesModule } from '../prices/prices.module';
import { NewsModule } from '../news/news.module';
import { LabelsModule } from '../labels/labels.module';
import { DatasetModule } from '../dataset/dataset.module';
import { FeaturesModule } from '../features/features.module';
import { ValidationModule } from '../validation/validation.module';
import { PipelineRunner } from './pipeline-runner.service';

/** Pipeline steps without the queue, schedule or HTTP surface. */
@Module({
  imports: [PricesModule, NewsModule, LabelsModule, DatasetModule, FeaturesModule, ValidationModule],
  providers: [PipelineRunner],
  exports: [PipelineRunner, NewsModule, FeaturesModule, ValidationModule],
})
export class PipelineRunnerModule {}
