import { Module } from '@nestjs/common';
import { PricesModule } from '../prices/prices.module';
import { LabelsModule } from '../labels/labels.module';
import { TechnicalIndicators } from './indicators/technical-indicators';
import { SequenceGenerator } from './sequence-generator';
import { FeaturesService } from './features.service';

@Module({
  imports: [PricesModule, LabelsModule],
  providers: [TechnicalIndicators, SequenceGenerator, FeaturesService],
  exports: [FeaturesService],
})
export class FeaturesModule {}
