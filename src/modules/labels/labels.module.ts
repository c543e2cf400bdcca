import { Module } from '@nestjs/common';
import { PricesModule } from '../prices/prices.module';
import { LabelsPgRepository } from './repositories/labels-pg.repository';
import { LabelGeneratorService } from './label-generator.service';

@Module({
  imports: [PricesModule],
  providers: [LabelsPgRepository, LabelGeneratorService],
  exports: [LabelsPgRepository, LabelGeneratorService],
})
export class LabelsModule {}
