import { Module } from '@nestjs/common';
import { PricesModule } from '../prices/prices.module';
import { NewsModule } from '../news/news.module';
import { PriceValidatorService } from './price-validator.service';
import { NewsValidatorService } from './news-validator.service';

@Module({
  imports: [PricesModule, NewsModule],
  providers: [PriceValidatorService, NewsValidatorService],
  exports: [PriceValidatorService, NewsValidatorService],
})
export class ValidationModule {}
