import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { PolygonPricesService } from './providers/polygon-prices.service';
import { PricesPgRepository } from './repositories/prices-pg.repository';
import { PriceCollectorService } from './price-collector.service';

@Module({
  imports: [HttpModule],
  providers: [PolygonPricesService, PricesPgRepository, PriceCollectorService],
  exports: [PricesPgRepository, PriceCollectorService],
})
export class PricesModule {}
