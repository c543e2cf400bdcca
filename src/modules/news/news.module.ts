import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { FinnhubNewsService } from './providers/finnhub-news.service';
import { NewsPgRepository } from './repositories/news-pg.repository';
import { NewsCollectorService } from './news-collector.service';
import { NewsDatasetBuilder } from './news-dataset.builder';
import { LabelsModule } from '../labels/labels.module';

@Module({
  imports: [HttpModule, LabelsModule],
  providers: [FinnhubNewsService, NewsPgRepository, NewsCollectorService, NewsDatasetBuilder],
  exports: [NewsPgRepository, NewsCollectorService, NewsDatasetBuilder],
})
export class NewsModule {}
