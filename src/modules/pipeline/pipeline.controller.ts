import { Body, Controller, Get, HttpCode, Param, Post, Query, UseFilters } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PipelineExceptionFilter } from '../../common/filters/pipeline-exception.filter';
import { PipelineConfig } from '../../config/configuration';
import { FeaturesService } from '../features/features.service';
import { NewsDatasetBuilder } from '../news/news-dataset.builder';
import { RunLogService } from '../run-log/run-log.service';
import { NewsValidatorService } from '../validation/news-validator.service';
import { PriceValidatorService } from '../validation/price-validator.service';
import { CollectDto, TickersDto } from './dto/collect.dto';
import { NewsDatasetQueryDto, RunsQueryDto, SequencesQueryDto } from './dto/query.dto';
import { SplitDto } from './dto/split.dto';
import { PipelineRunner } from './pipeline-runner.service';
import { PipelineService } from './pipeline.service';

@Controller('pipeline')
@UseFilters(PipelineExceptionFilter)
export class PipelineController {
  private readonly config: PipelineConfig;

  constructor(
    private readonly pipelineService: PipelineService,
    private readonly runner: PipelineRunner,
    private readonly priceValidator: PriceValidatorService,
    private readonly newsValidator: NewsValidatorService,
    private readonly features: FeaturesService,
    private readonly newsDataset: NewsDatasetBuilder,
    private readonly runLog: RunLogService,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<PipelineConfig>('pipeline');
  }

  /**
   * Collect daily bars. Queued when Redis is available, otherwise the
   * collection result is returned directly.
   */
  @Post('prices/collect')
  @HttpCode(202)
  collectPrices(@Body() dto: CollectDto) {
    return this.pipelineService.dispatch('collect-prices', dto);
  }

  @Post('news/collect')
  @HttpCode(202)
  collectNews(@Body() dto: CollectDto) {
    return this.pipelineService.dispatch('collect-news', dto);
  }

  @Post('labels')
  @HttpCode(202)
  generateLabels(@Body() dto: TickersDto) {
    return this.pipelineService.dispatch('generate-labels', dto);
  }

  /** Runs immediately so custom ratios can be applied. */
  @Post('split')
  buildSplit(@Body() dto: SplitDto) {
    const defaults = this.config.dataset.ratios;
    return this.runner.buildSplit({
      train: dto.train ?? defaults.train,
      val: dto.val ?? defaults.val,
      test: dto.test ?? defaults.test,
    });
  }

  @Get('split/:key')
  loadSplit(@Param('key') key: string) {
    return this.runner.loadSplit(key);
  }

  @Get('validate/prices')
  validatePrices(@Query() query: TickersDto) {
    return this.priceValidator.validate(query.tickers ?? this.config.tickers);
  }

  @Get('validate/news')
  validateNews(@Query() query: TickersDto) {
    return this.newsValidator.validate(query.tickers ?? this.config.tickers);
  }

  @Get('features/:ticker/indicators')
  indicators(@Param('ticker') ticker: string) {
    return this.features.indicatorRows(ticker.toUpperCase());
  }

  @Get('features/:ticker/sequences')
  sequences(@Param('ticker') ticker: string, @Query() query: SequencesQueryDto) {
    return this.features.sequenceSamples(ticker.toUpperCase(), {
      window: query.window,
      labeled: query.labeled,
    });
  }

  @Get('news-dataset')
  buildNewsDataset(@Query() query: NewsDatasetQueryDto) {
    return this.newsDataset.build({ tickers: query.tickers, requireLabels: query.requireLabels });
  }

  @Get('runs')
  runs(@Query() query: RunsQueryDto) {
    return this.runLog.findRecent(query.limit);
  }
}
