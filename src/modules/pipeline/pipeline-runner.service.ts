import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CollectionResult, SplitAssignment, SplitRatios } from '../../common/interfaces';
import { PipelineConfig } from '../../config/configuration';
import { DatasetService } from '../dataset/dataset.service';
import { LabelGenerationSummary, LabelGeneratorService } from '../labels/label-generator.service';
import { NewsCollectorService } from '../news/news-collector.service';
import { PriceCollectorService } from '../prices/price-collector.service';
import { NewsValidationReport, NewsValidatorService } from '../validation/news-validator.service';
import { PriceValidationReport, PriceValidatorService } from '../validation/price-validator.service';
import { PipelineJobData, PipelineJobName } from './pipeline.constants';

export interface ValidationReports {
  prices: PriceValidationReport;
  news: NewsValidationReport;
}

export interface CollectAllResult {
  prices: CollectionResult;
  news: CollectionResult;
  validation: ValidationReports;
}

export interface CollectAndLabelResult {
  collection: CollectAllResult;
  labels: LabelGenerationSummary;
}

export type PipelineJobResult =
  | CollectionResult
  | CollectAllResult
  | CollectAndLabelResult
  | LabelGenerationSummary
  | SplitAssignment;

/** Executes pipeline steps in-process, filling in configured defaults. */
@Injectable()
export class PipelineRunner {
  private readonly logger = new Logger(PipelineRunner.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly priceCollector: PriceCollectorService,
    private readonly newsCollector: NewsCollectorService,
    private readonly labelGenerator: LabelGeneratorService,
    private readonly datasetService: DatasetService,
    private readonly priceValidator: PriceValidatorService,
    private readonly newsValidator: NewsValidatorService,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<PipelineConfig>('pipeline');
  }

  collectPrices(data: PipelineJobData = {}): Promise<CollectionResult> {
    return this.priceCollector.collect(this.tickersOf(data), data.days ?? this.config.defaultLookbackDays);
  }

  collectNews(data: PipelineJobData = {}): Promise<CollectionResult> {
    return this.newsCollector.collect(this.tickersOf(data), data.days ?? this.config.defaultLookbackDays);
  }

  /** Prices, then news, then a validation pass over what was collected. */
  async collectAll(data: PipelineJobData = {}): Promise<CollectAllResult> {
    const prices = await this.collectPrices(data);
    const news = await this.collectNews(data);
    const validation = await this.validate(data);
    this.logger.log(
      `Collection finished: ${prices.rowsAdded} bars, ${news.rowsAdded} articles, ` +
        `${validation.prices.priceAnomalies.length} price anomalies`,
    );
    return { prices, news, validation };
  }

  generateLabels(data: PipelineJobData = {}): Promise<LabelGenerationSummary> {
    return this.labelGenerator.generate(this.tickersOf(data));
  }

  /** Labels are generated only after collection and validation complete. */
  async collectAndLabel(data: PipelineJobData = {}): Promise<CollectAndLabelResult> {
    const collection = await this.collectAll(data);
    const labels = await this.generateLabels(data);
    return { collection, labels };
  }

  buildSplit(ratios?: SplitRatios): Promise<SplitAssignment> {
    return this.datasetService.buildSplit(ratios);
  }

  async loadSplit(key: string): Promise<SplitAssignment> {
    const split = await this.datasetService.loadSplit(key);
    if (!split) {
      throw new NotFoundException(`No dataset split stored under "${key}"`);
    }
    return split;
  }

  async validate(data: PipelineJobData = {}): Promise<ValidationReports> {
    const tickers = this.tickersOf(data);
    const prices = await this.priceValidator.validate(tickers);
    const news = await this.newsValidator.validate(tickers);
    return { prices, news };
  }

  run(name: PipelineJobName, data: PipelineJobData): Promise<PipelineJobResult> {
    switch (name) {
      case 'collect-prices':
        return this.collectPrices(data);
      case 'collect-news':
        return this.collectNews(data);
      case 'collect-all':
        return this.collectAll(data);
      case 'generate-labels':
        return this.generateLabels(data);
      case 'collect-and-label':
        return this.collectAndLabel(data);
      case 'build-split':
        return this.buildSplit();
    }
  }

  private tickersOf(data: PipelineJobData): string[] {
    return data.tickers && data.tickers.length > 0 ? data.tickers : this.config.tickers;
  }
}
