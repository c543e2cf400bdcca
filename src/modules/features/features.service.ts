import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IndicatorRow, SequenceSample } from '../../common/interfaces';
import { PipelineConfig } from '../../config/configuration';
import { LabelsPgRepository } from '../labels/repositories/labels-pg.repository';
import { PricesPgRepository } from '../prices/repositories/prices-pg.repository';
import { TechnicalIndicators } from './indicators/technical-indicators';
import { SequenceGenerator } from './sequence-generator';

export interface SequenceOptions {
  window?: number;
  labeled?: boolean;
}

@Injectable()
export class FeaturesService {
  private readonly sequenceLength: number;

  constructor(
    private readonly pricesRepository: PricesPgRepository,
    private readonly labelsRepository: LabelsPgRepository,
    private readonly indicators: TechnicalIndicators,
    private readonly sequences: SequenceGenerator,
    configService: ConfigService,
  ) {
    this.sequenceLength = configService.getOrThrow<PipelineConfig>('pipeline').features.sequenceLength;
  }

  async indicatorRows(ticker: string): Promise<IndicatorRow[]> {
    const bars = await this.pricesRepository.findByTicker(ticker);
    return this.indicators.compute(ticker, bars);
  }

  async sequenceSamples(ticker: string, options: SequenceOptions = {}): Promise<SequenceSample[]> {
    const window = options.window ?? this.sequenceLength;
    const rows = await this.indicatorRows(ticker);
    if (!options.labeled) {
      return this.sequences.generate(ticker, rows, window);
    }
    const labels = await this.labelsRepository.findByTicker(ticker);
    return this.sequences.generateLabeled(ticker, rows, labels, window);
  }
}
