import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IsoDate, PriceBar } from '../../common/interfaces';
import { normalizeTickers } from '../../common/utils/tickers';
import { PipelineConfig } from '../../config/configuration';
import { TradingCalendar } from '../calendar/trading-calendar';
import { PricesPgRepository } from '../prices/repositories/prices-pg.repository';

type OhlcvField = 'open' | 'high' | 'low' | 'close' | 'volume';

const OHLCV_FIELDS: OhlcvField[] = ['open', 'high', 'low', 'close', 'volume'];

export interface MissingPriceFields {
  ticker: string;
  date: IsoDate;
  fields: OhlcvField[];
}

export interface PriceAnomaly {
  ticker: string;
  date: IsoDate;
  close: number;
  previousClose: number;
  /** Fractional close-to-close change, e.g. 0.25 for +25%. */
  pctChange: number;
}

export interface ZeroVolumeDay {
  ticker: string;
  date: IsoDate;
}

export interface PriceCoverage {
  ticker: string;
  daysCollected: number;
  firstDate: IsoDate | null;
  lastDate: IsoDate | null;
  gapCount: number;
  missingDates: IsoDate[];
}

export interface PriceValidationReport {
  tickers: string[];
  missingFields: MissingPriceFields[];
  priceAnomalies: PriceAnomaly[];
  zeroVolumeDays: ZeroVolumeDay[];
  coverage: PriceCoverage[];
}

/** Read-only quality audit of stored price bars. */
@Injectable()
export class PriceValidatorService {
  private readonly logger = new Logger(PriceValidatorService.name);
  private readonly jumpThreshold: number;

  constructor(
    private readonly pricesRepository: PricesPgRepository,
    private readonly calendar: TradingCalendar,
    configService: ConfigService,
  ) {
    this.jumpThreshold = configService.getOrThrow<PipelineConfig>('pipeline').validation.priceJumpThreshold;
  }

  async validate(tickers: Iterable<string>): Promise<PriceValidationReport> {
    const symbols = normalizeTickers(tickers);
    const bars = await this.pricesRepository.findByTickers(symbols);
    const report = this.audit(symbols, bars);

    if (report.missingFields.length > 0) {
      this.logger.warn(`Bars with missing values: ${report.missingFields.length}`);
    }
    if (report.priceAnomalies.length > 0) {
      this.logger.warn(`Suspicious price jumps: ${report.priceAnomalies.length}`);
    }
    if (report.zeroVolumeDays.length > 0) {
      this.logger.warn(`Zero-volume days: ${report.zeroVolumeDays.length}`);
    }
    return report;
  }

  audit(tickers: string[], bars: PriceBar[]): PriceValidationReport {
    const byTicker = new Map<string, PriceBar[]>(tickers.map((ticker) => [ticker, []]));
    for (const bar of bars) {
      byTicker.get(bar.ticker)?.push(bar);
    }

    const report: PriceValidationReport = {
      tickers,
      missingFields: [],
      priceAnomalies: [],
      zeroVolumeDays: [],
      coverage: [],
    };

    for (const [ticker, series] of byTicker) {
      const sorted = [...series].sort((a, b) => a.date.localeCompare(b.date));

      sorted.forEach((bar, index) => {
        const missing = OHLCV_FIELDS.filter((field) => {
          const value = bar[field];
          return value === null || !Number.isFinite(value);
        });
        if (missing.length > 0) {
          report.missingFields.push({ ticker, date: bar.date, fields: missing });
        }

        if (bar.volume === 0) {
          report.zeroVolumeDays.push({ ticker, date: bar.date });
        }

        const previous = sorted[index - 1];
        if (previous && previous.close) {
          const pctChange = (bar.close - previous.close) / previous.close;
          if (Math.abs(pctChange) > this.jumpThreshold) {
            report.priceAnomalies.push({
              ticker,
              date: bar.date,
              close: bar.close,
              previousClose: previous.close,
              pctChange,
            });
          }
        }
      });

      report.coverage.push(this.coverageOf(ticker, sorted));
    }

    return report;
  }

  private coverageOf(ticker: string, sorted: PriceBar[]): PriceCoverage {
    if (sorted.length === 0) {
      return { ticker, daysCollected: 0, firstDate: null, lastDate: null, gapCount: 0, missingDates: [] };
    }

    const collected = new Set(sorted.map((bar) => bar.date));
    const firstDate = sorted[0].date;
    const lastDate = sorted[sorted.length - 1].date;
    const missingDates = this.calendar
      .tradingDaysBetween(firstDate, lastDate)
      .filter((date) => !collected.has(date));

    return {
      ticker,
      daysCollected: collected.size,
      firstDate,
      lastDate,
      gapCount: missingDates.length,
      missingDates,
    };
  }
}
