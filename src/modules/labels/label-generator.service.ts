import { Injectable, Logger } from '@nestjs/common';
import { IsoDate, Label, PriceBar } from '../../common/interfaces';
import { errorMessage } from '../../common/errors/pipeline.errors';
import { Clock } from '../../common/utils/clock';
import { normalizeTickers } from '../../common/utils/tickers';
import { PricesPgRepository } from '../prices/repositories/prices-pg.repository';
import { RunLogService } from '../run-log/run-log.service';
import { LabelsPgRepository } from './repositories/labels-pg.repository';

export interface TickerLabelSummary {
  labels: number;
  updated: number;
  skipped: number;
  /** Bars that could not be labelled because their close is 0. */
  rejected: number;
}

export interface LabelGenerationSummary {
  tickers: Record<string, TickerLabelSummary>;
  totalLabels: number;
  totalUpdated: number;
  totalSkipped: number;
  totalRejected: number;
  errors: Record<string, string>;
}

export interface LabelBatch {
  labels: Label[];
  /** Dates whose close is 0, so no return can be computed. */
  rejected: IsoDate[];
}

/**
 * Up/down label for every bar that has a later bar: 1 when the next close is
 * strictly higher, else 0. The stored bars are the trading days, so "next
 * bar" is the next trading day for which a close exists.
 */
export function labelsFromBars(bars: PriceBar[]): LabelBatch {
  const sorted = [...bars].sort((a, b) => a.date.localeCompare(b.date));
  const labels: Label[] = [];
  const rejected: IsoDate[] = [];

  for (let i = 0; i < sorted.length - 1; i++) {
    const today = sorted[i];
    const next = sorted[i + 1];
    if (today.close === 0) {
      rejected.push(today.date);
      continue;
    }
    labels.push({
      ticker: today.ticker,
      date: today.date,
      labelBinary: next.close > today.close ? 1 : 0,
      pctReturn: (next.close - today.close) / today.close,
      closeT: today.close,
      closeTPlus1: next.close,
    });
  }

  return { labels, rejected };
}

@Injectable()
export class LabelGeneratorService {
  private readonly logger = new Logger(LabelGeneratorService.name);

  constructor(
    private readonly pricesRepository: PricesPgRepository,
    private readonly labelsRepository: LabelsPgRepository,
    private readonly runLog: RunLogService,
    private readonly clock: Clock,
  ) {}

  async generate(tickers: Iterable<string>): Promise<LabelGenerationSummary> {
    const symbols = normalizeTickers(tickers);
    const startedAt = this.clock.now();
    const summary: LabelGenerationSummary = {
      tickers: {},
      totalLabels: 0,
      totalUpdated: 0,
      totalSkipped: 0,
      totalRejected: 0,
      errors: {},
    };
    const succeeded: string[] = [];
    const failed: string[] = [];

    for (const ticker of symbols) {
      try {
        const bars = await this.pricesRepository.findByTicker(ticker);
        const batch = labelsFromBars(bars);
        if (batch.rejected.length > 0) {
          this.logger.warn(`${ticker}: zero close on ${batch.rejected.join(', ')}, no label computed`);
        }
        const outcome = await this.labelsRepository.insertLabels(batch.labels);

        summary.tickers[ticker] = {
          labels: outcome.added,
          updated: outcome.updated,
          skipped: outcome.duplicates,
          rejected: batch.rejected.length,
        };
        summary.totalLabels += outcome.added;
        summary.totalUpdated += outcome.updated;
        summary.totalSkipped += outcome.duplicates;
        summary.totalRejected += batch.rejected.length;
        succeeded.push(ticker);
        this.logger.log(
          `${ticker}: ${outcome.added} labels written, ${outcome.updated} recomputed, ` +
            `${outcome.duplicates} already present`,
        );
      } catch (error) {
        failed.push(ticker);
        summary.errors[ticker] = errorMessage(error);
        this.logger.error(`${ticker} labelling failed: ${summary.errors[ticker]}`);
      }
    }

    await this.runLog.record({
      runType: 'label_generation',
      tickersAttempted: symbols,
      tickersSucceeded: succeeded,
      tickersFailed: failed,
      rowsAdded: summary.totalLabels + summary.totalUpdated,
      duplicatesSkipped: summary.totalSkipped,
      rowsRejected: summary.totalRejected,
      errorMessages: summary.errors,
      startedAt,
      finishedAt: this.clock.now(),
    });

    return summary;
  }
}
