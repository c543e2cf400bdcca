import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Collector, CollectionResult } from '../../common/interfaces';
import { errorMessage } from '../../common/errors/pipeline.errors';
import { Clock } from '../../common/utils/clock';
import { withRetry } from '../../common/utils/retry';
import { assertPositiveDays, normalizeTickers } from '../../common/utils/tickers';
import { PipelineConfig } from '../../config/configuration';
import { TradingCalendar } from '../calendar/trading-calendar';
import { recentSessionRange } from '../calendar/standardization';
import { RunLogService } from '../run-log/run-log.service';
import { PolygonPricesService } from './providers/polygon-prices.service';
import { PricesPgRepository } from './repositories/prices-pg.repository';

@Injectable()
export class PriceCollectorService implements Collector {
  private readonly logger = new Logger(PriceCollectorService.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly priceSource: PolygonPricesService,
    private readonly pricesRepository: PricesPgRepository,
    private readonly runLog: RunLogService,
    private readonly calendar: TradingCalendar,
    private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<PipelineConfig>('pipeline');
  }

  /**
   * Fetches the last `days` sessions of bars per ticker and inserts the ones
   * not stored yet. A ticker that still fails after the retry policy is
   * recorded as failed; the others carry on.
   */
  async collect(tickers: Iterable<string>, days: number): Promise<CollectionResult> {
    assertPositiveDays(days);
    const symbols = normalizeTickers(tickers);
    const startedAt = this.clock.now();
    const { from, to } = recentSessionRange(startedAt, days, this.calendar, this.config.cutoff);

    this.logger.log(`Collecting prices for ${symbols.length} tickers, ${from} -> ${to}`);

    const succeeded: string[] = [];
    const failed: string[] = [];
    const errors: Record<string, string> = {};
    let rowsAdded = 0;
    let duplicatesSkipped = 0;

    for (const ticker of symbols) {
      try {
        const bars = await withRetry(
          (attempt) => {
            this.logger.log(
              `Fetching ${ticker} ${from} -> ${to} (attempt ${attempt}/${this.config.retry.maxAttempts})`,
            );
            return this.priceSource.fetchDailyBars(ticker, from, to);
          },
          this.config.retry,
          {
            sleep: (ms) => this.clock.sleep(ms),
            onRetry: (error, attempt, delayMs) =>
              this.logger.warn(
                `${ticker} attempt ${attempt} failed (${errorMessage(error)}) - retrying in ${delayMs}ms`,
              ),
          },
        );

        const outcome = await this.pricesRepository.insertBars(bars);
        rowsAdded += outcome.added;
        duplicatesSkipped += outcome.duplicates;
        succeeded.push(ticker);
        this.logger.log(`${ticker}: +${outcome.added} rows, ${outcome.duplicates} duplicates`);
      } catch (error) {
        failed.push(ticker);
        errors[ticker] = errorMessage(error);
        this.logger.error(`${ticker} failed: ${errors[ticker]}`);
      }
    }

    return this.runLog.recordCollection({
      runType: 'price_collection',
      tickersAttempted: symbols,
      tickersSucceeded: succeeded,
      tickersFailed: failed,
      rowsAdded,
      duplicatesSkipped,
      errorMessages: errors,
      startedAt,
      finishedAt: this.clock.now(),
    });
  }
}
