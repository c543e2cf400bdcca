import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Collector, CollectionResult, NewsArticle } from '../../common/interfaces';
import { errorMessage } from '../../common/errors/pipeline.errors';
import { Clock } from '../../common/utils/clock';
import { RateLimiter } from '../../common/utils/rate-limiter';
import { withRetry } from '../../common/utils/retry';
import { assertPositiveDays, normalizeTickers } from '../../common/utils/tickers';
import { PipelineConfig } from '../../config/configuration';
import { addDays, localDateOf } from '../calendar/market-time';
import { standardizeTimestamp } from '../calendar/standardization';
import { RunLogService } from '../run-log/run-log.service';
import { FinnhubNewsService, RawNewsItem } from './providers/finnhub-news.service';
import { NewsPgRepository } from './repositories/news-pg.repository';
import { filterRelevant } from './relevance-filter';

interface PreparedBatch {
  articles: NewsArticle[];
  rejected: number;
  duplicates: number;
}

@Injectable()
export class NewsCollectorService implements Collector {
  private readonly logger = new Logger(NewsCollectorService.name);
  private readonly config: PipelineConfig;
  private readonly rateLimiter: RateLimiter;

  constructor(
    private readonly newsSource: FinnhubNewsService,
    private readonly newsRepository: NewsPgRepository,
    private readonly runLog: RunLogService,
    private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<PipelineConfig>('pipeline');
    this.rateLimiter = new RateLimiter(this.config.newsRateLimit, {
      now: () => this.clock.now().getTime(),
      sleep: (ms) => this.clock.sleep(ms),
      onThrottle: (waitMs) => this.logger.log(`Rate limit reached, waiting ${Math.ceil(waitMs / 1000)}s`),
    });
  }

  /**
   * Pulls the last `days` calendar days of headlines per ticker, today
   * included. Every provider call, retries included, goes through the rate
   * limiter.
   */
  async collect(tickers: Iterable<string>, days: number): Promise<CollectionResult> {
    assertPositiveDays(days);
    const symbols = normalizeTickers(tickers);
    const startedAt = this.clock.now();
    const timeZone = this.config.cutoff.timeZone;
    const to = localDateOf(startedAt.getTime(), timeZone);
    const from = addDays(to, -(days - 1));

    this.logger.log(`Collecting news for ${symbols.length} tickers, ${from} -> ${to}`);

    const succeeded: string[] = [];
    const failed: string[] = [];
    const errors: Record<string, string> = {};
    let rowsAdded = 0;
    let duplicatesSkipped = 0;
    let rowsRejected = 0;

    for (const ticker of symbols) {
      try {
        const items = await withRetry(
          async (attempt) => {
            await this.rateLimiter.acquire();
            this.logger.debug(`Fetching news for ${ticker} (attempt ${attempt}/${this.config.retry.maxAttempts})`);
            return this.newsSource.getCompanyNews(ticker, from, to);
          },
          this.config.retry,
          {
            sleep: (ms) => this.clock.sleep(ms),
            onRetry: (error, attempt, delayMs) =>
              this.logger.warn(
                `${ticker} news attempt ${attempt} failed (${errorMessage(error)}) - retrying in ${delayMs}ms`,
              ),
          },
        );

        const batch = this.prepare(ticker, items);
        const relevance = filterRelevant(ticker, this.config.companies[ticker], batch.articles, this.config.relevance);
        if (relevance.fellBack && batch.articles.length > 0) {
          this.logger.warn(
            `${ticker}: only ${relevance.matched}/${batch.articles.length} headlines matched, keeping all of them`,
          );
        }

        const outcome = await this.newsRepository.insertArticles(ticker, relevance.kept);

        rowsAdded += outcome.added;
        duplicatesSkipped += outcome.duplicates + batch.duplicates;
        rowsRejected += batch.rejected;
        succeeded.push(ticker);
        this.logger.log(
          `${ticker}: ${items.length} fetched, ${relevance.kept.length} kept, +${outcome.added} stored, ` +
            `${outcome.duplicates + batch.duplicates} duplicates, ${batch.rejected} rejected`,
        );
      } catch (error) {
        failed.push(ticker);
        errors[ticker] = errorMessage(error);
        this.logger.error(`${ticker} news failed: ${errors[ticker]}`);
      }
    }

    return this.runLog.recordCollection({
      runType: 'news_collection',
      tickersAttempted: symbols,
      tickersSucceeded: succeeded,
      tickersFailed: failed,
      rowsAdded,
      duplicatesSkipped,
      rowsRejected,
      errorMessages: errors,
      startedAt,
      finishedAt: this.clock.now(),
    });
  }

  /**
   * Standardizes the provider items into articles. Items without a url, title
   * or readable timestamp are rejected. A url repeated within the batch is a
   * duplicate; one stored earlier, or under another ticker, is left to the
   * repository so the ticker link is still recorded.
   */
  private prepare(ticker: string, items: RawNewsItem[]): PreparedBatch {
    const articles: NewsArticle[] = [];
    const seenUrls = new Set<string>();
    let rejected = 0;
    let duplicates = 0;

    for (const item of items) {
      if (!item.url || !item.title || item.datetime === null) {
        rejected++;
        continue;
      }

      let publishedAt: string;
      try {
        publishedAt = standardizeTimestamp(item.datetime, this.config.cutoff.timeZone);
      } catch (error) {
        this.logger.debug(`${ticker}: dropping ${item.url} (${errorMessage(error)})`);
        rejected++;
        continue;
      }

      if (seenUrls.has(item.url)) {
        duplicates++;
        continue;
      }
      seenUrls.add(item.url);

      articles.push({
        url: item.url,
        tickerFetchedFor: ticker,
        title: item.title,
        source: item.source,
        publishedAt,
        summary: item.summary,
      });
    }

    return { articles, rejected, duplicates };
  }
}
