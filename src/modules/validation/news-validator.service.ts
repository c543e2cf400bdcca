import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IsoTimestamp, NewsArticle } from '../../common/interfaces';
import { Clock } from '../../common/utils/clock';
import { normalizeTickers } from '../../common/utils/tickers';
import { PipelineConfig } from '../../config/configuration';
import { NewsPgRepository, TickerArticle } from '../news/repositories/news-pg.repository';

type RequiredNewsField = 'title' | 'source' | 'publishedAt';

export interface MissingNewsFields {
  url: string;
  ticker: string;
  fields: RequiredNewsField[];
}

export interface TimestampIssue {
  url: string;
  ticker: string;
  title: string;
  publishedAt: IsoTimestamp;
}

export interface DuplicateUrl {
  url: string;
  count: number;
}

export interface TickerArticleCount {
  ticker: string;
  articleCount: number;
  earliest: IsoTimestamp | null;
  latest: IsoTimestamp | null;
  lowCoverage: boolean;
}

export interface NewsValidationReport {
  tickers: string[];
  asOf: string;
  missingFields: MissingNewsFields[];
  futureTimestamps: TimestampIssue[];
  unparseableTimestamps: TimestampIssue[];
  duplicateUrls: DuplicateUrl[];
  articlesPerTicker: TickerArticleCount[];
}

const isBlank = (value: string | null | undefined) => value == null || value.trim() === '';

/** Read-only quality audit of stored news. */
@Injectable()
export class NewsValidatorService {
  private readonly logger = new Logger(NewsValidatorService.name);
  private readonly config: PipelineConfig['validation'];

  constructor(
    private readonly newsRepository: NewsPgRepository,
    private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<PipelineConfig>('pipeline').validation;
  }

  async validate(tickers: Iterable<string>, asOf: Date = this.clock.now()): Promise<NewsValidationReport> {
    const symbols = normalizeTickers(tickers);
    const [all, linked] = await Promise.all([
      this.newsRepository.findAll(),
      this.newsRepository.findByTickers(symbols),
    ]);

    const report = this.audit(symbols, all, linked, asOf);

    if (report.missingFields.length > 0) {
      this.logger.warn(`Articles with missing fields: ${report.missingFields.length}`);
    }
    if (report.futureTimestamps.length > 0) {
      this.logger.warn(`Articles with future timestamps: ${report.futureTimestamps.length}`);
    }
    if (report.duplicateUrls.length > 0) {
      this.logger.warn(`Duplicate urls: ${report.duplicateUrls.length}`);
    }
    return report;
  }

  audit(
    tickers: string[],
    all: NewsArticle[],
    linked: TickerArticle[],
    asOf: Date,
  ): NewsValidationReport {
    const horizon = asOf.getTime() + this.config.futureBufferMinutes * 60_000;
    const report: NewsValidationReport = {
      tickers,
      asOf: asOf.toISOString(),
      missingFields: [],
      futureTimestamps: [],
      unparseableTimestamps: [],
      duplicateUrls: [],
      articlesPerTicker: [],
    };

    for (const { ticker, article } of linked) {
      const fields: RequiredNewsField[] = [];
      if (isBlank(article.title)) fields.push('title');
      if (isBlank(article.source)) fields.push('source');
      if (isBlank(article.publishedAt)) fields.push('publishedAt');
      if (fields.length > 0) {
        report.missingFields.push({ url: article.url, ticker, fields });
      }
    }

    const urlCounts = new Map<string, number>();
    for (const article of all) {
      urlCounts.set(article.url, (urlCounts.get(article.url) ?? 0) + 1);

      if (isBlank(article.publishedAt)) {
        continue;
      }
      const issue: TimestampIssue = {
        url: article.url,
        ticker: article.tickerFetchedFor,
        title: article.title,
        publishedAt: article.publishedAt,
      };
      const published = Date.parse(article.publishedAt);
      if (Number.isNaN(published)) {
        report.unparseableTimestamps.push(issue);
      } else if (published > horizon) {
        report.futureTimestamps.push(issue);
      }
    }

    for (const [url, count] of urlCounts) {
      if (count > 1) {
        report.duplicateUrls.push({ url, count });
      }
    }

    for (const ticker of tickers) {
      const articles = linked.filter((entry) => entry.ticker === ticker).map((entry) => entry.article);
      const instants = articles
        .map((article) => ({ text: article.publishedAt, ms: Date.parse(article.publishedAt) }))
        .filter((entry) => !Number.isNaN(entry.ms))
        .sort((a, b) => a.ms - b.ms);

      report.articlesPerTicker.push({
        ticker,
        articleCount: articles.length,
        earliest: instants[0]?.text ?? null,
        latest: instants[instants.length - 1]?.text ?? null,
        lowCoverage: articles.length < this.config.minArticlesPerTicker,
      });
    }

    report.articlesPerTicker.sort((a, b) => b.articleCount - a.articleCount);
    return report;
  }
}
