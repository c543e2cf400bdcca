import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IsoDate, Label } from '../../common/interfaces';
import { MalformedTimestampError } from '../../common/errors/pipeline.errors';
import { normalizeTickers } from '../../common/utils/tickers';
import { PipelineConfig } from '../../config/configuration';
import { TradingCalendar } from '../calendar/trading-calendar';
import { CutoffConfig, applyCutoffRule } from '../calendar/standardization';
import { LabelsPgRepository } from '../labels/repositories/labels-pg.repository';
import { NewsPgRepository, TickerArticle } from './repositories/news-pg.repository';

export interface NewsDatasetRow {
  ticker: string;
  predictionDate: IsoDate;
  numArticles: number;
  headlines: string[];
  headlinesText: string;
  labelBinary: 0 | 1 | null;
  pctReturn: number | null;
  closeT: number | null;
  closeTPlus1: number | null;
}

export interface NewsDataset {
  rows: NewsDatasetRow[];
  articlesUsed: number;
  articlesDropped: number;
}

export interface NewsDatasetOptions {
  tickers?: Iterable<string>;
  /** Inner join on labels when true (default), left join otherwise. */
  requireLabels?: boolean;
}

export const HEADLINE_SEPARATOR = ' | ';

/**
 * Groups headlines under the prediction date the cutoff rule assigns them and
 * joins each group to the label dated on that prediction date.
 */
export function buildNewsDataset(
  linked: TickerArticle[],
  labels: Label[],
  calendar: TradingCalendar,
  cutoff: CutoffConfig,
  requireLabels = true,
): NewsDataset {
  const groups = new Map<string, { ticker: string; predictionDate: IsoDate; items: Array<{ at: string; title: string }> }>();
  const seen = new Set<string>();
  let articlesUsed = 0;
  let articlesDropped = 0;

  for (const { ticker, article } of linked) {
    const dedupKey = `${ticker}\u0000${article.title}`;
    if (seen.has(dedupKey)) {
      continue;
    }
    seen.add(dedupKey);

    let predictionDate: IsoDate;
    try {
      predictionDate = applyCutoffRule(article.publishedAt, calendar, cutoff);
    } catch (error) {
      if (!(error instanceof MalformedTimestampError)) {
        throw error;
      }
      articlesDropped++;
      continue;
    }

    const key = `${ticker}\u0000${predictionDate}`;
    const group = groups.get(key) ?? { ticker, predictionDate, items: [] };
    group.items.push({ at: article.publishedAt, title: article.title });
    groups.set(key, group);
    articlesUsed++;
  }

  const labelsByKey = new Map(labels.map((label) => [`${label.ticker}\u0000${label.date}`, label]));
  const rows: NewsDatasetRow[] = [];

  for (const [key, group] of groups) {
    const label = labelsByKey.get(key);
    if (!label && requireLabels) {
      continue;
    }
    const headlines = group.items
      .sort((a, b) => Date.parse(a.at) - Date.parse(b.at))
      .map((item) => item.title);

    rows.push({
      ticker: group.ticker,
      predictionDate: group.predictionDate,
      numArticles: headlines.length,
      headlines,
      headlinesText: headlines.join(HEADLINE_SEPARATOR),
      labelBinary: label ? label.labelBinary : null,
      pctReturn: label ? label.pctReturn : null,
      closeT: label ? label.closeT : null,
      closeTPlus1: label ? label.closeTPlus1 : null,
    });
  }

  rows.sort((a, b) => a.ticker.localeCompare(b.ticker) || a.predictionDate.localeCompare(b.predictionDate));
  return { rows, articlesUsed, articlesDropped };
}

@Injectable()
export class NewsDatasetBuilder {
  private readonly logger = new Logger(NewsDatasetBuilder.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly newsRepository: NewsPgRepository,
    private readonly labelsRepository: LabelsPgRepository,
    private readonly calendar: TradingCalendar,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<PipelineConfig>('pipeline');
  }

  async build(options: NewsDatasetOptions = {}): Promise<NewsDataset> {
    const tickers = normalizeTickers(options.tickers ?? this.config.tickers);
    const requireLabels = options.requireLabels ?? true;

    const [linked, labels] = await Promise.all([
      this.newsRepository.findByTickers(tickers),
      this.labelsRepository.findByTickers(tickers),
    ]);

    const dataset = buildNewsDataset(linked, labels, this.calendar, this.config.cutoff, requireLabels);

    this.logger.log(
      `News dataset: ${dataset.rows.length} rows (${requireLabels ? 'inner' : 'left'} join), ` +
        `${dataset.articlesUsed} articles used, ${dataset.articlesDropped} dropped`,
    );
    return dataset;
  }
}
