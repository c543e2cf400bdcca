import {
  InsertOutcome,
  IsoDate,
  Label,
  NewsArticle,
  PriceBar,
  RunRecord,
  StoredRunRecord,
  UpsertOutcome,
} from '../src/common/interfaces';
import { PricesPgRepository } from '../src/modules/prices/repositories/prices-pg.repository';
import { NewsPgRepository, TickerArticle } from '../src/modules/news/repositories/news-pg.repository';
import { LabelsPgRepository } from '../src/modules/labels/repositories/labels-pg.repository';
import { RunLogPgRepository } from '../src/modules/run-log/repositories/run-log-pg.repository';

/** Stands in for the prices table: first write per (ticker, date) wins. */
export class InMemoryPricesRepository
  implements Pick<PricesPgRepository, 'insertBars' | 'findByTicker' | 'findByTickers'>
{
  readonly rows = new Map<string, PriceBar>();

  async insertBars(bars: PriceBar[]): Promise<InsertOutcome> {
    let added = 0;
    let duplicates = 0;
    for (const bar of bars) {
      const key = `${bar.ticker}|${bar.date}`;
      if (this.rows.has(key)) {
        duplicates++;
      } else {
        this.rows.set(key, { ...bar });
        added++;
      }
    }
    return { added, duplicates };
  }

  async findByTicker(ticker: string): Promise<PriceBar[]> {
    return this.findByTickers([ticker]);
  }

  async findByTickers(tickers: string[]): Promise<PriceBar[]> {
    const wanted = new Set(tickers.map((ticker) => ticker.toUpperCase()));
    return [...this.rows.values()]
      .filter((bar) => wanted.has(bar.ticker))
      .sort((a, b) => a.ticker.localeCompare(b.ticker) || a.date.localeCompare(b.date));
  }

}

/** Stands in for news + news_tickers: url is the key, links accumulate. */
export class InMemoryNewsRepository
  implements Pick<NewsPgRepository, 'insertArticles' | 'findAll' | 'findByTickers'>
{
  readonly articles = new Map<string, NewsArticle>();
  readonly links = new Set<string>();

  async insertArticles(ticker: string, articles: NewsArticle[]): Promise<InsertOutcome> {
    let added = 0;
    let duplicates = 0;
    for (const article of articles) {
      if (this.articles.has(article.url)) {
        duplicates++;
      } else {
        this.articles.set(article.url, { ...article });
        added++;
      }
      this.links.add(`${article.url}|${ticker}`);
    }
    return { added, duplicates };
  }

  async findAll(): Promise<NewsArticle[]> {
    return [...this.articles.values()];
  }

  async findByTickers(tickers: string[]): Promise<TickerArticle[]> {
    const wanted = new Set(tickers.map((ticker) => ticker.toUpperCase()));
    const result: TickerArticle[] = [];
    for (const link of this.links) {
      const separator = link.lastIndexOf('|');
      const url = link.slice(0, separator);
      const ticker = link.slice(separator + 1);
      const article = this.articles.get(url);
      if (article && wanted.has(ticker)) {
        result.push({ ticker, article });
      }
    }
    return result;
  }

}

/** Stands in for labels: a stored label is rewritten only when its closes change. */
export class InMemoryLabelsRepository
  implements Pick<LabelsPgRepository, 'insertLabels' | 'findByTicker' | 'findByTickers' | 'countByDate'>
{
  readonly rows = new Map<string, Label>();

  async insertLabels(labels: Label[]): Promise<UpsertOutcome> {
    let added = 0;
    let updated = 0;
    let duplicates = 0;
    for (const label of labels) {
      const key = `${label.ticker}|${label.date}`;
      const stored = this.rows.get(key);
      if (!stored) {
        added++;
      } else if (stored.closeT !== label.closeT || stored.closeTPlus1 !== label.closeTPlus1) {
        updated++;
      } else {
        duplicates++;
        continue;
      }
      this.rows.set(key, { ...label });
    }
    return { added, updated, duplicates };
  }

  async findByTicker(ticker: string): Promise<Label[]> {
    return this.findByTickers([ticker]);
  }

  async findByTickers(tickers: string[]): Promise<Label[]> {
    const wanted = new Set(tickers.map((ticker) => ticker.toUpperCase()));
    return [...this.rows.values()]
      .filter((label) => wanted.has(label.ticker))
      .sort((a, b) => a.ticker.localeCompare(b.ticker) || a.date.localeCompare(b.date));
  }

  async countByDate(): Promise<Array<{ date: IsoDate; count: number }>> {
    const counts = new Map<IsoDate, number>();
    for (const label of this.rows.values()) {
      counts.set(label.date, (counts.get(label.date) ?? 0) + 1);
    }
    return [...counts.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, count]) => ({ date, count }));
  }
}

export class InMemoryRunLogRepository implements Pick<RunLogPgRepository, 'append' | 'findRecent'> {
  readonly records: StoredRunRecord[] = [];

  async append(record: RunRecord): Promise<number> {
    const id = this.records.length + 1;
    this.records.push({ ...record, id });
    return id;
  }

  async findRecent(limit: number = 20): Promise<StoredRunRecord[]> {
    return [...this.records].reverse().slice(0, limit);
  }
}
