import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../../../database/database.service';
import { InsertOutcome, NewsArticle } from '../../../common/interfaces';

interface NewsRow {
  url: string;
  ticker_fetched_for: string;
  title: string;
  source: string | null;
  published_at: string;
  summary: string | null;
}

interface TickerNewsRow extends NewsRow {
  ticker: string;
}

export interface TickerArticle {
  ticker: string;
  article: NewsArticle;
}

@Injectable()
export class NewsPgRepository {
  private readonly logger = new Logger(NewsPgRepository.name);

  constructor(private readonly db: DatabaseService) {}

  /**
   * Stores articles fetched for `ticker`. The url is the key: an article seen
   * before, for this or any other ticker, is not stored again, only linked
   * to `ticker` in news_tickers.
   */
  async insertArticles(ticker: string, articles: NewsArticle[]): Promise<InsertOutcome> {
    if (articles.length === 0) {
      return { added: 0, duplicates: 0 };
    }

    const outcome = await this.db.transaction(async (client) => {
      let added = 0;
      let duplicates = 0;

      for (const article of articles) {
        const result = await client.query(
          `INSERT INTO news (url, ticker_fetched_for, title, source, published_at, summary)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (url) DO NOTHING`,
          [
            article.url,
            article.tickerFetchedFor,
            article.title,
            article.source,
            article.publishedAt,
            article.summary,
          ],
        );
        if (result.rowCount === 1) {
          added++;
        } else {
          duplicates++;
        }

        await client.query(
          `INSERT INTO news_tickers (url, ticker) VALUES ($1, $2)
           ON CONFLICT (url, ticker) DO NOTHING`,
          [article.url, ticker],
        );
      }

      return { added, duplicates };
    });

    this.logger.debug(`${ticker}: stored ${outcome.added} articles, ${outcome.duplicates} already known`);
    return outcome;
  }

  /** Every stored article, oldest first. */
  async findAll(): Promise<NewsArticle[]> {
    const result = await this.db.query<NewsRow>(
      `SELECT url, ticker_fetched_for, title, source, published_at, summary
         FROM news
        ORDER BY published_at ASC`,
    );
    return result.rows.map((row) => this.toArticle(row));
  }

  /** Articles linked to any of `tickers`, one entry per (ticker, article). */
  async findByTickers(tickers: string[]): Promise<TickerArticle[]> {
    const result = await this.db.query<TickerNewsRow>(
      `SELECT nt.ticker, n.url, n.ticker_fetched_for, n.title, n.source, n.published_at, n.summary
         FROM news n
         JOIN news_tickers nt ON nt.url = n.url
        WHERE nt.ticker = ANY($1)
        ORDER BY nt.ticker ASC, n.published_at ASC`,
      [tickers.map((ticker) => ticker.toUpperCase())],
    );
    return result.rows.map((row) => ({ ticker: row.ticker, article: this.toArticle(row) }));
  }

  private toArticle(row: NewsRow): NewsArticle {
    return {
      url: row.url,
      tickerFetchedFor: row.ticker_fetched_for,
      title: row.title,
      source: row.source,
      publishedAt: row.published_at,
      summary: row.summary,
    };
  }
}
