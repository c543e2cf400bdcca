import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../../../database/database.service';
import { InsertOutcome, PriceBar } from '../../../common/interfaces';

interface PriceRow {
  ticker: string;
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number;
  volume: number | null;
  adjusted_close: number | null;
}

const SELECT_BARS = `
  SELECT ticker,
         to_char(date, 'YYYY-MM-DD') AS date,
         open, high, low, close,
         volume::float8 AS volume,
         adjusted_close
    FROM prices`;

@Injectable()
export class PricesPgRepository {
  private readonly logger = new Logger(PricesPgRepository.name);

  constructor(private readonly db: DatabaseService) {}

  /**
   * Inserts bars for one ticker batch in a single transaction. Bars whose
   * (ticker, date) already exists are left as they are and counted as duplicates.
   */
  async insertBars(bars: PriceBar[]): Promise<InsertOutcome> {
    if (bars.length === 0) {
      return { added: 0, duplicates: 0 };
    }

    const outcome = await this.db.transaction(async (client) => {
      let added = 0;
      let duplicates = 0;

      for (const bar of bars) {
        const result = await client.query(
          `INSERT INTO prices (ticker, date, open, high, low, close, volume, adjusted_close)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
           ON CONFLICT (ticker, date) DO NOTHING`,
          [bar.ticker, bar.date, bar.open, bar.high, bar.low, bar.close, bar.volume, bar.adjustedClose],
        );
        if (result.rowCount === 1) {
          added++;
        } else {
          duplicates++;
        }
      }

      return { added, duplicates };
    });

    this.logger.debug(`Inserted ${outcome.added} bars, skipped ${outcome.duplicates} existing`);
    return outcome;
  }

  /** Bars for one ticker, oldest first. */
  async findByTicker(ticker: string): Promise<PriceBar[]> {
    const result = await this.db.query<PriceRow>(
      `${SELECT_BARS} WHERE ticker = $1 ORDER BY date ASC`,
      [ticker.toUpperCase()],
    );
    return result.rows.map((row) => this.toPriceBar(row));
  }

  async findByTickers(tickers: string[]): Promise<PriceBar[]> {
    const result = await this.db.query<PriceRow>(
      `${SELECT_BARS} WHERE ticker = ANY($1) ORDER BY ticker ASC, date ASC`,
      [tickers.map((ticker) => ticker.toUpperCase())],
    );
    return result.rows.map((row) => this.toPriceBar(row));
  }

  private toPriceBar(row: PriceRow): PriceBar {
    return {
      ticker: row.ticker,
      date: row.date,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
      adjustedClose: row.adjusted_close,
    };
  }
}
