import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../../database/database.service';
import { IsoDate, Label, UpsertOutcome } from '../../../common/interfaces';

interface LabelRow {
  ticker: string;
  date: string;
  label_binary: number;
  pct_return: number;
  close_t: number;
  close_t_plus_1: number;
}

@Injectable()
export class LabelsPgRepository {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Upserts labels. A stored label computed from the same pair of closes is
   * left alone and counted as a duplicate; one whose closes differ (a bar was
   * backfilled or corrected since) is rewritten and counted as updated.
   */
  async insertLabels(labels: Label[]): Promise<UpsertOutcome> {
    if (labels.length === 0) {
      return { added: 0, updated: 0, duplicates: 0 };
    }

    return this.db.transaction(async (client) => {
      let added = 0;
      let updated = 0;
      let duplicates = 0;
      for (const label of labels) {
        const result = await client.query<{ inserted: boolean }>(
          `INSERT INTO labels (ticker, date, label_binary, pct_return, close_t, close_t_plus_1)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (ticker, date) DO UPDATE
              SET label_binary = EXCLUDED.label_binary,
                  pct_return = EXCLUDED.pct_return,
                  close_t = EXCLUDED.close_t,
                  close_t_plus_1 = EXCLUDED.close_t_plus_1
            WHERE labels.close_t IS DISTINCT FROM EXCLUDED.close_t
               OR labels.close_t_plus_1 IS DISTINCT FROM EXCLUDED.close_t_plus_1
           RETURNING (xmax = 0) AS inserted`,
          [label.ticker, label.date, label.labelBinary, label.pctReturn, label.closeT, label.closeTPlus1],
        );
        const row = result.rows[0];
        if (!row) {
          duplicates++;
        } else if (row.inserted) {
          added++;
        } else {
          updated++;
        }
      }
      return { added, updated, duplicates };
    });
  }

  async findByTicker(ticker: string): Promise<Label[]> {
    const result = await this.db.query<LabelRow>(
      `SELECT ticker, to_char(date, 'YYYY-MM-DD') AS date,
              label_binary, pct_return, close_t, close_t_plus_1
         FROM labels
        WHERE ticker = $1
        ORDER BY date ASC`,
      [ticker.toUpperCase()],
    );
    return result.rows.map((row) => this.toLabel(row));
  }

  async findByTickers(tickers: string[]): Promise<Label[]> {
    const result = await this.db.query<LabelRow>(
      `SELECT ticker, to_char(date, 'YYYY-MM-DD') AS date,
              label_binary, pct_return, close_t, close_t_plus_1
         FROM labels
        WHERE ticker = ANY($1)
        ORDER BY ticker ASC, date ASC`,
      [tickers.map((ticker) => ticker.toUpperCase())],
    );
    return result.rows.map((row) => this.toLabel(row));
  }

  /** Number of labels stored per date, ascending by date. */
  async countByDate(): Promise<Array<{ date: IsoDate; count: number }>> {
    const result = await this.db.query<{ date: string; count: string }>(
      `SELECT to_char(date, 'YYYY-MM-DD') AS date, COUNT(*) AS count
         FROM labels
        GROUP BY date
        ORDER BY date ASC`,
    );
    return result.rows.map((row) => ({ date: row.date, count: Number(row.count) }));
  }

  private toLabel(row: LabelRow): Label {
    return {
      ticker: row.ticker,
      date: row.date,
      labelBinary: row.label_binary === 1 ? 1 : 0,
      pctReturn: row.pct_return,
      closeT: row.close_t,
      closeTPlus1: row.close_t_plus_1,
    };
  }
}
