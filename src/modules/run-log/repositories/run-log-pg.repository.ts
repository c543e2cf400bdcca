import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../../../database/database.service';
import { RunRecord, RunStatus, RunType, StoredRunRecord } from '../../../common/interfaces';

interface RunLogRow {
  id: string;
  run_type: RunType;
  status: RunStatus;
  tickers_attempted: string[];
  tickers_succeeded: string[];
  tickers_failed: string[];
  rows_added: number;
  duplicates_skipped: number;
  rows_rejected: number;
  error_messages: Record<string, string> | null;
  started_at: string;
  finished_at: string;
  duration_seconds: number;
}

/** Append-only: rows are inserted once and never updated. */
@Injectable()
export class RunLogPgRepository {
  private readonly logger = new Logger(RunLogPgRepository.name);

  constructor(private readonly db: DatabaseService) {}

  async append(record: RunRecord): Promise<number> {
    const hasErrors = Object.keys(record.errorMessages).length > 0;
    const result = await this.db.query<{ id: string }>(
      `INSERT INTO run_log
         (run_type, status, tickers_attempted, tickers_succeeded, tickers_failed,
          rows_added, duplicates_skipped, rows_rejected, error_messages,
          started_at, finished_at, duration_seconds)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       RETURNING id`,
      [
        record.runType,
        record.status,
        JSON.stringify(record.tickersAttempted),
        JSON.stringify(record.tickersSucceeded),
        JSON.stringify(record.tickersFailed),
        record.rowsAdded,
        record.duplicatesSkipped,
        record.rowsRejected,
        hasErrors ? JSON.stringify(record.errorMessages) : null,
        record.startedAt,
        record.finishedAt,
        record.durationSeconds,
      ],
    );

    const id = Number(result.rows[0]?.id);
    this.logger.log(
      `Run #${id} ${record.runType} ${record.status}: +${record.rowsAdded} rows, ` +
        `${record.duplicatesSkipped} skipped, ${record.tickersFailed.length} failed`,
    );
    return id;
  }

  async findRecent(limit: number = 20): Promise<StoredRunRecord[]> {
    const result = await this.db.query<RunLogRow>(
      `SELECT id, run_type, status, tickers_attempted, tickers_succeeded, tickers_failed,
              rows_added, duplicates_skipped, rows_rejected, error_messages, started_at, finished_at, duration_seconds
         FROM run_log
        ORDER BY id DESC
        LIMIT $1`,
      [limit],
    );

    return result.rows.map((row) => ({
      id: Number(row.id),
      runType: row.run_type,
      status: row.status,
      tickersAttempted: row.tickers_attempted,
      tickersSucceeded: row.tickers_succeeded,
      tickersFailed: row.tickers_failed,
      rowsAdded: row.rows_added,
      duplicatesSkipped: row.duplicates_skipped,
      rowsRejected: row.rows_rejected,
      errorMessages: row.error_messages ?? {},
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      durationSeconds: row.duration_seconds,
    }));
  }
}
