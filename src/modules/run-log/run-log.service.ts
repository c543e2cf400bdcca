import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CollectionResult, RunRecord, RunStatus, RunType } from '../../common/interfaces';
import { formatInstant } from '../calendar/market-time';
import { PipelineConfig } from '../../config/configuration';
import { RunLogPgRepository } from './repositories/run-log-pg.repository';

export interface RunSummary {
  runType: RunType;
  tickersAttempted: string[];
  tickersSucceeded: string[];
  tickersFailed: string[];
  rowsAdded: number;
  duplicatesSkipped: number;
  rowsRejected?: number;
  errorMessages: Record<string, string>;
  startedAt: Date;
  finishedAt: Date;
}

/** Builds RunRecords from run outcomes and appends them to the run log. */
@Injectable()
export class RunLogService {
  private readonly timeZone: string;

  constructor(
    private readonly runLogRepository: RunLogPgRepository,
    configService: ConfigService,
  ) {
    this.timeZone = configService.getOrThrow<PipelineConfig>('pipeline').cutoff.timeZone;
  }

  toRecord(summary: RunSummary): RunRecord {
    return {
      runType: summary.runType,
      status: this.statusOf(summary),
      tickersAttempted: summary.tickersAttempted,
      tickersSucceeded: summary.tickersSucceeded,
      tickersFailed: summary.tickersFailed,
      rowsAdded: summary.rowsAdded,
      duplicatesSkipped: summary.duplicatesSkipped,
      rowsRejected: summary.rowsRejected ?? 0,
      startedAt: formatInstant(summary.startedAt.getTime(), this.timeZone),
      finishedAt: formatInstant(summary.finishedAt.getTime(), this.timeZone),
      durationSeconds:
        Math.round((summary.finishedAt.getTime() - summary.startedAt.getTime()) / 10) / 100,
      errorMessages: summary.errorMessages,
    };
  }

  async record(summary: RunSummary): Promise<RunRecord> {
    const record = this.toRecord(summary);
    await this.runLogRepository.append(record);
    return record;
  }

  /** Appends the record for a finished collection run and returns the caller-facing result. */
  async recordCollection(summary: RunSummary): Promise<CollectionResult> {
    const record = await this.record(summary);
    return {
      runType: record.runType,
      tickersAttempted: record.tickersAttempted,
      tickersSucceeded: record.tickersSucceeded,
      tickersFailed: record.tickersFailed,
      rowsAdded: record.rowsAdded,
      duplicatesSkipped: record.duplicatesSkipped,
      rowsRejected: record.rowsRejected,
      errors: record.errorMessages,
      startedAt: record.startedAt,
      finishedAt: record.finishedAt,
    };
  }

  findRecent(limit?: number) {
    return this.runLogRepository.findRecent(limit);
  }

  private statusOf(summary: RunSummary): RunStatus {
    if (summary.tickersFailed.length === 0) {
      return 'success';
    }
    return summary.tickersSucceeded.length > 0 ? 'partial' : 'failed';
  }
}
