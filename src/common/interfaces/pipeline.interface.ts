/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

/** ISO-8601 instant with an explicit offset, e.g. `2026-02-07T14:13:00-05:00`. */
export type IsoTimestamp = string;

export interface PriceBar {
  ticker: string;
  date: IsoDate;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number;
  volume: number | null;
  adjustedClose: number | null;
}

export interface NewsArticle {
  url: string;
  tickerFetchedFor: string;
  title: string;
  source: string | null;
  publishedAt: IsoTimestamp;
  summary: string | null;
}

export interface Label {
  ticker: string;
  date: IsoDate;
  labelBinary: 0 | 1;
  pctReturn: number;
  closeT: number;
  closeTPlus1: number;
}

export type RunType =
  | 'price_collection'
  | 'news_collection'
  | 'label_generation'
  | 'dataset_split';

export type RunStatus = 'success' | 'partial' | 'failed';

export interface RunRecord {
  runType: RunType;
  status: RunStatus;
  tickersAttempted: string[];
  tickersSucceeded: string[];
  tickersFailed: string[];
  rowsAdded: number;
  duplicatesSkipped: number;
  /** Records dropped for failing validation (no url, bad timestamp...). */
  rowsRejected: number;
  startedAt: IsoTimestamp;
  finishedAt: IsoTimestamp;
  durationSeconds: number;
  errorMessages: Record<string, string>;
}

export interface StoredRunRecord extends RunRecord {
  id: number;
}

export interface CollectionResult {
  runType: RunType;
  tickersAttempted: string[];
  tickersSucceeded: string[];
  tickersFailed: string[];
  rowsAdded: number;
  duplicatesSkipped: number;
  rowsRejected: number;
  errors: Record<string, string>;
  startedAt: IsoTimestamp;
  finishedAt: IsoTimestamp;
}

/**
 * Anything that pulls rows for a set of tickers from an outside source and
 * persists them. Both collectors satisfy it independently.
 */
export interface Collector {
  collect(tickers: Iterable<string>, days: number): Promise<CollectionResult>;
}

export interface InsertOutcome {
  added: number;
  duplicates: number;
}

/** Outcome of an upsert: rows whose stored values changed count as `updated`. */
export interface UpsertOutcome extends InsertOutcome {
  updated: number;
}

export type SplitName = 'train' | 'val' | 'test';

export interface SplitRatios {
  train: number;
  val: number;
  test: number;
}

export interface SplitPartition {
  dates: IsoDate[];
  start: IsoDate;
  end: IsoDate;
  numDays: number;
  labelCount?: number;
}

export interface SplitAssignment {
  key: string;
  createdAt: IsoTimestamp;
  ratios: SplitRatios;
  totalDates: number;
  train: SplitPartition;
  val: SplitPartition;
  test: SplitPartition;
}
