import { IsoDate } from './pipeline.interface';

export const FEATURE_COLUMNS = [
  'open',
  'high',
  'low',
  'close',
  'volume',
  'rsi',
  'macdLine',
  'macdSignal',
  'macdHistogram',
  'bbMiddle',
  'bbUpper',
  'bbLower',
  'bbWidth',
  'bbPosition',
  'volumeMa',
  'volumeRatio',
] as const;

export type FeatureName = (typeof FEATURE_COLUMNS)[number];

export type IndicatorFeatures = Record<FeatureName, number>;

export interface IndicatorRow {
  ticker: string;
  date: IsoDate;
  features: IndicatorFeatures;
}

export interface SequenceSample {
  ticker: string;
  endDate: IsoDate;
  /** Dates of the window rows, oldest first. */
  dates: IsoDate[];
  columns: readonly FeatureName[];
  /** `window[i][j]` is feature `columns[j]` on `dates[i]`, scaled to [0, 1]. */
  window: number[][];
  label?: 0 | 1;
}
