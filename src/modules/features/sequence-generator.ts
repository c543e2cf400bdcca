import { Injectable } from '@nestjs/common';
import { FEATURE_COLUMNS, IndicatorRow, Label, SequenceSample } from '../../common/interfaces';
import { TradingCalendar } from '../calendar/trading-calendar';

export const DEFAULT_WINDOW = 60;

/** Min-max scales each column of `matrix` on its own; a flat column becomes 0. */
export function normalizeColumns(matrix: number[][]): number[][] {
  if (matrix.length === 0) return [];
  const width = matrix[0].length;
  const mins = new Array<number>(width).fill(Infinity);
  const maxs = new Array<number>(width).fill(-Infinity);

  for (const row of matrix) {
    row.forEach((value, j) => {
      mins[j] = Math.min(mins[j], value);
      maxs[j] = Math.max(maxs[j], value);
    });
  }

  return matrix.map((row) =>
    row.map((value, j) => {
      const range = maxs[j] - mins[j];
      return range > 0 ? (value - mins[j]) / range : 0;
    }),
  );
}

@Injectable()
export class SequenceGenerator {
  constructor(private readonly calendar: TradingCalendar) {}

  /**
   * Stride-1 windows of `window` rows. A window never spans a missing
   * trading day: rows are split into runs where each date is the trading
   * day right after the previous one.
   */
  generate(ticker: string, rows: IndicatorRow[], window: number = DEFAULT_WINDOW): SequenceSample[] {
    if (!Number.isInteger(window) || window < 1) {
      throw new RangeError(`window must be a positive integer, got ${window}`);
    }

    const symbol = ticker.toUpperCase();
    const sorted = rows.filter((row) => row.ticker.toUpperCase() === symbol).sort((a, b) => a.date.localeCompare(b.date));
    const samples: SequenceSample[] = [];

    for (const run of this.contiguousRuns(sorted)) {
      for (let end = window; end <= run.length; end++) {
        const slice = run.slice(end - window, end);
        samples.push({
          ticker: symbol,
          endDate: slice[slice.length - 1].date,
          dates: slice.map((row) => row.date),
          columns: FEATURE_COLUMNS,
          window: normalizeColumns(slice.map((row) => FEATURE_COLUMNS.map((column) => row.features[column]))),
        });
      }
    }
    return samples;
  }

  /** Windows whose end date carries a label, with that label attached. */
  generateLabeled(
    ticker: string,
    rows: IndicatorRow[],
    labels: Label[],
    window: number = DEFAULT_WINDOW,
  ): SequenceSample[] {
    const symbol = ticker.toUpperCase();
    const byDate = new Map(labels.filter((label) => label.ticker === symbol).map((label) => [label.date, label]));

    const labeled: SequenceSample[] = [];
    for (const sample of this.generate(symbol, rows, window)) {
      const label = byDate.get(sample.endDate);
      if (label) {
        labeled.push({ ...sample, label: label.labelBinary });
      }
    }
    return labeled;
  }

  private contiguousRuns(rows: IndicatorRow[]): IndicatorRow[][] {
    const runs: IndicatorRow[][] = [];
    let current: IndicatorRow[] = [];

    for (const row of rows) {
      const previous = current[current.length - 1];
      if (previous && this.calendar.nextTradingDay(previous.date) !== row.date) {
        runs.push(current);
        current = [];
      }
      current.push(row);
    }
    if (current.length > 0) {
      runs.push(current);
    }
    return runs;
  }
}
