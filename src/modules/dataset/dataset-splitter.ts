import { IsoDate, SplitName, SplitPartition, SplitRatios } from '../../common/interfaces';
import { InsufficientDataError, InvalidSplitRatiosError } from '../../common/errors/pipeline.errors';

export const DEFAULT_SPLIT_RATIOS: SplitRatios = { train: 0.7, val: 0.15, test: 0.15 };

export type DateSplit = Record<SplitName, SplitPartition> & { totalDates: number };

const RATIO_TOLERANCE = 1e-6;

export function assertValidRatios(ratios: SplitRatios): void {
  const values = [ratios.train, ratios.val, ratios.test];
  if (values.some((value) => !Number.isFinite(value) || value <= 0)) {
    throw new InvalidSplitRatiosError(`Split ratios must be positive, got ${values.join('/')}`);
  }
  const total = values.reduce((sum, value) => sum + value, 0);
  if (Math.abs(total - 1) > RATIO_TOLERANCE) {
    throw new InvalidSplitRatiosError(`Split ratios must sum to 1, got ${total}`);
  }
}

function partition(dates: IsoDate[]): SplitPartition {
  return {
    dates,
    start: dates[0],
    end: dates[dates.length - 1],
    numDays: dates.length,
  };
}

/**
 * Chronological train/val/test partition of the distinct dates. Boundaries
 * are `floor(n * train)` and `floor(n * (train + val))`, moved just enough
 * to leave every partition at least one date.
 */
export function splitDates(
  labeledDates: Iterable<IsoDate>,
  ratios: SplitRatios = DEFAULT_SPLIT_RATIOS,
  minDates = 3,
): DateSplit {
  assertValidRatios(ratios);

  const dates = [...new Set(labeledDates)].sort();
  const n = dates.length;
  if (n < Math.max(3, minDates)) {
    throw new InsufficientDataError(`Need at least ${Math.max(3, minDates)} distinct dates to split, got ${n}`);
  }

  // 1e-9 keeps 20 * 0.7 at 14 rather than 13.999...
  let trainEnd = Math.floor(n * ratios.train + 1e-9);
  let valEnd = Math.floor(n * (ratios.train + ratios.val) + 1e-9);
  trainEnd = Math.min(Math.max(trainEnd, 1), n - 2);
  valEnd = Math.min(Math.max(valEnd, trainEnd + 1), n - 1);

  return {
    totalDates: n,
    train: partition(dates.slice(0, trainEnd)),
    val: partition(dates.slice(trainEnd, valEnd)),
    test: partition(dates.slice(valEnd)),
  };
}

export function snapshotKey(first: IsoDate, last: IsoDate): string {
  return `split_${first}_${last}`;
}
