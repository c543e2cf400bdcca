import { format, isValid, parse } from 'date-fns';
import { IsoDate, IsoTimestamp } from '../../common/interfaces';
import { MalformedDateError, MalformedTimestampError } from '../../common/errors/pipeline.errors';
import { TradingCalendar } from './trading-calendar';
import { formatInstant, instantFromWallClock, localDateOf, wallClockAt } from './market-time';

export const MARKET_TIME_ZONE = 'America/New_York';

export interface CutoffConfig {
  hour: number;
  minute: number;
  timeZone: string;
}

export const DEFAULT_CUTOFF: CutoffConfig = { hour: 16, minute: 0, timeZone: MARKET_TIME_ZONE };

const TEXT_DATE_FORMATS = [
  'yyyy-MM-dd',
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'MM/dd/yyyy',
  'M/d/yyyy',
  'yyyy/MM/dd',
  'yyyyMMdd',
  'd MMMM yyyy',
  'd MMM yyyy',
];

const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const REFERENCE_DATE = new Date(2000, 0, 1);

function parseTextDate(text: string): IsoDate | null {
  for (const pattern of TEXT_DATE_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

/**
 * Canonical `YYYY-MM-DD` for a date written in any of the accepted shapes.
 * Datetimes keep the date as written; epoch seconds resolve to the market's
 * local date.
 */
export function standardizeDate(
  input: string | number | Date,
  timeZone: string = MARKET_TIME_ZONE,
): IsoDate {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new MalformedDateError(input);
    }
    return localDateOf(input.getTime(), timeZone);
  }

  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new MalformedDateError(input);
    }
    return localDateOf(input * 1000, timeZone);
  }

  const text = input.trim();
  const datetime = ISO_DATETIME.exec(text);
  const candidate = datetime ? `${datetime[1]}-${datetime[2]}-${datetime[3]}` : text;

  const date = parseTextDate(candidate);
  if (!date) {
    throw new MalformedDateError(input);
  }
  return date;
}

function parseInstant(input: string, naiveZone: string | null): number {
  const text = input.trim();
  const match = ISO_DATETIME.exec(text);

  if (match) {
    const [, year, month, day, hour, minute, second, zone] = match;
    if (!zone) {
      const wall = {
        year: Number(year),
        month: Number(month),
        day: Number(day),
        hour: Number(hour),
        minute: Number(minute),
        second: Number(second ?? 0),
      };
      return naiveZone
        ? instantFromWallClock(wall, naiveZone)
        : Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
    }
    const instant = Date.parse(text.replace(' ', 'T'));
    if (!Number.isNaN(instant)) {
      return instant;
    }
  }

  const fallback = Date.parse(text);
  if (Number.isNaN(fallback)) {
    throw new MalformedTimestampError(input);
  }
  return fallback;
}

/**
 * Epoch seconds, Dates or textual timestamps rendered as an ISO-8601 instant
 * with the explicit offset of `timeZone`. Text without an offset is read as UTC.
 */
export function standardizeTimestamp(
  input: string | number | Date,
  timeZone: string = MARKET_TIME_ZONE,
): IsoTimestamp {
  let instant: number;
  if (input instanceof Date) {
    instant = input.getTime();
  } else if (typeof input === 'number') {
    instant = input * 1000;
  } else {
    instant = parseInstant(input, null);
  }

  if (!Number.isFinite(instant)) {
    throw new MalformedTimestampError(input);
  }
  return formatInstant(instant, timeZone);
}

/**
 * Trading day whose label an article published at `publishedAt` may inform.
 *
 * The first session to absorb the article is its own day when it lands on a
 * trading day before the cutoff, otherwise the next trading day. The
 * prediction date is the session after that one, so it is always strictly
 * later than publication and never a weekend or holiday.
 */
export function applyCutoffRule(
  publishedAt: string | Date,
  calendar: TradingCalendar,
  cutoff: CutoffConfig = DEFAULT_CUTOFF,
): IsoDate {
  const instant =
    publishedAt instanceof Date ? publishedAt.getTime() : parseInstant(publishedAt, cutoff.timeZone);
  if (!Number.isFinite(instant)) {
    throw new MalformedTimestampError(publishedAt);
  }

  const wall = wallClockAt(instant, cutoff.timeZone);
  const localDate = localDateOf(instant, cutoff.timeZone);
  const beforeCutoff = wall.hour * 60 + wall.minute < cutoff.hour * 60 + cutoff.minute;

  const absorbingSession =
    beforeCutoff && calendar.isTradingDay(localDate) ? localDate : calendar.nextTradingDay(localDate);

  return calendar.nextTradingDay(absorbingSession);
}

/** Market-local instant at which `date`'s cutoff falls. */
export function cutoffInstant(date: IsoDate, cutoff: CutoffConfig = DEFAULT_CUTOFF): IsoTimestamp {
  const [year, month, day] = date.split('-').map(Number);
  const instant = instantFromWallClock(
    { year, month, day, hour: cutoff.hour, minute: cutoff.minute, second: 0 },
    cutoff.timeZone,
  );
  return formatInstant(instant, cutoff.timeZone);
}

/**
 * Most recent session whose close has passed at `now`: today once the cutoff
 * is behind us on a trading day, otherwise the previous trading day.
 */
export function lastCompletedSession(
  now: Date,
  calendar: TradingCalendar,
  cutoff: CutoffConfig = DEFAULT_CUTOFF,
): IsoDate {
  const instant = now.getTime();
  const today = localDateOf(instant, cutoff.timeZone);
  const wall = wallClockAt(instant, cutoff.timeZone);
  const pastCutoff = wall.hour * 60 + wall.minute >= cutoff.hour * 60 + cutoff.minute;

  return pastCutoff && calendar.isTradingDay(today) ? today : calendar.previousTradingDay(today);
}

/** The `days` most recent completed sessions as an inclusive [from, to] range. */
export function recentSessionRange(
  now: Date,
  days: number,
  calendar: TradingCalendar,
  cutoff: CutoffConfig = DEFAULT_CUTOFF,
): { from: IsoDate; to: IsoDate } {
  const to = lastCompletedSession(now, calendar, cutoff);
  let from = to;
  for (let i = 1; i < days; i++) {
    from = calendar.previousTradingDay(from);
  }
  return { from, to };
}
