import { IsoDate } from '../../common/interfaces';
import { NoTradingDayError } from '../../common/errors/pipeline.errors';
import { addDays, dayOfWeek, formatIsoDate } from './market-time';

export interface TradingCalendarOptions {
  /** Closures beyond the standard holiday rules (e.g. national days of mourning). */
  extraClosures?: IsoDate[];
  /** How far ahead a next-session search may look before giving up. */
  maxHorizonDays?: number;
}

const DEFAULT_HORIZON_DAYS = 14;

const isoDate = (year: number, month: number, day: number): IsoDate =>
  formatIsoDate(new Date(Date.UTC(year, month - 1, day, 12)));

/** n-th given weekday of a month, 1-based; weekday 0 = Sunday. */
function nthWeekday(year: number, month: number, weekday: number, n: number): IsoDate {
  const first = dayOfWeek(isoDate(year, month, 1));
  const offset = (weekday - first + 7) % 7;
  return isoDate(year, month, 1 + offset + (n - 1) * 7);
}

function lastWeekday(year: number, month: number, weekday: number): IsoDate {
  const lastDay = new Date(Date.UTC(year, month, 0, 12)).getUTCDate();
  const last = isoDate(year, month, lastDay);
  const back = (dayOfWeek(last) - weekday + 7) % 7;
  return addDays(last, -back);
}

/** Saturday holidays move to Friday, Sunday holidays to Monday. */
function observed(date: IsoDate): IsoDate {
  const dow = dayOfWeek(date);
  if (dow === 6) return addDays(date, -1);
  if (dow === 0) return addDays(date, 1);
  return date;
}

function easterSunday(year: number): IsoDate {
  const a = year % 19;
  const b = Math.floor(year / 100);
  const c = year % 100;
  const d = Math.floor(b / 4);
  const e = b % 4;
  const f = Math.floor((b + 8) / 25);
  const g = Math.floor((b - f + 1) / 3);
  const h = (19 * a + b - d - g + 15) % 30;
  const i = Math.floor(c / 4);
  const k = c % 4;
  const l = (32 + 2 * e + 2 * i - h - k) % 7;
  const m = Math.floor((a + 11 * h + 22 * l) / 451);
  const month = Math.floor((h + l - 7 * m + 114) / 31);
  const day = ((h + l - 7 * m + 114) % 31) + 1;
  return isoDate(year, month, day);
}

/** Full-day NYSE closures for a year. */
export function nyseHolidays(year: number): IsoDate[] {
  const holidays: IsoDate[] = [];

  // New Year's Day falling on a Saturday is not observed on the prior Friday.
  const newYear = isoDate(year, 1, 1);
  if (dayOfWeek(newYear) !== 6) {
    holidays.push(observed(newYear));
  }

  if (year >= 1998) {
    holidays.push(nthWeekday(year, 1, 1, 3)); // Martin Luther King Jr. Day
  }
  holidays.push(nthWeekday(year, 2, 1, 3)); // Washington's Birthday
  holidays.push(addDays(easterSunday(year), -2)); // Good Friday
  holidays.push(lastWeekday(year, 5, 1)); // Memorial Day
  if (year >= 2022) {
    holidays.push(observed(isoDate(year, 6, 19))); // Juneteenth
  }
  holidays.push(observed(isoDate(year, 7, 4)));
  holidays.push(nthWeekday(year, 9, 1, 1)); // Labor Day
  holidays.push(nthWeekday(year, 11, 4, 4)); // Thanksgiving
  holidays.push(observed(isoDate(year, 12, 25)));

  return holidays;
}

/**
 * The set of dates on which the market holds a regular session: weekdays
 * that are neither an NYSE holiday nor a configured closure.
 */
export class TradingCalendar {
  private readonly extraClosures: Set<IsoDate>;
  private readonly holidaysByYear = new Map<number, Set<IsoDate>>();
  readonly maxHorizonDays: number;

  constructor(options: TradingCalendarOptions = {}) {
    this.extraClosures = new Set(options.extraClosures ?? []);
    this.maxHorizonDays = options.maxHorizonDays ?? DEFAULT_HORIZON_DAYS;
  }

  isHoliday(date: IsoDate): boolean {
    const year = Number(date.slice(0, 4));
    let holidays = this.holidaysByYear.get(year);
    if (!holidays) {
      holidays = new Set(nyseHolidays(year));
      this.holidaysByYear.set(year, holidays);
    }
    return holidays.has(date) || this.extraClosures.has(date);
  }

  isTradingDay(date: IsoDate): boolean {
    const dow = dayOfWeek(date);
    return dow !== 0 && dow !== 6 && !this.isHoliday(date);
  }

  /** First trading day strictly after `date`. */
  nextTradingDay(date: IsoDate): IsoDate {
    for (let step = 1; step <= this.maxHorizonDays; step++) {
      const candidate = addDays(date, step);
      if (this.isTradingDay(candidate)) {
        return candidate;
      }
    }
    throw new NoTradingDayError(date, this.maxHorizonDays);
  }

  /** Last trading day strictly before `date`. */
  previousTradingDay(date: IsoDate): IsoDate {
    for (let step = 1; step <= this.maxHorizonDays; step++) {
      const candidate = addDays(date, -step);
      if (this.isTradingDay(candidate)) {
        return candidate;
      }
    }
    throw new NoTradingDayError(date, this.maxHorizonDays);
  }

  /** Trading days in the closed range [from, to], ascending. */
  tradingDaysBetween(from: IsoDate, to: IsoDate): IsoDate[] {
    const days: IsoDate[] = [];
    for (let date = from; date <= to; date = addDays(date, 1)) {
      if (this.isTradingDay(date)) {
        days.push(date);
      }
    }
    return days;
  }
}
