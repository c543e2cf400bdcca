import { NoTradingDayError } from '../../common/errors/pipeline.errors';
import { TradingCalendar, nyseHolidays } from './trading-calendar';

describe('TradingCalendar', () => {
  const calendar = new TradingCalendar();

  describe('nyseHolidays()', () => {
    it('should list the 2026 full-day closures', () => {
      expect(nyseHolidays(2026)).toEqual([
        '2026-01-01',
        '2026-01-19',
        '2026-02-16',
        '2026-04-03',
        '2026-05-25',
        '2026-06-19',
        '2026-07-03',
        '2026-09-07',
        '2026-11-26',
        '2026-12-25',
      ]);
    });

    it('should not observe a Saturday New Year on the prior Friday', () => {
      expect(nyseHolidays(2022)).not.toContain('2021-12-31');
      expect(nyseHolidays(2022)[0]).toBe('2022-01-17');
    });
  });

  describe('isTradingDay()', () => {
    it('should reject weekends and holidays', () => {
      expect(calendar.isTradingDay('2026-03-06')).toBe(true);
      expect(calendar.isTradingDay('2026-03-07')).toBe(false);
      expect(calendar.isTradingDay('2026-03-08')).toBe(false);
      expect(calendar.isTradingDay('2026-04-03')).toBe(false);
    });

    it('should honour configured extra closures', () => {
      const closed = new TradingCalendar({ extraClosures: ['2026-03-11'] });
      expect(closed.isTradingDay('2026-03-11')).toBe(false);
      expect(closed.nextTradingDay('2026-03-10')).toBe('2026-03-12');
    });
  });

  describe('nextTradingDay() / previousTradingDay()', () => {
    it('should skip weekends and the Presidents Day holiday', () => {
      expect(calendar.nextTradingDay('2026-02-13')).toBe('2026-02-17');
      expect(calendar.previousTradingDay('2026-02-17')).toBe('2026-02-13');
    });

    it('should skip Good Friday', () => {
      expect(calendar.nextTradingDay('2026-04-02')).toBe('2026-04-06');
    });

    it('should throw NoTradingDayError past the horizon', () => {
      const short = new TradingCalendar({ maxHorizonDays: 2 });
      expect(() => short.nextTradingDay('2026-03-06')).toThrow(NoTradingDayError);
    });
  });

  describe('tradingDaysBetween()', () => {
    it('should include both ends and skip closed days', () => {
      expect(calendar.tradingDaysBetween('2026-04-01', '2026-04-07')).toEqual([
        '2026-04-01',
        '2026-04-02',
        '2026-04-06',
        '2026-04-07',
      ]);
    });
  });
});
