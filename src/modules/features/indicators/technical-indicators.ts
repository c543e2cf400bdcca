import { Injectable } from '@nestjs/common';
import { IndicatorFeatures, IndicatorRow, PriceBar } from '../../../common/interfaces';

export interface IndicatorPeriods {
  rsi: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  bollinger: number;
  bollingerStdDev: number;
  volumeMa: number;
}

export const DEFAULT_PERIODS: IndicatorPeriods = {
  rsi: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  bollinger: 20,
  bollingerStdDev: 2,
  volumeMa: 20,
};

/** Index of the first bar at which every indicator has a value. */
export function warmUpLength(periods: IndicatorPeriods = DEFAULT_PERIODS): number {
  return Math.max(
    periods.rsi,
    periods.macdSlow + periods.macdSignal - 2,
    periods.bollinger - 1,
    periods.volumeMa - 1,
  );
}

/**
 * Indicator series over a bar history. Every value at index i is computed
 * from values at indices <= i only; positions still warming up hold NaN.
 */
@Injectable()
export class TechnicalIndicators {
  // Simple Moving Average
  smaSeries(values: number[], period: number): number[] {
    const out = new Array<number>(values.length).fill(NaN);
    let sum = 0;
    for (let i = 0; i < values.length; i++) {
      sum += values[i];
      if (i >= period) {
        sum -= values[i - period];
      }
      if (i >= period - 1) {
        out[i] = sum / period;
      }
    }
    return out;
  }

  // Exponential Moving Average, seeded with the SMA of the first `period` values
  emaSeries(values: number[], period: number): number[] {
    const out = new Array<number>(values.length).fill(NaN);
    const start = values.findIndex((value) => !Number.isNaN(value));
    if (start < 0 || values.length - start < period) {
      return out;
    }

    const multiplier = 2 / (period + 1);
    let ema = 0;
    for (let i = start; i < start + period; i++) {
      ema += values[i];
    }
    ema /= period;
    out[start + period - 1] = ema;

    for (let i = start + period; i < values.length; i++) {
      ema = (values[i] - ema) * multiplier + ema;
      out[i] = ema;
    }
    return out;
  }

  // Relative Strength Index, Wilder smoothing
  rsiSeries(closes: number[], period: number = 14): number[] {
    const out = new Array<number>(closes.length).fill(NaN);
    if (closes.length < period + 1) {
      return out;
    }

    let gains = 0;
    let losses = 0;
    for (let i = 1; i <= period; i++) {
      const diff = closes[i] - closes[i - 1];
      if (diff >= 0) {
        gains += diff;
      } else {
        losses -= diff;
      }
    }

    let avgGain = gains / period;
    let avgLoss = losses / period;
    out[period] = this.rsiFrom(avgGain, avgLoss);

    for (let i = period + 1; i < closes.length; i++) {
      const diff = closes[i] - closes[i - 1];
      avgGain = (avgGain * (period - 1) + Math.max(diff, 0)) / period;
      avgLoss = (avgLoss * (period - 1) + Math.max(-diff, 0)) / period;
      out[i] = this.rsiFrom(avgGain, avgLoss);
    }
    return out;
  }

  // MACD (Moving Average Convergence Divergence)
  macdSeries(
    closes: number[],
    fastPeriod: number = 12,
    slowPeriod: number = 26,
    signalPeriod: number = 9,
  ): { line: number[]; signal: number[]; histogram: number[] } {
    const fast = this.emaSeries(closes, fastPeriod);
    const slow = this.emaSeries(closes, slowPeriod);
    const line = closes.map((_, i) => fast[i] - slow[i]);
    const signal = this.emaSeries(line, signalPeriod);
    const histogram = line.map((value, i) => value - signal[i]);
    return { line, signal, histogram };
  }

  // Bollinger Bands, population standard deviation
  bollingerSeries(
    closes: number[],
    period: number = 20,
    stdDev: number = 2,
  ): { middle: number[]; upper: number[]; lower: number[] } {
    const middle = this.smaSeries(closes, period);
    const upper = new Array<number>(closes.length).fill(NaN);
    const lower = new Array<number>(closes.length).fill(NaN);

    for (let i = period - 1; i < closes.length; i++) {
      let squared = 0;
      for (let j = i - period + 1; j <= i; j++) {
        squared += Math.pow(closes[j] - middle[i], 2);
      }
      const deviation = Math.sqrt(squared / period);
      upper[i] = middle[i] + stdDev * deviation;
      lower[i] = middle[i] - stdDev * deviation;
    }
    return { middle, upper, lower };
  }

  /**
   * One row per bar from the warm-up index on. Missing open/high/low fall back
   * to the close and missing volume to 0.
   */
  compute(ticker: string, bars: PriceBar[], periods: IndicatorPeriods = DEFAULT_PERIODS): IndicatorRow[] {
    const sorted = [...bars].sort((a, b) => a.date.localeCompare(b.date));
    const closes = sorted.map((bar) => bar.close);
    const volumes = sorted.map((bar) => bar.volume ?? 0);

    const rsi = this.rsiSeries(closes, periods.rsi);
    const macd = this.macdSeries(closes, periods.macdFast, periods.macdSlow, periods.macdSignal);
    const bands = this.bollingerSeries(closes, periods.bollinger, periods.bollingerStdDev);
    const volumeMa = this.smaSeries(volumes, periods.volumeMa);

    const rows: IndicatorRow[] = [];
    for (let i = warmUpLength(periods); i < sorted.length; i++) {
      const bar = sorted[i];
      const bandRange = bands.upper[i] - bands.lower[i];
      const features: IndicatorFeatures = {
        open: bar.open ?? bar.close,
        high: bar.high ?? bar.close,
        low: bar.low ?? bar.close,
        close: bar.close,
        volume: volumes[i],
        rsi: rsi[i],
        macdLine: macd.line[i],
        macdSignal: macd.signal[i],
        macdHistogram: macd.histogram[i],
        bbMiddle: bands.middle[i],
        bbUpper: bands.upper[i],
        bbLower: bands.lower[i],
        bbWidth: bands.middle[i] !== 0 ? bandRange / bands.middle[i] : 0,
        bbPosition: bandRange > 0 ? (bar.close - bands.lower[i]) / bandRange : 0.5,
        volumeMa: volumeMa[i],
        volumeRatio: volumeMa[i] > 0 ? volumes[i] / volumeMa[i] : 1,
      };
      rows.push({ ticker: ticker.toUpperCase(), date: bar.date, features });
    }
    return rows;
  }

  private rsiFrom(avgGain: number, avgLoss: number): number {
    if (avgLoss === 0) return 100;
    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  }
}
