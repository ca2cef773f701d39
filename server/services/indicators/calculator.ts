/**
 * Technical indicators consumed by the timeframe stages.
 * Every function returns null when the series is too short to be meaningful.
 */

import type { Candle } from '../../broker/types';

export interface IndicatorSuite {
  ema(values: number[], period: number): number | null;
  rsi(values: number[], period: number): number | null;
  atr(candles: Candle[], period: number): number | null;
  adx(candles: Candle[], period: number): number | null;
  vwap(candles: Candle[]): number | null;
}

// Simple Moving Average
export function sma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  const slice = values.slice(-period);
  return slice.reduce((a, b) => a + b, 0) / period;
}

// Exponential Moving Average, seeded with the SMA of the first `period` values
export function ema(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  const k = 2 / (period + 1);
  let emaValue = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
  for (let i = period; i < values.length; i++) {
    emaValue = values[i] * k + emaValue * (1 - k);
  }
  return emaValue;
}

// Relative Strength Index over the last `period` changes
export function rsi(values: number[], period: number = 14): number | null {
  if (period <= 0 || values.length < period + 1) return null;

  let gains = 0, losses = 0;
  for (let i = values.length - period; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    if (change > 0) gains += change;
    else losses -= change;
  }

  if (losses === 0) return gains === 0 ? 50 : 100;
  const rs = gains / losses;
  return 100 - (100 / (1 + rs));
}

function trueRange(current: Candle, previous: Candle): number {
  return Math.max(
    current.high - current.low,
    Math.abs(current.high - previous.close),
    Math.abs(current.low - previous.close)
  );
}

// Average True Range (simple average of the last `period` true ranges)
export function atr(candles: Candle[], period: number = 14): number | null {
  if (period <= 0 || candles.length < period + 1) return null;

  const trueRanges: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    trueRanges.push(trueRange(candles[i], candles[i - 1]));
  }

  return sma(trueRanges, period);
}

// Average Directional Index with Wilder smoothing. Needs 2 * period + 1 candles.
export function adx(candles: Candle[], period: number = 14): number | null {
  if (period <= 0 || candles.length < period * 2 + 1) return null;

  const tr: number[] = [];
  const plusDm: number[] = [];
  const minusDm: number[] = [];

  for (let i = 1; i < candles.length; i++) {
    const up = candles[i].high - candles[i - 1].high;
    const down = candles[i - 1].low - candles[i].low;
    plusDm.push(up > down && up > 0 ? up : 0);
    minusDm.push(down > up && down > 0 ? down : 0);
    tr.push(trueRange(candles[i], candles[i - 1]));
  }

  let smoothTr = tr.slice(0, period).reduce((a, b) => a + b, 0);
  let smoothPlus = plusDm.slice(0, period).reduce((a, b) => a + b, 0);
  let smoothMinus = minusDm.slice(0, period).reduce((a, b) => a + b, 0);

  const dx: number[] = [];
  const pushDx = () => {
    if (smoothTr === 0) {
      dx.push(0);
      return;
    }
    const plusDi = (100 * smoothPlus) / smoothTr;
    const minusDi = (100 * smoothMinus) / smoothTr;
    const sum = plusDi + minusDi;
    dx.push(sum === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / sum);
  };

  pushDx();
  for (let i = period; i < tr.length; i++) {
    smoothTr = smoothTr - smoothTr / period + tr[i];
    smoothPlus = smoothPlus - smoothPlus / period + plusDm[i];
    smoothMinus = smoothMinus - smoothMinus / period + minusDm[i];
    pushDx();
  }

  if (dx.length < period) return null;

  let adxValue = dx.slice(0, period).reduce((a, b) => a + b, 0) / period;
  for (let i = period; i < dx.length; i++) {
    adxValue = (adxValue * (period - 1) + dx[i]) / period;
  }
  return adxValue;
}

// Volume Weighted Average Price over the given candles.
// Index candles carry no volume, so fall back to the mean typical price.
export function vwap(candles: Candle[]): number | null {
  if (candles.length === 0) return null;

  let weighted = 0;
  let volume = 0;
  let typicalSum = 0;
  for (const c of candles) {
    const typical = (c.high + c.low + c.close) / 3;
    weighted += typical * c.volume;
    volume += c.volume;
    typicalSum += typical;
  }

  return volume > 0 ? weighted / volume : typicalSum / candles.length;
}

export const defaultIndicators: IndicatorSuite = {
  ema,
  rsi,
  atr,
  adx,
  vwap,
};
