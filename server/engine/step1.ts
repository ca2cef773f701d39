/**
 * Step 1: 15-minute Trend Context
 * Should we trade this symbol at all, and in which direction?
 */

import type { ContextStatus, StrengthLabel, TrendContext } from '@shared/types/pipeline';
import type { IndicatorSuite } from '../services/indicators/calculator';
import {
  allowedDirectionFor,
  biasFromEmas,
  emaStackLabel,
  strengthFromAdx,
  tradePermission,
  type StageSeries,
} from './contracts';

const FAST_EMA = 9;
const SLOW_EMA = 21;
const ADX_PERIOD = 14;
const RSI_PERIOD = 14;

// Without ADX, an EMA gap wider than this fraction of price counts as a strong trend
const EMA_GAP_STRONG = 0.01;

function emptyTrendContext(status: Exclude<ContextStatus, 'complete'>, reason: string): TrendContext {
  return {
    timeframe: '15m',
    status,
    reason,
    latestClose: null,
    bias: 'neutral',
    strength: 'unknown',
    emaStack: 'unknown',
    allowedDirection: 'none',
    indicators: { ema9: null, ema21: null, adx: null, rsi: null },
    tradeAllowed: false,
  };
}

function strengthFrom(adx: number | null, ema9: number | null, ema21: number | null, close: number): StrengthLabel {
  if (adx !== null) return strengthFromAdx(adx);
  if (ema9 === null || ema21 === null || close <= 0) return 'unknown';
  return Math.abs(ema9 - ema21) / close > EMA_GAP_STRONG ? 'strong' : 'weak';
}

/**
 * Build the 15m context. Missing indicators degrade to neutral/unknown labels.
 */
export function buildTrendContext(series: StageSeries, indicators: IndicatorSuite): TrendContext {
  if (series.status !== 'complete') {
    return emptyTrendContext(series.status, series.reason);
  }

  const { candles } = series;
  const closes = candles.map(c => c.close);
  const latestClose = closes[closes.length - 1];

  const ema9 = indicators.ema(closes, FAST_EMA);
  const ema21 = indicators.ema(closes, SLOW_EMA);
  const adx = indicators.adx(candles, ADX_PERIOD);
  const rsi = indicators.rsi(closes, RSI_PERIOD);

  const bias = biasFromEmas(ema9, ema21);
  const strength = strengthFrom(adx, ema9, ema21, latestClose);
  const tradeAllowed = tradePermission('complete', bias, adx) && strength !== 'unknown';

  let reason: string | undefined;
  if (!tradeAllowed) {
    if (bias === 'neutral') reason = 'no directional bias';
    else if (strength === 'unknown') reason = 'trend strength unknown';
    else reason = `trend too weak (ADX ${adx === null ? 'n/a' : adx.toFixed(1)})`;
  }

  return {
    timeframe: '15m',
    status: 'complete',
    reason,
    latestClose,
    bias,
    strength,
    emaStack: emaStackLabel(latestClose, ema9, ema21),
    allowedDirection: allowedDirectionFor(bias, tradeAllowed),
    indicators: { ema9, ema21, adx, rsi },
    tradeAllowed,
  };
}
