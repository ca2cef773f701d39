/**
 * Step 4: 1-minute Entry Trigger
 */

import type { Bias, ContextStatus, TriggerContext, TriggerStatus, TriggerType } from '@shared/types/pipeline';
import type { Candle } from '../broker/types';
import type { IndicatorSuite } from '../services/indicators/calculator';
import type { StageSeries } from './contracts';
import { latestSession } from './session';

const RANGE_LOOKBACK = 5;
const ATR_PERIOD = 14;
const EMA_PERIOD = 9;
const MOMENTUM_ATR_MULTIPLE = 1.5;
// Invalidation sits this fraction against the latest close
const INVALIDATION_OFFSET = 0.08;

function emptyTriggerContext(status: Exclude<ContextStatus, 'complete'>, bias: Bias, reason: string): TriggerContext {
  return {
    timeframe: '1m',
    status,
    reason,
    latestClose: null,
    bias,
    triggerType: 'none',
    triggerStatus: 'notConfirmed',
    invalidPrice: null,
    indicators: { vwap: null, atr: null, ema9: null },
    entryTriggerConfirmed: false,
  };
}

function detectTrigger(candles: Candle[], bias: Bias, vwap: number | null, atr: number | null): TriggerType {
  if (bias === 'neutral') return 'none';
  const bullish = bias === 'bullish';
  const latest = candles[candles.length - 1];
  const previous = candles.length > 1 ? candles[candles.length - 2] : null;
  const prior = candles.slice(-(RANGE_LOOKBACK + 1), -1);

  if (prior.length > 0) {
    const rangeHigh = Math.max(...prior.map(c => c.high));
    const rangeLow = Math.min(...prior.map(c => c.low));
    if (bullish ? latest.close > rangeHigh : latest.close < rangeLow) return 'rangeBreak';
  }

  if (vwap !== null && previous !== null) {
    const reclaimed = bullish
      ? previous.close < vwap && latest.close > vwap
      : previous.close > vwap && latest.close < vwap;
    if (reclaimed) return 'vwapReclaim';
  }

  if (atr !== null && atr > 0) {
    const burst = latest.high - latest.low > MOMENTUM_ATR_MULTIPLE * atr;
    const withBias = bullish ? latest.close > latest.open : latest.close < latest.open;
    if (burst && withBias) return 'momentumBurst';
  }

  return 'none';
}

export function buildTriggerContext(series: StageSeries, bias: Bias, indicators: IndicatorSuite): TriggerContext {
  if (series.status !== 'complete') {
    return emptyTriggerContext(series.status, bias, series.reason);
  }

  const { candles } = series;
  const latest = candles[candles.length - 1];
  const vwap = indicators.vwap(latestSession(candles));
  const atr = indicators.atr(candles, ATR_PERIOD);
  const ema9 = indicators.ema(candles.map(c => c.close), EMA_PERIOD);

  const triggerType = detectTrigger(candles, bias, vwap, atr);

  let triggerStatus: TriggerStatus;
  if (triggerType !== 'none') {
    triggerStatus = 'confirmed';
  } else if (vwap !== null && ((bias === 'bullish' && latest.close > vwap) || (bias === 'bearish' && latest.close < vwap))) {
    triggerStatus = 'forming';
  } else {
    triggerStatus = 'notConfirmed';
  }

  const invalidPrice = bias === 'bearish'
    ? latest.close * (1 + INVALIDATION_OFFSET)
    : latest.close * (1 - INVALIDATION_OFFSET);

  const entryTriggerConfirmed = triggerStatus === 'confirmed';

  return {
    timeframe: '1m',
    status: 'complete',
    reason: entryTriggerConfirmed ? undefined : `trigger ${triggerStatus}`,
    latestClose: latest.close,
    bias,
    triggerType,
    triggerStatus,
    invalidPrice,
    indicators: { vwap, atr, ema9 },
    entryTriggerConfirmed,
  };
}
