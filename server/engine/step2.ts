/**
 * Step 2: 5-minute Setup Context
 * Is there a tradeable structure in the direction the 15m trend allows?
 */

import type { Bias, ContextStatus, SetupContext, SetupQuality, SetupType } from '@shared/types/pipeline';
import type { Candle } from '../broker/types';
import type { IndicatorSuite } from '../services/indicators/calculator';
import type { StageSeries } from './contracts';
import { latestSession } from './session';

const EMA_PERIOD = 9;
const ATR_PERIOD = 14;
const BREAKOUT_LOOKBACK = 12;
// How close the candle low (or high) must come to EMA(9) to count as a pullback
const PULLBACK_TOLERANCE = 0.002;

function emptySetupContext(status: Exclude<ContextStatus, 'complete'>, bias: Bias, reason: string): SetupContext {
  return {
    timeframe: '5m',
    status,
    reason,
    latestClose: null,
    bias,
    setupType: 'none',
    momentumAligned: false,
    quality: 'low',
    invalidations: [],
    indicators: { ema9: null, vwap: null, atr: null },
    proceedToEntry: false,
  };
}

function detectSetup(latest: Candle, prior: Candle[], ema9: number | null, bias: Bias): SetupType {
  if (bias === 'neutral') return 'none';
  const bullish = bias === 'bullish';

  if (prior.length > 0) {
    const rangeHigh = Math.max(...prior.map(c => c.high));
    const rangeLow = Math.min(...prior.map(c => c.low));
    if (bullish ? latest.close > rangeHigh : latest.close < rangeLow) return 'breakout';
  }

  if (ema9 === null) return 'none';

  const touched = bullish
    ? latest.low <= ema9 * (1 + PULLBACK_TOLERANCE)
    : latest.high >= ema9 * (1 - PULLBACK_TOLERANCE);
  const closedOnSide = bullish ? latest.close > ema9 : latest.close < ema9;

  if (touched && closedOnSide) return 'pullback';
  if (closedOnSide) return 'trendContinuation';
  return 'none';
}

function qualityFrom(setupType: SetupType, momentumAligned: boolean, invalidations: string[]): SetupQuality {
  let points = 0;
  if (setupType === 'pullback' || setupType === 'breakout') points++;
  if (momentumAligned) points++;
  if (invalidations.length === 0) points++;
  if (points === 3) return 'high';
  if (points === 2) return 'medium';
  return 'low';
}

/**
 * Build the 5m context against the 15m bias
 */
export function buildSetupContext(series: StageSeries, bias: Bias, indicators: IndicatorSuite): SetupContext {
  if (series.status !== 'complete') {
    return emptySetupContext(series.status, bias, series.reason);
  }

  const { candles } = series;
  const closes = candles.map(c => c.close);
  const latest = candles[candles.length - 1];
  const prior = candles.slice(-(BREAKOUT_LOOKBACK + 1), -1);

  const ema9 = indicators.ema(closes, EMA_PERIOD);
  const vwap = indicators.vwap(latestSession(candles));
  const atr = indicators.atr(candles, ATR_PERIOD);

  const setupType = detectSetup(latest, prior, ema9, bias);
  const momentumAligned = ema9 !== null && (
    (bias === 'bullish' && latest.close > ema9) ||
    (bias === 'bearish' && latest.close < ema9)
  );

  const invalidations: string[] = [];
  if (bias === 'bullish' && latest.close < latest.open) invalidations.push('weakClose');
  if (bias === 'bearish' && latest.close > latest.open) invalidations.push('weakClose');
  if (vwap !== null) {
    if (bias === 'bullish' && latest.close < vwap) invalidations.push('belowVwap');
    if (bias === 'bearish' && latest.close > vwap) invalidations.push('aboveVwap');
  }

  const proceedToEntry = setupType !== 'none' && momentumAligned && invalidations.length === 0;

  let reason: string | undefined;
  if (!proceedToEntry) {
    if (setupType === 'none') reason = 'no setup';
    else if (!momentumAligned) reason = 'momentum not aligned with 15m bias';
    else reason = `invalidated: ${invalidations.join(', ')}`;
  }

  return {
    timeframe: '5m',
    status: 'complete',
    reason,
    latestClose: latest.close,
    bias,
    setupType,
    momentumAligned,
    quality: qualityFrom(setupType, momentumAligned, invalidations),
    invalidations,
    indicators: { ema9, vwap, atr },
    proceedToEntry,
  };
}
