/**
 * Context Contracts
 *
 * Pure transforms from computed facts to labelled, gated contexts, and from
 * contexts to the structured brief. Nothing here performs I/O, and nothing
 * that leaves through toStructuredBrief() carries a price series.
 */

import type {
  AllowedDirection,
  Bias,
  ContextStatus,
  EmaStack,
  IvTrend,
  MarketConditions,
  Moneyness,
  OiTrend,
  OptionCandidate,
  SafeCandidate,
  SafeSetupContext,
  SafeTrendContext,
  SafeTriggerContext,
  SetupContext,
  StrengthLabel,
  StructuredBrief,
  TrendContext,
  TriggerContext,
} from '@shared/types/pipeline';
import type { Candle, OptionQuote } from '../broker/types';
import { scoreCandidate } from './strikeScorer';

// Strength ladder (ADX)
export const STRONG_TREND_ADX = 25;
export const MIN_TREND_ADX = 20;

const THETA_RISK_LIMIT = 10;
const GOOD_LIQUIDITY_SPREAD_PCT = 1.0;
const IV_TREND_THRESHOLD = 0.02;
const OI_TREND_THRESHOLD = 0.05;

/**
 * Candles handed to a stage builder, or why there are none
 */
export type StageSeries =
  | { status: 'complete'; candles: Candle[] }
  | { status: 'noData'; reason: string }
  | { status: 'error'; reason: string };

export function seriesFromCandles(candles: Candle[]): StageSeries {
  if (candles.length === 0) return { status: 'noData', reason: 'empty candle series' };
  return { status: 'complete', candles };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function round2OrNull(value: number | null): number | null {
  return value === null ? null : round2(value);
}

/**
 * Human-readable note for a context status
 */
export function describeStatus(status: ContextStatus, reason?: string): string {
  switch (status) {
    case 'complete':
      return 'complete';
    case 'noData':
      return reason ? `no data (${reason})` : 'no data';
    case 'error':
      return reason ? `error (${reason})` : 'error';
    default:
      return assertNever(status);
  }
}

// ============================================
// 15m labels
// ============================================

export function strengthFromAdx(adx: number | null): StrengthLabel {
  if (adx === null) return 'unknown';
  if (adx >= STRONG_TREND_ADX) return 'strong';
  if (adx >= MIN_TREND_ADX) return 'moderate';
  return 'weak';
}

export function biasFromEmas(fast: number | null, slow: number | null): Bias {
  if (fast === null || slow === null) return 'neutral';
  if (fast > slow) return 'bullish';
  if (fast < slow) return 'bearish';
  return 'neutral';
}

export function emaStackLabel(close: number | null, fast: number | null, slow: number | null): EmaStack {
  if (close === null || fast === null || slow === null) return 'unknown';
  if (close > fast && fast > slow) return 'bullish';
  if (close < fast && fast < slow) return 'bearish';
  return 'mixed';
}

/**
 * Permission rule: complete data, a directional bias, and (when present)
 * a strength indicator clearing the minimum threshold.
 */
export function tradePermission(status: ContextStatus, bias: Bias, adx: number | null): boolean {
  if (status !== 'complete') return false;
  if (bias === 'neutral') return false;
  if (adx !== null && adx < MIN_TREND_ADX) return false;
  return true;
}

export function allowedDirectionFor(bias: Bias, permitted: boolean): AllowedDirection {
  if (!permitted) return 'none';
  if (bias === 'bullish') return 'CE';
  if (bias === 'bearish') return 'PE';
  return 'none';
}

// ============================================
// Option candidates
// ============================================

/**
 * |ask - bid| / midpoint * 100. A missing or non-positive side reads as 100%.
 */
export function spreadPercent(bid: number | null, ask: number | null): number {
  if (bid === null || ask === null || bid <= 0 || ask <= 0) return 100;
  const mid = (bid + ask) / 2;
  if (mid <= 0) return 100;
  return (Math.abs(ask - bid) / mid) * 100;
}

export function relativeChange(current: number | null, previous: number | null): number | null {
  if (current === null || previous === null || previous <= 0) return null;
  return (current - previous) / previous;
}

export function ivTrendFrom(change: number | null): IvTrend {
  if (change === null) return 'unknown';
  if (change > IV_TREND_THRESHOLD) return 'rising';
  if (change < -IV_TREND_THRESHOLD) return 'falling';
  return 'flat';
}

export function oiTrendFrom(change: number | null): OiTrend {
  if (change === null) return 'unknown';
  if (change > OI_TREND_THRESHOLD) return 'building';
  if (change < -OI_TREND_THRESHOLD) return 'unwinding';
  return 'flat';
}

export function moneynessOf(quote: Pick<OptionQuote, 'strike' | 'optionType'>, atmStrike: number): Moneyness {
  if (quote.strike === atmStrike) return 'ATM';
  if (quote.optionType === 'CE') return quote.strike > atmStrike ? 'OTM' : 'ITM';
  return quote.strike < atmStrike ? 'OTM' : 'ITM';
}

/**
 * Raw chain quote to a scored candidate
 */
export function toOptionCandidate(quote: OptionQuote, atmStrike: number): OptionCandidate {
  const spreadPct = spreadPercent(quote.bid, quote.ask);
  const ivChange = relativeChange(quote.iv, quote.previousIv);
  const oiChange = relativeChange(quote.oi, quote.previousOi);
  const theta = quote.greeks.theta;

  const base = {
    strike: quote.strike,
    optionType: quote.optionType,
    moneyness: moneynessOf(quote, atmStrike),
    bid: quote.bid,
    ask: quote.ask,
    lastPrice: quote.lastPrice,
    greeks: { ...quote.greeks },
    iv: quote.iv,
    ivChange,
    ivTrend: ivTrendFrom(ivChange),
    oiChange,
    oiTrend: oiTrendFrom(oiChange),
    spreadPct,
    thetaRisk: theta !== null && Math.abs(theta) > THETA_RISK_LIMIT,
    liquidity: spreadPct < GOOD_LIQUIDITY_SPREAD_PCT ? 'good' as const : 'poor' as const,
  };

  return { ...base, score: scoreCandidate(base) };
}

// ============================================
// LLM-safe shapes
// ============================================

export function toSafeTrend(ctx: TrendContext): SafeTrendContext {
  return {
    status: ctx.status,
    bias: ctx.bias,
    strength: ctx.strength,
    emaStack: ctx.emaStack,
    allowedDirection: ctx.allowedDirection,
    adx: round2OrNull(ctx.indicators.adx),
    rsi: round2OrNull(ctx.indicators.rsi),
    tradeAllowed: ctx.tradeAllowed,
  };
}

export function toSafeSetup(ctx: SetupContext): SafeSetupContext {
  return {
    status: ctx.status,
    setupType: ctx.setupType,
    momentumAligned: ctx.momentumAligned,
    quality: ctx.quality,
    invalidations: [...ctx.invalidations],
    proceedToEntry: ctx.proceedToEntry,
  };
}

export function toSafeTrigger(ctx: TriggerContext): SafeTriggerContext {
  return {
    status: ctx.status,
    triggerType: ctx.triggerType,
    triggerStatus: ctx.triggerStatus,
    invalidPrice: round2OrNull(ctx.invalidPrice),
    entryTriggerConfirmed: ctx.entryTriggerConfirmed,
  };
}

export function toSafeCandidate(candidate: OptionCandidate): SafeCandidate {
  return {
    strike: candidate.strike,
    optionType: candidate.optionType,
    moneyness: candidate.moneyness,
    premium: round2OrNull(candidate.lastPrice),
    delta: candidate.greeks.delta === null ? null : Math.round(candidate.greeks.delta * 1000) / 1000,
    spreadPct: round2(candidate.spreadPct),
    ivTrend: candidate.ivTrend,
    oiTrend: candidate.oiTrend,
    thetaRisk: candidate.thetaRisk,
    liquidity: candidate.liquidity,
    score: round2(candidate.score),
  };
}

export interface BriefInput {
  symbol: string;
  now: Date;
  trend: TrendContext;
  setup: SetupContext;
  trigger: TriggerContext;
  candidates: OptionCandidate[];
  market: MarketConditions;
}

export function toStructuredBrief(input: BriefInput): StructuredBrief {
  return {
    symbol: input.symbol,
    generatedAt: input.now.toISOString(),
    timeframes: {
      '15m': toSafeTrend(input.trend),
      '5m': toSafeSetup(input.setup),
      '1m': toSafeTrigger(input.trigger),
    },
    candidates: input.candidates.map(toSafeCandidate),
    market: { ...input.market },
  };
}
