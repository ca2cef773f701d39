/**
 * Market session and volatility flags for the structured brief
 */

import type { Bias, MarketConditions, SessionPhase, VolatilityRegime } from '@shared/types/pipeline';

export const EXCHANGE_TIMEZONE = 'Asia/Kolkata';

// India VIX thresholds
const VIX_LOW_THRESHOLD = 12;
const VIX_NORMAL_CEILING = 20;
const VIX_HIGH_CEILING = 30;

const exchangeClock = new Intl.DateTimeFormat('en-US', {
  timeZone: EXCHANGE_TIMEZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: 'numeric',
  minute: 'numeric',
  hour12: false,
});

/**
 * Get exchange-time components reliably using Intl.DateTimeFormat.formatToParts()
 * This works correctly regardless of the server's local timezone
 */
export function getExchangeTimeComponents(date: Date = new Date()): {
  hour: number;
  minute: number;
  isoDate: string;
} {
  let hour = 0, minute = 0, year = '', month = '', day = '';
  for (const part of exchangeClock.formatToParts(date)) {
    if (part.type === 'hour') hour = parseInt(part.value, 10);
    if (part.type === 'minute') minute = parseInt(part.value, 10);
    if (part.type === 'year') year = part.value;
    if (part.type === 'month') month = part.value;
    if (part.type === 'day') day = part.value;
  }

  // hour12: false can report midnight as 24
  if (hour === 24) hour = 0;

  return { hour, minute, isoDate: `${year}-${month}-${day}` };
}

export function getSessionPhase(date: Date): SessionPhase {
  const { hour } = getExchangeTimeComponents(date);
  if (hour < 11) return 'open';
  if (hour < 14) return 'mid';
  return 'close';
}

export function getVolatilityRegime(vix: number | null): VolatilityRegime {
  if (vix === null) return 'unknown';
  if (vix < VIX_LOW_THRESHOLD) return 'low';
  if (vix <= VIX_NORMAL_CEILING) return 'normal';
  if (vix <= VIX_HIGH_CEILING) return 'high';
  return 'extreme';
}

export interface MarketConditionInput {
  now: Date;
  vix: number | null;
  /** Expiry the option chain was fetched for (YYYY-MM-DD) */
  selectedExpiry: string | null;
  eventDates: string[];
  trendBias: Bias;
}

export function assessMarketConditions(input: MarketConditionInput): MarketConditions {
  const { isoDate } = getExchangeTimeComponents(input.now);
  const volatilityRegime = getVolatilityRegime(input.vix);
  const expiryDay = input.selectedExpiry !== null && input.selectedExpiry.slice(0, 10) === isoDate;
  const eventDay = input.eventDates.includes(isoDate);

  let noTradeReason: string | null = null;
  if (volatilityRegime === 'low' && input.trendBias === 'neutral') {
    noTradeReason = 'Low VIX with a sideways 15m trend';
  } else if (expiryDay) {
    noTradeReason = 'Expiry day';
  } else if (eventDay) {
    noTradeReason = 'Major event day';
  }

  return {
    sessionPhase: getSessionPhase(input.now),
    volatilityRegime,
    vix: input.vix,
    expiryDay,
    eventDay,
    eventRisk: expiryDay || eventDay,
    noTradeReason,
  };
}

/**
 * Candles belonging to the same exchange day as the last candle
 */
export function latestSession<T extends { timestamp: number }>(candles: T[]): T[] {
  if (candles.length === 0) return [];
  const lastDay = getExchangeTimeComponents(new Date(candles[candles.length - 1].timestamp * 1000)).isoDate;
  return candles.filter(c => getExchangeTimeComponents(new Date(c.timestamp * 1000)).isoDate === lastDay);
}
