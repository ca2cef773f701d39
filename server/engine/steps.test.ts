import { describe, expect, it } from 'vitest';
import type { Candle, OptionChain, OptionQuote } from '../broker/types';
import type { IndicatorSuite } from '../services/indicators/calculator';
import { seriesFromCandles, type StageSeries } from './contracts';
import { buildTrendContext } from './step1';
import { buildSetupContext } from './step2';
import { nearestStrike, selectCandidates } from './step3';
import { buildTriggerContext } from './step4';

interface FakeValues {
  ema?: Record<number, number | null>;
  adx?: number | null;
  rsi?: number | null;
  atr?: number | null;
  vwap?: number | null;
}

function fakeIndicators(values: FakeValues): IndicatorSuite {
  return {
    ema: (_closes, period) => values.ema?.[period] ?? null,
    rsi: () => values.rsi ?? null,
    atr: () => values.atr ?? null,
    adx: () => values.adx ?? null,
    vwap: () => values.vwap ?? null,
  };
}

// 2026-03-10 09:15 IST
const SESSION_START = 1773114300;

function bar(i: number, open: number, high: number, low: number, close: number): Candle {
  return { timestamp: SESSION_START + i * 300, open, high, low, close, volume: 0 };
}

function flat(count: number, high = 110, low = 90, close = 100): Candle[] {
  return Array.from({ length: count }, (_, i) => bar(i, close, high, low, close));
}

function complete(candles: Candle[]): StageSeries {
  return seriesFromCandles(candles);
}

describe('buildTrendContext', () => {
  const candles = [...flat(20), bar(20, 108, 111, 107, 110)];

  it('allows a strong bullish trend', () => {
    const ctx = buildTrendContext(complete(candles), fakeIndicators({ ema: { 9: 105, 21: 100 }, adx: 28, rsi: 62 }));

    expect(ctx.status).toBe('complete');
    expect(ctx.bias).toBe('bullish');
    expect(ctx.strength).toBe('strong');
    expect(ctx.emaStack).toBe('bullish');
    expect(ctx.allowedDirection).toBe('CE');
    expect(ctx.tradeAllowed).toBe(true);
    expect(ctx.reason).toBeUndefined();
    expect(ctx.latestClose).toBe(110);
  });

  it('blocks a weak trend and says why', () => {
    const ctx = buildTrendContext(complete(candles), fakeIndicators({ ema: { 9: 105, 21: 100 }, adx: 15 }));
    expect(ctx.strength).toBe('weak');
    expect(ctx.tradeAllowed).toBe(false);
    expect(ctx.allowedDirection).toBe('none');
    expect(ctx.reason).toBe('trend too weak (ADX 15.0)');
  });

  it('degrades to neutral when EMAs are missing', () => {
    const ctx = buildTrendContext(complete(candles), fakeIndicators({}));
    expect(ctx.bias).toBe('neutral');
    expect(ctx.strength).toBe('unknown');
    expect(ctx.emaStack).toBe('unknown');
    expect(ctx.tradeAllowed).toBe(false);
    expect(ctx.reason).toBe('no directional bias');
  });

  it('falls back to the EMA gap when ADX is absent', () => {
    const ctx = buildTrendContext(complete(candles), fakeIndicators({ ema: { 9: 105, 21: 100 } }));
    expect(ctx.strength).toBe('strong');
    expect(ctx.tradeAllowed).toBe(true);
  });

  it('fails closed on a fetch error', () => {
    const ctx = buildTrendContext({ status: 'error', reason: 'Dhan API error 500' }, fakeIndicators({ ema: { 9: 105, 21: 100 }, adx: 30 }));
    expect(ctx.status).toBe('error');
    expect(ctx.reason).toBe('Dhan API error 500');
    expect(ctx.tradeAllowed).toBe(false);
  });
});

describe('buildSetupContext', () => {
  const pullback = bar(12, 100, 104, 100.1, 103);

  it('detects a clean pullback to EMA(9)', () => {
    const ctx = buildSetupContext(complete([...flat(12), pullback]), 'bullish', fakeIndicators({ ema: { 9: 100 }, vwap: 101, atr: 3 }));

    expect(ctx.setupType).toBe('pullback');
    expect(ctx.momentumAligned).toBe(true);
    expect(ctx.invalidations).toEqual([]);
    expect(ctx.quality).toBe('high');
    expect(ctx.proceedToEntry).toBe(true);
    expect(ctx.indicators).toEqual({ ema9: 100, vwap: 101, atr: 3 });
  });

  it('detects a breakout above the prior range', () => {
    const ctx = buildSetupContext(complete([...flat(12), bar(12, 105, 113, 104, 112)]), 'bullish', fakeIndicators({ ema: { 9: 100 }, vwap: 101 }));
    expect(ctx.setupType).toBe('breakout');
    expect(ctx.proceedToEntry).toBe(true);
  });

  it('records a weak close as an invalidation', () => {
    const ctx = buildSetupContext(complete([...flat(12), bar(12, 104, 104.5, 100.1, 103)]), 'bullish', fakeIndicators({ ema: { 9: 100 }, vwap: 101 }));
    expect(ctx.invalidations).toEqual(['weakClose']);
    expect(ctx.quality).toBe('medium');
    expect(ctx.proceedToEntry).toBe(false);
    expect(ctx.reason).toBe('invalidated: weakClose');
  });

  it('flags a close on the wrong side of VWAP', () => {
    const ctx = buildSetupContext(complete([...flat(12), pullback]), 'bullish', fakeIndicators({ ema: { 9: 100 }, vwap: 103.5 }));
    expect(ctx.invalidations).toEqual(['belowVwap']);
    expect(ctx.proceedToEntry).toBe(false);
  });

  it('reports momentum against the 15m bias', () => {
    const ctx = buildSetupContext(complete([...flat(12), bar(12, 105, 113, 104, 112)]), 'bullish', fakeIndicators({ ema: { 9: 115 } }));
    expect(ctx.setupType).toBe('breakout');
    expect(ctx.momentumAligned).toBe(false);
    expect(ctx.reason).toBe('momentum not aligned with 15m bias');
  });

  it('finds no setup when price closes against a bearish bias', () => {
    const ctx = buildSetupContext(complete([...flat(12), pullback]), 'bearish', fakeIndicators({ ema: { 9: 100 }, vwap: 101 }));
    expect(ctx.setupType).toBe('none');
    expect(ctx.reason).toBe('no setup');
    expect(ctx.proceedToEntry).toBe(false);
  });

  it('keeps the bias on an empty series', () => {
    const ctx = buildSetupContext(seriesFromCandles([]), 'bearish', fakeIndicators({}));
    expect(ctx.status).toBe('noData');
    expect(ctx.bias).toBe('bearish');
    expect(ctx.proceedToEntry).toBe(false);
  });
});

function optionQuote(strike: number, optionType: 'CE' | 'PE', bid: number | null, ask: number | null, delta: number): OptionQuote {
  return {
    strike,
    optionType,
    bid,
    ask,
    lastPrice: ask,
    iv: null,
    previousIv: null,
    oi: null,
    previousOi: null,
    greeks: { delta, gamma: 0.012, theta: -6, vega: 10 },
  };
}

function chain(quotes: OptionQuote[], spot: number | null = 24010): OptionChain {
  return { symbol: 'NIFTY', spot, expiries: ['2026-03-12'], selectedExpiry: '2026-03-12', strikes: quotes };
}

describe('selectCandidates', () => {
  const quotes = [
    optionQuote(23950, 'CE', 160, 161, 0.58),
    optionQuote(24000, 'CE', 120, 120.6, 0.52),
    optionQuote(24050, 'CE', 90, 90.5, 0.41),
    optionQuote(24100, 'CE', 60, 60.4, 0.3),
    optionQuote(23950, 'PE', 95, 95.5, -0.4),
    optionQuote(24000, 'PE', 118, 118.6, -0.49),
    optionQuote(24050, 'PE', 150, 151, -0.6),
  ];

  it('keeps ATM and the next OTM call for a bullish bias, best score first', () => {
    const selection = selectCandidates(chain(quotes), 'bullish', null, 1.0);

    expect(selection.optionType).toBe('CE');
    expect(selection.atmStrike).toBe(24000);
    // 24050 has delta 0.41 (3 points) against 0.52 (2 points) at the money
    expect(selection.candidates.map(c => [c.strike, c.moneyness])).toEqual([
      [24050, 'OTM'],
      [24000, 'ATM'],
    ]);
    expect(selection.reason).toBeUndefined();
  });

  it('walks down the chain for puts', () => {
    const selection = selectCandidates(chain(quotes), 'bearish', null, 1.0);
    expect(selection.optionType).toBe('PE');
    expect(selection.candidates.map(c => c.strike).sort()).toEqual([23950, 24000]);
  });

  it('rejects wide spreads and one-sided quotes', () => {
    const selection = selectCandidates(
      chain([optionQuote(24000, 'CE', null, 120, 0.5), optionQuote(24050, 'CE', 40, 44, 0.4)]),
      'bullish',
      null,
      1.0,
    );
    expect(selection.candidates).toEqual([]);
    expect(selection.rejected).toEqual([
      { strike: 24000, optionType: 'CE', reason: 'no two-sided quote' },
      { strike: 24050, optionType: 'CE', reason: 'spread 9.52% above 1%' },
    ]);
    expect(selection.reason).toBe('no liquid strikes');
  });

  it('uses the fallback spot when the chain has none', () => {
    const selection = selectCandidates(chain(quotes, null), 'bullish', 24060, 1.0);
    expect(selection.spot).toBe(24060);
    expect(selection.atmStrike).toBe(24050);
  });

  it('returns nothing without a bias or a price', () => {
    expect(selectCandidates(chain(quotes), 'neutral', null, 1.0).reason).toBe('no directional bias');
    expect(selectCandidates(chain(quotes, null), 'bullish', null, 1.0).reason).toBe('no underlying price');
  });

  it('breaks strike ties toward the lower strike', () => {
    expect(nearestStrike([24000, 24100], 24050)).toBe(24000);
    expect(nearestStrike([], 24050)).toBeNull();
  });
});

describe('buildTriggerContext', () => {
  const prior = Array.from({ length: 6 }, (_, i) => bar(i, 100, 101, 99, 100));

  it('confirms a break of the prior five-candle range', () => {
    const ctx = buildTriggerContext(complete([...prior, bar(6, 100, 102.5, 99.8, 102)]), 'bullish', fakeIndicators({ vwap: 100 }));
    expect(ctx.triggerType).toBe('rangeBreak');
    expect(ctx.triggerStatus).toBe('confirmed');
    expect(ctx.entryTriggerConfirmed).toBe(true);
    expect(ctx.invalidPrice).toBeCloseTo(93.84, 8);
    expect(ctx.reason).toBeUndefined();
  });

  it('confirms a VWAP reclaim', () => {
    const ctx = buildTriggerContext(complete([...prior, bar(6, 100, 100.8, 99.9, 100.5)]), 'bullish', fakeIndicators({ vwap: 100.2 }));
    expect(ctx.triggerType).toBe('vwapReclaim');
    expect(ctx.entryTriggerConfirmed).toBe(true);
  });

  it('confirms a momentum burst larger than 1.5 ATR', () => {
    const ctx = buildTriggerContext(complete([...prior, bar(6, 99.2, 100.9, 99.0, 100.8)]), 'bullish', fakeIndicators({ atr: 1 }));
    expect(ctx.triggerType).toBe('momentumBurst');
    expect(ctx.triggerStatus).toBe('confirmed');
  });

  it('reports a forming trigger above VWAP without a break', () => {
    const ctx = buildTriggerContext(complete([...prior, bar(6, 100, 100.8, 99.9, 100.5)]), 'bullish', fakeIndicators({ vwap: 99.5 }));
    expect(ctx.triggerType).toBe('none');
    expect(ctx.triggerStatus).toBe('forming');
    expect(ctx.entryTriggerConfirmed).toBe(false);
    expect(ctx.reason).toBe('trigger forming');
  });

  it('reports notConfirmed below VWAP', () => {
    const ctx = buildTriggerContext(complete([...prior, bar(6, 100, 100.2, 99.4, 99.5)]), 'bullish', fakeIndicators({ vwap: 100 }));
    expect(ctx.triggerStatus).toBe('notConfirmed');
    expect(ctx.reason).toBe('trigger notConfirmed');
  });

  it('places the bearish invalidation above the close', () => {
    const ctx = buildTriggerContext(complete([...prior, bar(6, 100, 100.1, 97.5, 98)]), 'bearish', fakeIndicators({}));
    expect(ctx.triggerType).toBe('rangeBreak');
    expect(ctx.invalidPrice).toBeCloseTo(105.84, 8);
  });
});
