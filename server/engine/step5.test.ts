import { describe, expect, it } from 'vitest';
import type { OptionCandidate, SetupContext, TrendContext, TriggerContext } from '@shared/types/pipeline';
import {
  applyVerdict,
  bandDecision,
  deterministicRecommendation,
  noTradeRecommendation,
  parseVerdict,
} from './step5';

const trend: TrendContext = {
  timeframe: '15m',
  status: 'complete',
  latestClose: 24000,
  bias: 'bullish',
  strength: 'strong',
  emaStack: 'bullish',
  allowedDirection: 'CE',
  indicators: { ema9: 105, ema21: 100, adx: 28, rsi: 60 },
  tradeAllowed: true,
};

const setup: SetupContext = {
  timeframe: '5m',
  status: 'complete',
  latestClose: 24010,
  bias: 'bullish',
  setupType: 'pullback',
  momentumAligned: true,
  quality: 'high',
  invalidations: [],
  indicators: { ema9: 24000, vwap: 23990, atr: 12 },
  proceedToEntry: true,
};

const trigger: TriggerContext = {
  timeframe: '1m',
  status: 'complete',
  latestClose: 24020,
  bias: 'bullish',
  triggerType: 'rangeBreak',
  triggerStatus: 'confirmed',
  invalidPrice: 22098.4,
  indicators: { vwap: 24005, atr: 4, ema9: 24015 },
  entryTriggerConfirmed: true,
};

const candidate: OptionCandidate = {
  strike: 24000,
  optionType: 'CE',
  moneyness: 'ATM',
  bid: 99.7,
  ask: 100.3,
  lastPrice: 100,
  greeks: { delta: 0.42, gamma: 0.012, theta: -8, vega: 12 },
  iv: 15.45,
  ivChange: 0.03,
  ivTrend: 'rising',
  oiChange: 0.1,
  oiTrend: 'building',
  spreadPct: 0.6,
  thetaRisk: false,
  liquidity: 'good',
  score: 7,
};

const allGates = ['15m', '5m', 'options', '1m'] as const;

function base() {
  return deterministicRecommendation({ trend, setup, trigger, candidates: [candidate], gatesPassed: [...allGates] });
}

describe('bandDecision', () => {
  it('bands confidence into decisions', () => {
    expect(bandDecision(0.7)).toBe('enter');
    expect(bandDecision(0.69)).toBe('wait');
    expect(bandDecision(0.5)).toBe('wait');
    expect(bandDecision(0.49)).toBe('noTrade');
  });
});

describe('deterministicRecommendation', () => {
  it('builds levels from the latest 1m close', () => {
    expect(base()).toEqual({
      decision: 'wait',
      direction: 'CE',
      strike: 24000,
      entry: { low: 23539.6, high: 24500.4 },
      stopLoss: 22098.4,
      targets: [30025, 34829],
      confidence: 0.6,
      rationale: '15m bullish (strong), 5m pullback (high), 1m rangeBreak; best strike 24000 CE scored 7',
      gatesPassed: ['15m', '5m', 'options', '1m'],
      source: 'deterministic',
    });
  });

  it('picks PE for a bearish trend', () => {
    const rec = deterministicRecommendation({
      trend: { ...trend, bias: 'bearish' },
      setup,
      trigger,
      candidates: [{ ...candidate, optionType: 'PE' }],
      gatesPassed: [...allGates],
    });
    expect(rec.direction).toBe('PE');
  });

  it('refuses to recommend without a surviving candidate', () => {
    const rec = deterministicRecommendation({ trend, setup, trigger, candidates: [], gatesPassed: ['15m', '5m'] });
    expect(rec).toEqual(noTradeRecommendation('options: no liquid strikes', ['15m', '5m']));
    expect(rec.confidence).toBe(0);
  });
});

describe('parseVerdict', () => {
  it('reads decimal and percentage confidence', () => {
    expect(parseVerdict('Final answer: enter the 24000 CE. Confidence: 0.82')).toEqual({ confidence: 0.82, avoid: false });
    expect(parseVerdict('Final answer: looks good. Confidence: 85%').confidence).toBe(0.85);
  });

  it('detects an avoid stance', () => {
    expect(parseVerdict('Final answer: avoid this trade, event risk is high. Confidence: 0.4')).toEqual({ confidence: 0.4, avoid: true });
    expect(parseVerdict('No trade today').avoid).toBe(true);
  });

  it('reads avoid only as a stance', () => {
    expect(parseVerdict('Decision: avoid. Theta will bleed before the trigger. Confidence: 0.3').avoid).toBe(true);
    expect(parseVerdict("Final answer: don't enter yet").avoid).toBe(true);
    expect(parseVerdict('Final answer: enter the 24000 CE. Risks to avoid: theta decay into expiry. Confidence: 0.8')).toEqual({
      confidence: 0.8,
      avoid: false,
    });
  });

  it('returns null confidence when none is stated', () => {
    expect(parseVerdict('Final answer: enter').confidence).toBeNull();
  });
});

describe('applyVerdict', () => {
  it('raises a confident verdict to enter', () => {
    const answer = 'Final answer: enter the 24000 CE. Confidence: 0.82';
    const rec = applyVerdict(base(), parseVerdict(answer), answer);
    expect(rec.decision).toBe('enter');
    expect(rec.confidence).toBe(0.82);
    expect(rec.strike).toBe(24000);
    expect(rec.rationale).toBe(answer);
    expect(rec.source).toBe('reasoning');
  });

  it('caps an avoid verdict below the wait band', () => {
    const answer = 'Final answer: avoid, expiry day. Confidence: 0.8';
    const rec = applyVerdict(base(), parseVerdict(answer), answer);
    expect(rec.decision).toBe('noTrade');
    expect(rec.confidence).toBe(0.49);
    expect(rec.direction).toBeNull();
    expect(rec.gatesPassed).toEqual(['15m', '5m', 'options', '1m']);
    expect(rec.source).toBe('reasoning');
  });

  it('keeps the base confidence when the model states none', () => {
    const rec = applyVerdict(base(), { confidence: null, avoid: false }, 'Final answer: wait for a retest');
    expect(rec.decision).toBe('wait');
    expect(rec.confidence).toBe(0.6);
  });

  it('never enters without a strike', () => {
    const rec = applyVerdict(noTradeRecommendation('1m: no reference price', [...allGates]), { confidence: 0.9, avoid: false }, 'go');
    expect(rec.decision).toBe('wait');
    expect(rec.confidence).toBe(0.69);
  });
});
