import { describe, expect, it, vi } from 'vitest';
import type { MarketDataSource } from '../broker/interface';
import type { Candle, OptionChain, OptionQuote, TimeframeCode } from '../broker/types';
import { loadConfig } from '../config';
import { DataSourceError, ReasoningError } from '../lib/agent/errors';
import { AgentLogger } from '../lib/agent/logger';
import type { ChatMessage, ModelReply, ReasoningClient } from '../lib/agent/types';
import type { IndicatorSuite } from '../services/indicators/calculator';
import { TradingPipeline } from './index';

const NOW = new Date('2026-03-10T06:30:00Z');
// 2026-03-10 09:15 IST
const SESSION_START = 1773114300;
const DAY_MS = 24 * 60 * 60 * 1000;

const indicators: IndicatorSuite = {
  ema: (_closes, period) => (period === 9 ? 24000 : 23900),
  rsi: () => 60,
  atr: () => 12,
  adx: () => 28,
  vwap: () => 23990,
};

function bar(i: number, open: number, high: number, low: number, close: number): Candle {
  return { timestamp: SESSION_START + i * 300, open, high, low, close, volume: 1000 };
}

function range(count: number, open: number, high: number, low: number, close: number): Candle[] {
  return Array.from({ length: count }, (_, i) => bar(i, open, high, low, close));
}

const CANDLES: Record<'15' | '5' | '1', Candle[]> = {
  '15': [...range(20, 23950, 24000, 23900, 23950), bar(20, 23990, 24060, 23980, 24050)],
  // Pullback to EMA(9) that closes green above VWAP
  '5': [...range(12, 24000, 24100, 23900, 24000), bar(12, 24000, 24040, 24010, 24030)],
  // Close above the prior five-candle high
  '1': [...range(6, 24000, 24010, 23990, 24000), bar(6, 24000, 24025, 23998, 24020)],
};

function quote(strike: number, optionType: 'CE' | 'PE', bid: number, ask: number, delta: number): OptionQuote {
  return {
    strike,
    optionType,
    bid,
    ask,
    lastPrice: ask,
    iv: 15,
    previousIv: 14.5,
    oi: 120000,
    previousOi: 100000,
    greeks: { delta, gamma: 0.012, theta: -6, vega: 10 },
  };
}

const CHAIN: OptionChain = {
  symbol: 'NIFTY',
  spot: 24010,
  expiries: ['2026-03-12', '2026-03-19'],
  selectedExpiry: '2026-03-12',
  strikes: [
    quote(23950, 'CE', 160, 161, 0.58),
    quote(24000, 'CE', 120, 120.6, 0.52),
    quote(24050, 'CE', 90, 90.5, 0.41),
    quote(24000, 'PE', 118, 118.6, -0.49),
  ],
};

function candleMock() {
  return vi.fn(async (_symbol: string, timeframe: TimeframeCode, _from: Date, _to: Date): Promise<Candle[]> => {
    if (timeframe === '15' || timeframe === '5' || timeframe === '1') return CANDLES[timeframe];
    return [];
  });
}

function failingOn(failing: TimeframeCode, replacement?: Candle[]) {
  return vi.fn(async (_symbol: string, timeframe: TimeframeCode, _from: Date, _to: Date): Promise<Candle[]> => {
    if (timeframe === failing) {
      if (replacement) return replacement;
      throw new DataSourceError('Dhan API error 503: maintenance', '/v2/charts/intraday', 503);
    }
    if (timeframe === '15' || timeframe === '5' || timeframe === '1') return CANDLES[timeframe];
    return [];
  });
}

function fakeSource(overrides: Partial<MarketDataSource> = {}) {
  return {
    fetchCandles: candleMock(),
    fetchOptionChain: vi.fn(async (_symbol: string): Promise<OptionChain> => CHAIN),
    fetchVix: vi.fn(async (): Promise<number | null> => 15),
    ...overrides,
  };
}

class ScriptedClient implements ReasoningClient {
  readonly calls: ChatMessage[][] = [];

  constructor(private readonly replies: Array<ModelReply | Error>) {}

  async chat(messages: ChatMessage[]): Promise<ModelReply> {
    this.calls.push(messages);
    const next = this.replies.shift();
    if (!next) throw new ReasoningError('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

function say(text: string): ModelReply {
  return { text, toolCalls: [], finishReason: 'stop' };
}

const BASE_ENV = { DHAN_CLIENT_ID: 'test-client', DHAN_ACCESS_TOKEN: 'test-secret' };

function pipeline(dataSource: MarketDataSource, options: { reasoningClient?: ReasoningClient; env?: Record<string, string> } = {}) {
  return new TradingPipeline({
    config: loadConfig({ ...BASE_ENV, ...options.env }),
    dataSource,
    indicators,
    reasoningClient: options.reasoningClient ?? null,
    logger: new AgentLogger({ silent: true }),
    clock: () => NOW,
  });
}

const REASONING_ENV = { OLLAMA_HOST_URL: 'http://localhost:11434' };

describe('TradingPipeline', () => {
  it('passes every gate and recommends deterministically', async () => {
    const source = fakeSource();
    const result = await pipeline(source).run(' nifty ');

    expect(result.symbol).toBe('NIFTY');
    expect(result.startedAt).toBe('2026-03-10T06:30:00.000Z');
    expect(result.gatesPassed).toEqual(['15m', '5m', 'options', '1m']);
    expect(result.errors).toEqual([]);
    expect(result.recommendation).toMatchObject({
      decision: 'wait',
      direction: 'CE',
      strike: 24050,
      entry: { low: 23539.6, high: 24500.4 },
      stopLoss: 22098.4,
      targets: [30025, 34829],
      confidence: 0.6,
      source: 'deterministic',
    });
    expect(result.optionCandidates.map(c => c.strike)).toEqual([24050, 24000]);
    expect(result.audit.map(entry => entry.stage)).toEqual(['15m', '5m', 'options', '1m', 'brief']);
    expect(result.reasoning).toBeUndefined();
  });

  it('asks each stage for its own lookback', async () => {
    const fetchCandles = candleMock();
    await pipeline(fakeSource({ fetchCandles })).run('NIFTY');

    expect(fetchCandles.mock.calls.map(([symbol, timeframe, from, to]) => [
      symbol,
      timeframe,
      (to.getTime() - from.getTime()) / DAY_MS,
    ])).toEqual([
      ['NIFTY', '15', 30],
      ['NIFTY', '5', 7],
      ['NIFTY', '1', 1],
    ]);
  });

  it('builds a brief without raw prices', async () => {
    const result = await pipeline(fakeSource()).run('NIFTY');

    expect(result.brief).not.toBeNull();
    expect(result.brief?.market).toMatchObject({ volatilityRegime: 'normal', vix: 15, expiryDay: false, eventRisk: false });
    expect(result.brief?.timeframes['15m']).toEqual({
      status: 'complete',
      bias: 'bullish',
      strength: 'strong',
      emaStack: 'bullish',
      allowedDirection: 'CE',
      adx: 28,
      rsi: 60,
      tradeAllowed: true,
    });
    expect(Object.keys(result.brief?.candidates[0] ?? {})).not.toContain('bid');
  });

  it('closes the 15m gate on a data failure and stops fetching', async () => {
    const source = fakeSource({
      fetchCandles: vi.fn(async (): Promise<Candle[]> => {
        throw new DataSourceError('Dhan API error 500: down', '/v2/charts/intraday', 500);
      }),
    });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual([]);
    expect(result.recommendation).toMatchObject({
      decision: 'noTrade',
      confidence: 0,
      rationale: '15m: trade not allowed',
      source: 'gate',
    });
    expect(result.errors).toEqual([{ stage: '15m', type: 'DATA_SOURCE', message: 'Dhan API error 500: down' }]);
    expect(result.timeframeContexts['15m']?.status).toBe('error');
    expect(source.fetchCandles).toHaveBeenCalledTimes(1);
    expect(source.fetchOptionChain).not.toHaveBeenCalled();
  });

  it('closes the 5m gate on an invalidated setup', async () => {
    const source = fakeSource({
      fetchCandles: vi.fn(async (_symbol: string, timeframe: TimeframeCode): Promise<Candle[]> =>
        timeframe === '5'
          ? [...range(12, 24000, 24100, 23900, 24000), bar(12, 24040, 24045, 24010, 24030)]
          : CANDLES['15'],
      ),
    });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual(['15m']);
    expect(result.recommendation.rationale).toBe('5m: proceed to entry denied');
    expect(result.timeframeContexts['5m']?.invalidations).toEqual(['weakClose']);
    expect(source.fetchOptionChain).not.toHaveBeenCalled();
  });

  it('closes the options gate when the chain is unavailable', async () => {
    const source = fakeSource({
      fetchOptionChain: vi.fn(async (): Promise<OptionChain> => {
        throw new DataSourceError('Dhan API error 429: rate limited', '/v2/optionchain', 429);
      }),
    });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual(['15m', '5m']);
    expect(result.recommendation.rationale).toBe('options: no liquid strikes');
    expect(result.errors).toEqual([{ stage: 'options', type: 'DATA_SOURCE', message: 'Dhan API error 429: rate limited' }]);
    expect(result.audit[result.audit.length - 1]).toMatchObject({ stage: 'options', passed: false, reason: 'option chain unavailable' });
  });

  it('closes the 5m gate on a data failure and stops fetching', async () => {
    const source = fakeSource({ fetchCandles: failingOn('5') });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual(['15m']);
    expect(result.recommendation).toMatchObject({ decision: 'noTrade', confidence: 0, rationale: '5m: proceed to entry denied' });
    expect(result.errors).toEqual([{ stage: '5m', type: 'DATA_SOURCE', message: 'Dhan API error 503: maintenance' }]);
    expect(result.timeframeContexts['5m']?.status).toBe('error');
    expect(source.fetchCandles).toHaveBeenCalledTimes(2);
    expect(source.fetchOptionChain).not.toHaveBeenCalled();
  });

  it('closes the options gate when every quote is filtered out', async () => {
    const source = fakeSource({
      fetchOptionChain: vi.fn(async (): Promise<OptionChain> => ({
        ...CHAIN,
        strikes: [quote(24000, 'CE', 100, 110, 0.52), quote(24050, 'CE', 0, 90.5, 0.41)],
      })),
    });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual(['15m', '5m']);
    expect(result.recommendation).toMatchObject({ decision: 'noTrade', confidence: 0, rationale: 'options: no liquid strikes' });
    expect(result.errors).toEqual([]);
    expect(result.optionCandidates).toEqual([]);
    expect(result.audit[result.audit.length - 1]).toMatchObject({ stage: 'options', passed: false, reason: 'no liquid strikes' });
    expect(source.fetchCandles).toHaveBeenCalledTimes(2);
  });

  it('closes the 1m gate on a data failure', async () => {
    const source = fakeSource({ fetchCandles: failingOn('1') });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual(['15m', '5m', 'options']);
    expect(result.recommendation).toMatchObject({ decision: 'noTrade', confidence: 0, rationale: '1m: entry trigger not confirmed' });
    expect(result.errors).toEqual([{ stage: '1m', type: 'DATA_SOURCE', message: 'Dhan API error 503: maintenance' }]);
    expect(result.timeframeContexts['1m']?.status).toBe('error');
    expect(result.brief).toBeNull();
    expect(source.fetchVix).not.toHaveBeenCalled();
  });

  it('closes the 1m gate while the trigger is still forming', async () => {
    // Flat candles above VWAP: no break, no reclaim, no burst in the trend direction
    const source = fakeSource({ fetchCandles: failingOn('1', range(7, 24000, 24010, 23990, 24000)) });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual(['15m', '5m', 'options']);
    expect(result.recommendation).toMatchObject({ decision: 'noTrade', confidence: 0, rationale: '1m: entry trigger not confirmed', source: 'gate' });
    expect(result.errors).toEqual([]);
    expect(result.timeframeContexts['1m']).toMatchObject({ status: 'complete', triggerType: 'none', triggerStatus: 'forming' });
    expect(result.audit[result.audit.length - 1]).toMatchObject({ stage: '1m', passed: false, reason: 'trigger forming' });
  });

  it('treats a missing VIX as an unknown regime', async () => {
    const source = fakeSource({
      fetchVix: vi.fn(async (): Promise<number | null> => {
        throw new DataSourceError('Unexpected LTP payload for India VIX');
      }),
    });
    const result = await pipeline(source).run('NIFTY');

    expect(result.gatesPassed).toEqual(['15m', '5m', 'options', '1m']);
    expect(result.errors).toEqual([]);
    expect(result.brief?.market.volatilityRegime).toBe('unknown');
  });

  it('reports unexpected failures without throwing', async () => {
    const broken: IndicatorSuite = {
      ...indicators,
      adx: () => {
        throw new Error('boom');
      },
    };
    const result = await new TradingPipeline({
      config: loadConfig(BASE_ENV),
      dataSource: fakeSource(),
      indicators: broken,
      logger: new AgentLogger({ silent: true }),
      clock: () => NOW,
    }).run('NIFTY');

    expect(result.recommendation).toMatchObject({ decision: 'noTrade', rationale: 'pipeline error: boom', confidence: 0 });
    expect(result.errors).toEqual([{ stage: 'pipeline', type: 'UNKNOWN', message: 'boom' }]);
  });

  it('keeps runs independent', async () => {
    const p = pipeline(fakeSource());
    const [first, second] = await Promise.all([p.run('NIFTY'), p.run('NIFTY')]);
    expect(first.runId).not.toBe(second.runId);
    expect(first.audit).toHaveLength(5);
    expect(second.audit).toHaveLength(5);
  });

  describe('with reasoning', () => {
    it('is off without a client even when a host is configured', () => {
      expect(pipeline(fakeSource(), { env: REASONING_ENV }).reasoningEnabled).toBe(false);
    });

    it('folds a confident verdict into the recommendation', async () => {
      const answer = 'Final answer: enter the 24050 CE, trend and setup agree. Confidence: 0.8';
      const client = new ScriptedClient([say(answer)]);
      const result = await pipeline(fakeSource(), { reasoningClient: client, env: REASONING_ENV }).run('NIFTY');

      expect(result.recommendation).toMatchObject({
        decision: 'enter',
        direction: 'CE',
        strike: 24050,
        confidence: 0.8,
        rationale: answer,
        source: 'reasoning',
      });
      expect(result.reasoning).toEqual({ stopReason: 'finalAnswer', steps: 1, toolsUsed: [], answer });
      expect(client.calls[0][1].content).toContain('"symbol": "NIFTY"');
      expect(result.audit.map(entry => entry.stage)).toEqual(['15m', '5m', 'options', '1m', 'brief', 'reasoning']);
    });

    it('reads the verdict from outside the <think> block', async () => {
      const answer = 'Final answer: enter the 24050 CE, trend and setup agree. Confidence: 0.8';
      const client = new ScriptedClient([say(`<think>First impression, confidence 0.2, then the 5m pullback held.</think>${answer}`)]);
      const result = await pipeline(fakeSource(), { reasoningClient: client, env: REASONING_ENV }).run('NIFTY');

      expect(result.recommendation).toMatchObject({ decision: 'enter', confidence: 0.8, rationale: answer, source: 'reasoning' });
      expect(result.reasoning?.answer).toBe(answer);
    });

    it('falls back to the deterministic recommendation when the model is down', async () => {
      const client = new ScriptedClient([new ReasoningError('Ollama unreachable')]);
      const result = await pipeline(fakeSource(), { reasoningClient: client, env: REASONING_ENV }).run('NIFTY');

      expect(result.recommendation).toMatchObject({ decision: 'wait', confidence: 0.6, source: 'deterministic' });
      expect(result.errors).toEqual([{ stage: 'reasoning', type: 'REASONING', message: 'Ollama unreachable' }]);
      expect(result.reasoning?.stopReason).toBe('reasoningError');
    });

    it('keeps the base recommendation when the loop runs out of steps', async () => {
      const client = new ScriptedClient([say('Thinking it over.'), say('Thinking it over.'), say('Thinking it over.')]);
      const result = await pipeline(fakeSource(), { reasoningClient: client, env: REASONING_ENV }).run('NIFTY');

      expect(result.recommendation.source).toBe('deterministic');
      expect(result.reasoning).toMatchObject({ stopReason: 'stepLimit', steps: 3 });
      expect(result.errors).toEqual([]);
    });
  });
});
