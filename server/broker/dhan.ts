/**
 * Dhan v2 REST market data client
 *
 * Intraday candles, the nearest-expiry option chain and India VIX. Every
 * failure (transport, non-2xx, unexpected payload) surfaces as DataSourceError.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { OptionType } from '@shared/types/pipeline';
import { DataSourceError, errorMessage } from '../lib/agent/errors';
import { AgentLogger } from '../lib/agent/logger';
import { getExchangeTimeComponents } from '../engine/session';
import type { MarketDataSource } from './interface';
import type { Candle, OptionChain, OptionQuote, TimeframeCode } from './types';

// Index underlyings on the IDX_I segment
export const INDEX_SECURITY_IDS: Record<string, number> = {
  NIFTY: 13,
  BANKNIFTY: 25,
  FINNIFTY: 27,
  MIDCPNIFTY: 442,
  SENSEX: 51,
};

const INDEX_SEGMENT = 'IDX_I';
const INDIA_VIX_SECURITY_ID = 21;

export interface DhanClientOptions {
  baseUrl: string;
  clientId: string;
  accessToken: string;
  timeoutMs?: number;
  /** Preconfigured axios instance (tests pass one with a custom adapter) */
  http?: AxiosInstance;
  logger?: AgentLogger;
}

// ============================================
// Payload schemas
// ============================================

const numberColumn = z.array(z.number().nullable()).default([]);

const intradaySchema = z.object({
  open: numberColumn,
  high: numberColumn,
  low: numberColumn,
  close: numberColumn,
  volume: numberColumn,
  timestamp: numberColumn,
});

const expiryListSchema = z.object({
  data: z.array(z.string()),
});

const greeksSchema = z.object({
  delta: z.number().nullish(),
  gamma: z.number().nullish(),
  theta: z.number().nullish(),
  vega: z.number().nullish(),
});

const legSchema = z.object({
  greeks: greeksSchema.nullish(),
  implied_volatility: z.number().nullish(),
  last_price: z.number().nullish(),
  oi: z.number().nullish(),
  previous_oi: z.number().nullish(),
  top_bid_price: z.number().nullish(),
  top_ask_price: z.number().nullish(),
});

const optionChainSchema = z.object({
  data: z.object({
    last_price: z.number().nullish(),
    oc: z.record(z.object({ ce: legSchema.nullish(), pe: legSchema.nullish() })).default({}),
  }),
});

const ltpSchema = z.object({
  data: z.record(z.record(z.object({ last_price: z.number() }))),
});

type OptionLeg = z.infer<typeof legSchema>;

// ============================================
// Helpers
// ============================================

// Dhan wants exchange-local "YYYY-MM-DD HH:mm:ss"
export function formatDhanDate(date: Date): string {
  const { isoDate, hour, minute } = getExchangeTimeComponents(date);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${isoDate} ${pad(hour)}:${pad(minute)}:00`;
}

/**
 * Zip Dhan's column arrays into candles, dropping rows with a missing field
 */
export function candlesFromColumns(columns: z.infer<typeof intradaySchema>): Candle[] {
  const length = Math.min(
    columns.timestamp.length,
    columns.open.length,
    columns.high.length,
    columns.low.length,
    columns.close.length,
  );

  const candles: Candle[] = [];
  for (let i = 0; i < length; i++) {
    const timestamp = columns.timestamp[i];
    const open = columns.open[i];
    const high = columns.high[i];
    const low = columns.low[i];
    const close = columns.close[i];
    if (timestamp === null || open === null || high === null || low === null || close === null) continue;
    candles.push({ timestamp, open, high, low, close, volume: columns.volume[i] ?? 0 });
  }
  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

function positive(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && value > 0 ? value : null;
}

export class DhanClient implements MarketDataSource {
  private readonly http: AxiosInstance;
  private readonly clientId: string;
  private readonly accessToken: string;
  private readonly logger: AgentLogger;
  // Last IV seen per contract, so the chain can report an IV change
  private readonly lastIv = new Map<string, number>();

  constructor(options: DhanClientOptions) {
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 10000,
      validateStatus: () => true,
    });
    this.clientId = options.clientId;
    this.accessToken = options.accessToken;
    this.logger = options.logger ?? new AgentLogger({ scope: 'Dhan' });
  }

  async fetchCandles(symbol: string, timeframe: TimeframeCode, from: Date, to: Date): Promise<Candle[]> {
    const securityId = this.securityId(symbol);
    const payload = await this.post('/v2/charts/intraday', {
      securityId: String(securityId),
      exchangeSegment: INDEX_SEGMENT,
      instrument: 'INDEX',
      interval: timeframe,
      oi: false,
      fromDate: formatDhanDate(from),
      toDate: formatDhanDate(to),
    });

    const parsed = intradaySchema.safeParse(payload);
    if (!parsed.success) {
      throw new DataSourceError(`Unexpected candle payload for ${symbol}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, '/v2/charts/intraday');
    }
    return candlesFromColumns(parsed.data);
  }

  async fetchOptionChain(symbol: string): Promise<OptionChain> {
    const upper = symbol.toUpperCase();
    const underlying = { UnderlyingScrip: this.securityId(upper), UnderlyingSeg: INDEX_SEGMENT };

    const expiryPayload = expiryListSchema.safeParse(await this.post('/v2/optionchain/expirylist', underlying));
    if (!expiryPayload.success) {
      throw new DataSourceError(`Unexpected expiry list for ${upper}`, '/v2/optionchain/expirylist');
    }
    const expiries = [...expiryPayload.data.data].sort();
    const selectedExpiry = expiries[0] ?? null;
    this.forgetIvOutside(upper, selectedExpiry);
    if (selectedExpiry === null) {
      return { symbol: upper, spot: null, expiries, selectedExpiry, strikes: [] };
    }

    const chainPayload = optionChainSchema.safeParse(
      await this.post('/v2/optionchain', { ...underlying, Expiry: selectedExpiry }),
    );
    if (!chainPayload.success) {
      throw new DataSourceError(
        `Unexpected option chain for ${upper}: ${chainPayload.error.issues[0]?.message ?? 'invalid shape'}`,
        '/v2/optionchain',
      );
    }

    const strikes: OptionQuote[] = [];
    for (const [strikeKey, legs] of Object.entries(chainPayload.data.data.oc)) {
      const strike = Number(strikeKey);
      if (!Number.isFinite(strike)) continue;
      if (legs.ce) strikes.push(this.toQuote(upper, selectedExpiry, strike, 'CE', legs.ce));
      if (legs.pe) strikes.push(this.toQuote(upper, selectedExpiry, strike, 'PE', legs.pe));
    }
    strikes.sort((a, b) => a.strike - b.strike || a.optionType.localeCompare(b.optionType));

    return {
      symbol: upper,
      spot: positive(chainPayload.data.data.last_price),
      expiries,
      selectedExpiry,
      strikes,
    };
  }

  async fetchVix(): Promise<number | null> {
    const payload = await this.post('/v2/marketfeed/ltp', { [INDEX_SEGMENT]: [INDIA_VIX_SECURITY_ID] });
    const parsed = ltpSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DataSourceError('Unexpected LTP payload for India VIX', '/v2/marketfeed/ltp');
    }
    return parsed.data.data[INDEX_SEGMENT]?.[String(INDIA_VIX_SECURITY_ID)]?.last_price ?? null;
  }

  /**
   * Drop remembered IVs of this symbol's other expiries; only the selected
   * expiry is ever compared against.
   */
  private forgetIvOutside(symbol: string, expiry: string | null): void {
    const keep = expiry === null ? null : `${symbol}:${expiry}:`;
    for (const key of this.lastIv.keys()) {
      if (key.startsWith(`${symbol}:`) && (keep === null || !key.startsWith(keep))) {
        this.lastIv.delete(key);
      }
    }
  }

  private securityId(symbol: string): number {
    const id = INDEX_SECURITY_IDS[symbol.toUpperCase()];
    if (id === undefined) {
      throw new DataSourceError(`Instrument not found for symbol: ${symbol}`);
    }
    return id;
  }

  private toQuote(symbol: string, expiry: string, strike: number, optionType: OptionType, leg: OptionLeg): OptionQuote {
    const key = `${symbol}:${expiry}:${strike}:${optionType}`;
    const iv = positive(leg.implied_volatility);
    const previousIv = this.lastIv.get(key) ?? null;
    if (iv !== null) this.lastIv.set(key, iv);

    return {
      strike,
      optionType,
      bid: positive(leg.top_bid_price),
      ask: positive(leg.top_ask_price),
      lastPrice: positive(leg.last_price),
      iv,
      previousIv,
      oi: leg.oi ?? null,
      previousOi: leg.previous_oi ?? null,
      greeks: {
        delta: leg.greeks?.delta ?? null,
        gamma: leg.greeks?.gamma ?? null,
        theta: leg.greeks?.theta ?? null,
        vega: leg.greeks?.vega ?? null,
      },
    };
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(path, body, {
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'access-token': this.accessToken,
          'client-id': this.clientId,
        },
      });
    } catch (error) {
      throw new DataSourceError(`Dhan request failed: ${errorMessage(error)}`, path);
    }

    if (response.status < 200 || response.status >= 300) {
      const detail = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
      this.logger.warn(`${path} -> ${response.status}`);
      throw new DataSourceError(`Dhan API error ${response.status}: ${detail.slice(0, 200)}`, path, response.status);
    }
    return response.data;
  }
}
