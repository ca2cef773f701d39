import type { Greeks, OptionType } from '@shared/types/pipeline';

/** Broker timeframe code for intraday candles, in minutes */
export type TimeframeCode = '1' | '5' | '15' | '25' | '60';

export interface Candle {
  /** Epoch seconds */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface OptionQuote {
  strike: number;
  optionType: OptionType;
  bid: number | null;
  ask: number | null;
  lastPrice: number | null;
  iv: number | null;
  /** IV of the same contract from the previous snapshot, when known */
  previousIv: number | null;
  oi: number | null;
  previousOi: number | null;
  greeks: Greeks;
}

export interface OptionChain {
  symbol: string;
  /** Underlying last price reported with the chain */
  spot: number | null;
  expiries: string[];
  selectedExpiry: string | null;
  strikes: OptionQuote[];
}

export type OrderSide = 'buy' | 'sell';

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  qty: number;
  price?: number;
  strike: string;
  optionType: OptionType;
}

export type OrderState = 'open' | 'modified' | 'cancelled';

export interface OrderRecord extends OrderRequest {
  orderId: string;
  state: OrderState;
  createdAt: string;
  updatedAt: string;
}
