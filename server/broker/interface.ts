import type { Candle, OptionChain, OrderRecord, OrderRequest, TimeframeCode } from './types';

/**
 * Market data collaborator. Every method throws DataSourceError on failure.
 */
export interface MarketDataSource {
  fetchCandles(symbol: string, timeframe: TimeframeCode, from: Date, to: Date): Promise<Candle[]>;
  fetchOptionChain(symbol: string): Promise<OptionChain>;
  fetchVix?(): Promise<number | null>;
}

/**
 * Order collaborator behind the execution tools
 */
export interface OrderGateway {
  placeOrder(order: OrderRequest): Promise<OrderRecord>;
  modifyOrder(orderId: string, changes: { qty?: number; price?: number }): Promise<OrderRecord>;
  cancelOrder(orderId: string): Promise<OrderRecord>;
}
