import { v4 as uuidv4 } from 'uuid';
import { AgentLogger } from '../lib/agent/logger';
import type { OrderGateway } from './interface';
import type { OrderRecord, OrderRequest } from './types';

/**
 * In-memory order book. Records what the execution tools asked for;
 * nothing is sent to a broker.
 */
export class PaperOrderGateway implements OrderGateway {
  private orders: Map<string, OrderRecord> = new Map();
  private readonly logger: AgentLogger;

  constructor(logger?: AgentLogger) {
    this.logger = logger ?? new AgentLogger({ scope: 'Paper' });
  }

  async placeOrder(order: OrderRequest): Promise<OrderRecord> {
    const now = new Date().toISOString();
    const record: OrderRecord = {
      ...order,
      orderId: uuidv4(),
      state: 'open',
      createdAt: now,
      updatedAt: now,
    };
    this.orders.set(record.orderId, record);
    this.logger.log('ORDER', `${order.side.toUpperCase()} ${order.qty} ${order.symbol} ${order.strike} ${order.optionType} -> ${record.orderId}`);
    return record;
  }

  async modifyOrder(orderId: string, changes: { qty?: number; price?: number }): Promise<OrderRecord> {
    const existing = this.requireOpen(orderId);
    const updated: OrderRecord = {
      ...existing,
      qty: changes.qty ?? existing.qty,
      price: changes.price ?? existing.price,
      state: 'modified',
      updatedAt: new Date().toISOString(),
    };
    this.orders.set(orderId, updated);
    this.logger.log('ORDER', `modified ${orderId} (qty ${updated.qty}, price ${updated.price ?? 'market'})`);
    return updated;
  }

  async cancelOrder(orderId: string): Promise<OrderRecord> {
    const existing = this.requireOpen(orderId);
    const cancelled: OrderRecord = {
      ...existing,
      state: 'cancelled',
      updatedAt: new Date().toISOString(),
    };
    this.orders.set(orderId, cancelled);
    this.logger.log('ORDER', `cancelled ${orderId}`);
    return cancelled;
  }

  list(): OrderRecord[] {
    return Array.from(this.orders.values());
  }

  private requireOpen(orderId: string): OrderRecord {
    const existing = this.orders.get(orderId);
    if (!existing) {
      throw new Error(`Order not found: ${orderId}`);
    }
    if (existing.state === 'cancelled') {
      throw new Error(`Order already cancelled: ${orderId}`);
    }
    return existing;
  }
}
