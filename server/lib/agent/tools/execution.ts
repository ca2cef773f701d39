// server/lib/agent/tools/execution.ts
import type { OrderGateway } from '../../../broker/interface';
import type { OrderSide } from '../../../broker/types';
import type { OptionType } from '@shared/types/pipeline';
import type { ToolArgs } from '../types';
import type { ToolRegistry } from './registry';

function requireGateway(gateway: OrderGateway | null): OrderGateway {
  if (!gateway) throw new Error('No order gateway configured');
  return gateway;
}

function str(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') throw new Error(`Parameter ${key} must be a string`);
  return value;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' ? value : undefined;
}

function side(value: string): OrderSide {
  if (value === 'buy' || value === 'sell') return value;
  throw new Error(`Unsupported side: ${value}`);
}

function optionType(value: string): OptionType {
  if (value === 'CE' || value === 'PE') return value;
  throw new Error(`Unsupported option type: ${value}`);
}

/**
 * Register order tools. They only run when the registry is in live mode.
 */
export function registerExecutionTools(registry: ToolRegistry, gateway: OrderGateway | null): void {
  registry.register(
    'place_order',
    'Place an option order. Live mode only; do not use unless explicitly authorized.',
    {
      symbol: { type: 'string', required: true },
      side: { type: 'string', enum: ['buy', 'sell'], required: true },
      qty: { type: 'integer', required: true },
      price: { type: 'number', required: false },
      strike: { type: 'string', required: true },
      option_type: { type: 'string', enum: ['CE', 'PE'], required: true },
    },
    args => {
      const qty = optionalNumber(args, 'qty') ?? 0;
      if (qty <= 0) throw new Error('Parameter qty must be positive');
      return requireGateway(gateway).placeOrder({
        symbol: str(args, 'symbol').toUpperCase(),
        side: side(str(args, 'side')),
        qty,
        price: optionalNumber(args, 'price'),
        strike: str(args, 'strike'),
        optionType: optionType(str(args, 'option_type')),
      });
    },
    { kind: 'execution' },
  );

  registry.register(
    'modify_order',
    'Modify quantity or price of an open order. Live mode only.',
    {
      order_id: { type: 'string', required: true },
      qty: { type: 'integer', required: false },
      price: { type: 'number', required: false },
    },
    args =>
      requireGateway(gateway).modifyOrder(str(args, 'order_id'), {
        qty: optionalNumber(args, 'qty'),
        price: optionalNumber(args, 'price'),
      }),
    { kind: 'execution' },
  );

  registry.register(
    'cancel_order',
    'Cancel an open order. Live mode only.',
    {
      order_id: { type: 'string', required: true },
    },
    args => requireGateway(gateway).cancelOrder(str(args, 'order_id')),
    { kind: 'execution' },
  );
}
