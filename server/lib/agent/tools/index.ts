// server/lib/agent/tools/index.ts
import type { StructuredBrief } from '@shared/types/pipeline';
import type { OrderGateway } from '../../../broker/interface';
import type { SafetyMode } from '../types';
import { registerAnalysisTools } from './analysis';
import { registerExecutionTools } from './execution';
import { ToolRegistry } from './registry';

export interface ToolRegistryOptions {
  mode: SafetyMode;
  brief?: StructuredBrief | null;
  gateway?: OrderGateway | null;
}

/**
 * Fresh registry with the default catalog. Each run owns its own instance.
 */
export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const registry = new ToolRegistry(options.mode);
  registerAnalysisTools(registry, options.brief ?? null);
  registerExecutionTools(registry, options.gateway ?? null);
  return registry;
}

export { ToolRegistry, EXECUTION_TOOLS, validateArguments, buildArgsSchema } from './registry';
export { validateSignalAlignment, checkMarketConditions, detectContradictions } from './analysis';
