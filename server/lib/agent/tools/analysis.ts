// server/lib/agent/tools/analysis.ts
import type { StructuredBrief } from '@shared/types/pipeline';
import type { ToolArgs } from '../types';
import type { ToolRegistry } from './registry';

type Fields = Record<string, unknown>;

function asFields(value: unknown): Fields {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

// First present spelling wins (models mix camelCase and snake_case)
function field(source: Fields, ...names: string[]): unknown {
  for (const name of names) {
    if (name in source) return source[name];
  }
  return undefined;
}

function text(source: Fields, ...names: string[]): string | null {
  const value = field(source, ...names);
  return typeof value === 'string' ? value.toLowerCase() : null;
}

export interface AlignmentReport {
  aligned: boolean;
  contradictions: string[];
  recommendation: 'proceed' | 'wait';
}

export function validateSignalAlignment(args: ToolArgs): AlignmentReport {
  const tf15 = asFields(args.tf_15m);
  const tf5 = asFields(args.tf_5m);
  const tf1 = asFields(args.tf_1m);
  const contradictions: string[] = [];

  const bias = text(tf15, 'bias');
  if (bias !== 'bullish' && bias !== 'bearish') {
    contradictions.push('15m has no directional bias');
  }

  const setup = text(tf5, 'setupType', 'setup_type');
  if (setup === null || setup === 'none') {
    contradictions.push('5m has no setup');
  }
  if (field(tf5, 'momentumAligned', 'momentum_alignment', 'momentum_aligned') !== true) {
    contradictions.push('5m momentum not aligned with 15m');
  }

  if (text(tf1, 'triggerStatus', 'trigger_status', 'entry_signal') !== 'confirmed') {
    contradictions.push('1m entry trigger not confirmed');
  }

  const aligned = contradictions.length === 0;
  return { aligned, contradictions, recommendation: aligned ? 'proceed' : 'wait' };
}

export interface MarketCheck {
  suitable: boolean;
  warnings: string[];
  recommendation: 'proceed' | 'avoid';
}

export function checkMarketConditions(args: ToolArgs): MarketCheck {
  const volatility = typeof args.volatility === 'string' ? args.volatility.toLowerCase() : '';
  const strength = typeof args.trend_strength === 'string' ? args.trend_strength.toLowerCase() : '';
  const liquidity = typeof args.liquidity_score === 'number' ? args.liquidity_score : 0;

  let suitable = true;
  const warnings: string[] = [];

  if (volatility === 'contracting' || volatility === 'low') {
    suitable = false;
    warnings.push('Volatility contracting - poor for option buying');
  }
  if (volatility === 'extreme') {
    suitable = false;
    warnings.push('Extreme volatility - premiums unstable');
  }
  if (strength === 'weak' || strength === 'unknown') {
    warnings.push('Weak trend - lower confidence');
  }
  if (liquidity < 5.0) {
    suitable = false;
    warnings.push('Low liquidity - avoid trading');
  }

  return { suitable, warnings, recommendation: suitable ? 'proceed' : 'avoid' };
}

export interface ContradictionReport {
  contradictions: string[];
  hasContradictions: boolean;
  recommendation: 'signals_consistent' | 'signals_conflicting';
}

const OPPOSITE: Record<string, string> = { bullish: 'bearish', bearish: 'bullish' };

export function detectContradictions(args: ToolArgs): ContradictionReport {
  const signals = asFields(args.signals);
  const bias = text(signals, 'tf_15m_bias', 'tf15mBias');
  const contradictions: string[] = [];

  if (bias !== null && bias in OPPOSITE) {
    const against = OPPOSITE[bias];
    if (text(signals, 'tf_5m_bias', 'tf5mBias') === against || text(signals, 'tf_5m_setup', 'tf5mSetup') === against) {
      contradictions.push('Bias mismatch between 15m and 5m');
    }
    if (text(signals, 'tf_1m_bias', 'tf1mBias') === against) {
      contradictions.push('Bias mismatch between 15m and 1m');
    }
    const optionType = text(signals, 'option_type', 'optionType');
    if ((bias === 'bullish' && optionType === 'pe') || (bias === 'bearish' && optionType === 'ce')) {
      contradictions.push(`Option type ${optionType.toUpperCase()} against a ${bias} 15m bias`);
    }
  }

  const hasContradictions = contradictions.length > 0;
  return {
    contradictions,
    hasContradictions,
    recommendation: hasContradictions ? 'signals_conflicting' : 'signals_consistent',
  };
}

/**
 * Register the read-only analysis tools. `brief` is the run's structured brief, if any.
 */
export function registerAnalysisTools(registry: ToolRegistry, brief: StructuredBrief | null): void {
  registry.register(
    'validate_signal_alignment',
    'Check if signals across timeframes (15m, 5m, 1m) are aligned and consistent',
    {
      tf_15m: { type: 'object', description: '15m context with bias and strength', required: true },
      tf_5m: { type: 'object', description: '5m context with setupType and momentumAligned', required: true },
      tf_1m: { type: 'object', description: '1m context with triggerStatus', required: true },
    },
    validateSignalAlignment,
  );

  registry.register(
    'check_market_conditions',
    'Validate market conditions (volatility, trend strength, liquidity) are suitable for options trading',
    {
      volatility: { type: 'string', description: 'Volatility state (expanding, contracting, stable, low, normal, high, extreme)', required: true },
      trend_strength: { type: 'string', description: 'Trend strength (strong, moderate, weak, unknown)', required: true },
      liquidity_score: { type: 'number', description: 'Liquidity score (0-10)', required: true },
    },
    checkMarketConditions,
  );

  registry.register(
    'detect_contradictions',
    'Detect contradictions in trading signals that might indicate false signals',
    {
      signals: { type: 'object', description: 'Signals keyed tf_15m_bias, tf_5m_bias, tf_5m_setup, tf_1m_bias, option_type', required: true },
    },
    detectContradictions,
  );

  registry.register(
    'get_structured_brief',
    'Return the structured brief for the current analysis (timeframe facts, candidates, market conditions)',
    {},
    () => {
      if (!brief) throw new Error('No structured brief available for this run');
      return brief;
    },
  );
}
