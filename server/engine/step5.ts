/**
 * Step 5: Recommendation
 * Turns passed gates into a banded recommendation, either directly from the
 * contexts or by folding in the reasoning loop's verdict.
 */

import type {
  Decision,
  GateName,
  OptionCandidate,
  Recommendation,
  SetupContext,
  TrendContext,
  TriggerContext,
} from '@shared/types/pipeline';
import { extractConfidence } from '../lib/agent/response-parser';
import { round2 } from './contracts';

// Decision bands
export const ENTER_THRESHOLD = 0.7;
export const WAIT_THRESHOLD = 0.5;

export const DETERMINISTIC_CONFIDENCE = 0.6;

// Offsets from the latest 1m close
const ENTRY_BAND = 0.02;
const STOP_OFFSET = 0.08;
const TARGET_OFFSETS = [0.25, 0.45] as const;

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function bandDecision(confidence: number): Decision {
  if (confidence >= ENTER_THRESHOLD) return 'enter';
  if (confidence >= WAIT_THRESHOLD) return 'wait';
  return 'noTrade';
}

export function noTradeRecommendation(reason: string, gatesPassed: GateName[]): Recommendation {
  return {
    decision: 'noTrade',
    direction: null,
    strike: null,
    entry: null,
    stopLoss: null,
    targets: [],
    confidence: 0.0,
    rationale: reason,
    gatesPassed: [...gatesPassed],
    source: 'gate',
  };
}

export interface RecommendationInput {
  trend: TrendContext;
  setup: SetupContext;
  trigger: TriggerContext;
  candidates: OptionCandidate[];
  gatesPassed: GateName[];
}

/**
 * Recommendation straight from the contexts, no model involved
 */
export function deterministicRecommendation(input: RecommendationInput): Recommendation {
  const best = input.candidates[0];
  if (!best) {
    return noTradeRecommendation('options: no liquid strikes', input.gatesPassed);
  }

  const reference = input.trigger.latestClose;
  if (reference === null) {
    return noTradeRecommendation('1m: no reference price', input.gatesPassed);
  }

  const direction = input.trend.bias === 'bullish' ? 'CE' : 'PE';
  const confidence = DETERMINISTIC_CONFIDENCE;

  return {
    decision: bandDecision(confidence),
    direction,
    strike: best.strike,
    entry: {
      low: round2(reference * (1 - ENTRY_BAND)),
      high: round2(reference * (1 + ENTRY_BAND)),
    },
    stopLoss: round2(reference * (1 - STOP_OFFSET)),
    targets: TARGET_OFFSETS.map(offset => round2(reference * (1 + offset))),
    confidence,
    rationale:
      `15m ${input.trend.bias} (${input.trend.strength}), ` +
      `5m ${input.setup.setupType} (${input.setup.quality}), ` +
      `1m ${input.trigger.triggerType}; ` +
      `best strike ${best.strike} ${best.optionType} scored ${round2(best.score)}`,
    gatesPassed: [...input.gatesPassed],
    source: 'deterministic',
  };
}

export interface Verdict {
  confidence: number | null;
  avoid: boolean;
}

// A stance, not a mention: "risks to avoid" must not veto a trade
const AVOID_PATTERNS: RegExp[] = [
  /\bno[\s_-]?trade\b/i,
  /\b(?:stay out|do not enter|don't enter|should not enter|shouldn't enter)\b/i,
  /\bavoid(?:ing)?\s+(?:this|the|a|any|that)\s+(?:trade|entry|setup|position)\b/i,
  /\b(?:decision|verdict|recommendation|final answer)\s*(?:is)?\s*[:=-]?\s*avoid\b/i,
];

/**
 * Read a confidence figure and an avoid stance out of a free-text answer.
 * Percentages and values above 1 are scaled down to 0-1.
 */
export function parseVerdict(answer: string): Verdict {
  return { confidence: extractConfidence(answer), avoid: AVOID_PATTERNS.some(pattern => pattern.test(answer)) };
}

/**
 * Fold a model verdict into the deterministic recommendation.
 * The decision is always re-banded from the final confidence.
 */
export function applyVerdict(base: Recommendation, verdict: Verdict, answer: string): Recommendation {
  let confidence = verdict.confidence ?? base.confidence;
  if (verdict.avoid) {
    confidence = Math.min(confidence, WAIT_THRESHOLD - 0.01);
  }
  // enter needs a surviving candidate
  if (base.strike === null) {
    confidence = Math.min(confidence, ENTER_THRESHOLD - 0.01);
  }
  confidence = round2(clampConfidence(confidence));

  const decision = bandDecision(confidence);
  if (decision === 'noTrade') {
    return {
      ...noTradeRecommendation(answer, base.gatesPassed),
      confidence,
      source: 'reasoning',
    };
  }

  return {
    ...base,
    decision,
    confidence,
    rationale: answer,
    source: 'reasoning',
  };
}
