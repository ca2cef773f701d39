/**
 * Strike Scorer
 * Deterministic, additive ranking of one option candidate. No model involvement.
 */

import type { OptionCandidate } from '@shared/types/pipeline';

export type ScoreInput = Pick<OptionCandidate, 'greeks' | 'spreadPct' | 'ivChange' | 'oiChange'>;

export interface ScoreBreakdown {
  delta: number;
  gamma: number;
  spread: number;
  iv: number;
  oi: number;
  theta: number;
  total: number;
}

function deltaPoints(delta: number | null): number {
  if (delta === null) return 0;
  const d = Math.abs(delta);
  if (d >= 0.3 && d <= 0.5) return 3;
  if (d >= 0.2 && d <= 0.6) return 2;
  if (d >= 0.1 && d <= 0.7) return 1;
  return 0;
}

function gammaPoints(gamma: number | null): number {
  if (gamma === null) return 0;
  if (gamma > 0.01) return 2;
  if (gamma > 0.005) return 1;
  return 0;
}

function spreadPoints(spreadPct: number): number {
  if (spreadPct > 2.0) return -2;
  if (spreadPct > 1.0) return -1;
  if (spreadPct < 0.5) return 0.5;
  return 0;
}

function ivPoints(ivChange: number | null): number {
  if (ivChange === null) return 0;
  if (ivChange > 0.05) return 1.5;
  if (ivChange > 0.02) return 1.0;
  if (ivChange < -0.05) return -1.0;
  return 0;
}

function oiPoints(oiChange: number | null): number {
  if (oiChange === null) return 0;
  if (oiChange > 0.10) return 1.5;
  if (oiChange > 0.05) return 1.0;
  return 0;
}

function thetaPoints(theta: number | null): number {
  if (theta === null) return 0;
  return Math.abs(theta) > 10 ? -1.0 : 0;
}

/**
 * Per-component points, useful for audit output
 */
export function scoreBreakdown(input: ScoreInput): ScoreBreakdown {
  const parts = {
    delta: deltaPoints(input.greeks.delta),
    gamma: gammaPoints(input.greeks.gamma),
    spread: spreadPoints(input.spreadPct),
    iv: ivPoints(input.ivChange),
    oi: oiPoints(input.oiChange),
    theta: thetaPoints(input.greeks.theta),
  };
  const sum = parts.delta + parts.gamma + parts.spread + parts.iv + parts.oi + parts.theta;
  return { ...parts, total: Math.max(0, sum) };
}

/**
 * Score a candidate. Always >= 0.
 */
export function scoreCandidate(input: ScoreInput): number {
  return scoreBreakdown(input).total;
}
