/**
 * Step 3: Option Chain Feasibility
 * Filter the chain to liquid ATM / next-OTM strikes in the trend's direction
 * and rank what survives.
 */

import type { Bias, OptionCandidate, OptionType } from '@shared/types/pipeline';
import type { OptionChain } from '../broker/types';
import { round2, toOptionCandidate } from './contracts';

export const MAX_CANDIDATES = 2;

export interface RejectedStrike {
  strike: number;
  optionType: OptionType;
  reason: string;
}

export interface CandidateSelection {
  optionType: OptionType | null;
  spot: number | null;
  atmStrike: number | null;
  candidates: OptionCandidate[];
  rejected: RejectedStrike[];
  reason?: string;
}

export function optionTypeForBias(bias: Bias): OptionType | null {
  if (bias === 'bullish') return 'CE';
  if (bias === 'bearish') return 'PE';
  return null;
}

/**
 * Nearest listed strike to spot; ties go to the lower strike
 */
export function nearestStrike(strikes: number[], spot: number): number | null {
  let best: number | null = null;
  for (const strike of strikes) {
    if (best === null) {
      best = strike;
      continue;
    }
    const distance = Math.abs(strike - spot);
    const bestDistance = Math.abs(best - spot);
    if (distance < bestDistance || (distance === bestDistance && strike < best)) {
      best = strike;
    }
  }
  return best;
}

export function selectCandidates(
  chain: OptionChain,
  bias: Bias,
  fallbackSpot: number | null,
  maxSpreadPct: number,
  limit: number = MAX_CANDIDATES,
): CandidateSelection {
  const optionType = optionTypeForBias(bias);
  const spot = chain.spot ?? fallbackSpot;

  if (optionType === null) {
    return { optionType, spot, atmStrike: null, candidates: [], rejected: [], reason: 'no directional bias' };
  }
  if (spot === null || spot <= 0) {
    return { optionType, spot, atmStrike: null, candidates: [], rejected: [], reason: 'no underlying price' };
  }

  const sameSide = chain.strikes.filter(q => q.optionType === optionType);
  const strikes = Array.from(new Set(sameSide.map(q => q.strike))).sort((a, b) => a - b);
  const atmStrike = nearestStrike(strikes, spot);
  if (atmStrike === null) {
    return { optionType, spot, atmStrike, candidates: [], rejected: [], reason: `no ${optionType} strikes in chain` };
  }

  const atmIndex = strikes.indexOf(atmStrike);
  const otmStrike = optionType === 'CE' ? strikes[atmIndex + 1] : strikes[atmIndex - 1];
  const wanted = new Set<number>([atmStrike]);
  if (otmStrike !== undefined) wanted.add(otmStrike);

  const rejected: RejectedStrike[] = [];
  const survivors: OptionCandidate[] = [];

  for (const quote of sameSide) {
    if (!wanted.has(quote.strike)) continue;

    if (quote.bid === null || quote.ask === null || quote.bid <= 0 || quote.ask <= 0) {
      rejected.push({ strike: quote.strike, optionType, reason: 'no two-sided quote' });
      continue;
    }

    const candidate = toOptionCandidate(quote, atmStrike);
    if (candidate.spreadPct > maxSpreadPct) {
      rejected.push({
        strike: quote.strike,
        optionType,
        reason: `spread ${round2(candidate.spreadPct)}% above ${maxSpreadPct}%`,
      });
      continue;
    }
    survivors.push(candidate);
  }

  survivors.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (a.moneyness === 'ATM' && b.moneyness !== 'ATM') return -1;
    if (b.moneyness === 'ATM' && a.moneyness !== 'ATM') return 1;
    return a.strike - b.strike;
  });

  const candidates = survivors.slice(0, limit);
  return {
    optionType,
    spot,
    atmStrike,
    candidates,
    rejected,
    reason: candidates.length === 0 ? 'no liquid strikes' : undefined,
  };
}
