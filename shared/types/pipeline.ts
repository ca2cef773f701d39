/**
 * Pipeline Types
 *
 * Data model shared by the gate pipeline, the reasoning loop, the HTTP
 * routes and the command line entry.
 */

// ============================================
// Primitive labels
// ============================================

export type Timeframe = '15m' | '5m' | '1m';

/** Gates in the order the pipeline evaluates them */
export type GateName = '15m' | '5m' | 'options' | '1m';

export const GATE_ORDER: readonly GateName[] = ['15m', '5m', 'options', '1m'];

export type ContextStatus = 'complete' | 'noData' | 'error';

export type Bias = 'bullish' | 'bearish' | 'neutral';

export type StrengthLabel = 'strong' | 'moderate' | 'weak' | 'unknown';

export type EmaStack = 'bullish' | 'bearish' | 'mixed' | 'unknown';

export type OptionType = 'CE' | 'PE';

export type AllowedDirection = OptionType | 'none';

export type SetupType = 'pullback' | 'breakout' | 'trendContinuation' | 'none';

export type SetupQuality = 'high' | 'medium' | 'low';

export type TriggerType = 'rangeBreak' | 'vwapReclaim' | 'momentumBurst' | 'none';

export type TriggerStatus = 'confirmed' | 'forming' | 'notConfirmed';

export type Moneyness = 'ATM' | 'OTM' | 'ITM';

export type Decision = 'enter' | 'wait' | 'noTrade';

// ============================================
// Timeframe contexts
// ============================================

interface ContextBase {
  status: ContextStatus;
  /** Why the context is not complete (fetch error, empty series) */
  reason?: string;
  latestClose: number | null;
}

/** 15-minute trend context */
export interface TrendContext extends ContextBase {
  timeframe: '15m';
  bias: Bias;
  strength: StrengthLabel;
  emaStack: EmaStack;
  allowedDirection: AllowedDirection;
  indicators: {
    ema9: number | null;
    ema21: number | null;
    adx: number | null;
    rsi: number | null;
  };
  tradeAllowed: boolean;
}

/** 5-minute setup context */
export interface SetupContext extends ContextBase {
  timeframe: '5m';
  bias: Bias;
  setupType: SetupType;
  momentumAligned: boolean;
  quality: SetupQuality;
  invalidations: string[];
  indicators: {
    ema9: number | null;
    vwap: number | null;
    atr: number | null;
  };
  proceedToEntry: boolean;
}

/** 1-minute trigger context */
export interface TriggerContext extends ContextBase {
  timeframe: '1m';
  bias: Bias;
  triggerType: TriggerType;
  triggerStatus: TriggerStatus;
  invalidPrice: number | null;
  indicators: {
    vwap: number | null;
    atr: number | null;
    ema9: number | null;
  };
  entryTriggerConfirmed: boolean;
}

export type TimeframeContext = TrendContext | SetupContext | TriggerContext;

export interface TimeframeContexts {
  '15m'?: TrendContext;
  '5m'?: SetupContext;
  '1m'?: TriggerContext;
}

// ============================================
// Option candidates
// ============================================

export interface Greeks {
  delta: number | null;
  gamma: number | null;
  theta: number | null;
  vega: number | null;
}

export type IvTrend = 'rising' | 'falling' | 'flat' | 'unknown';
export type OiTrend = 'building' | 'unwinding' | 'flat' | 'unknown';

export interface OptionCandidate {
  strike: number;
  optionType: OptionType;
  moneyness: Moneyness;
  bid: number | null;
  ask: number | null;
  lastPrice: number | null;
  greeks: Greeks;
  iv: number | null;
  /** Relative change in implied volatility since the previous snapshot */
  ivChange: number | null;
  ivTrend: IvTrend;
  /** Relative change in open interest since the previous session */
  oiChange: number | null;
  oiTrend: OiTrend;
  spreadPct: number;
  thetaRisk: boolean;
  liquidity: 'good' | 'poor';
  score: number;
}

// ============================================
// Structured brief (the only artifact the model sees)
// ============================================

export type SessionPhase = 'open' | 'mid' | 'close';
export type VolatilityRegime = 'low' | 'normal' | 'high' | 'extreme' | 'unknown';

export interface MarketConditions {
  sessionPhase: SessionPhase;
  volatilityRegime: VolatilityRegime;
  vix: number | null;
  expiryDay: boolean;
  eventDay: boolean;
  eventRisk: boolean;
  noTradeReason: string | null;
}

export interface SafeTrendContext {
  status: ContextStatus;
  bias: Bias;
  strength: StrengthLabel;
  emaStack: EmaStack;
  allowedDirection: AllowedDirection;
  adx: number | null;
  rsi: number | null;
  tradeAllowed: boolean;
}

export interface SafeSetupContext {
  status: ContextStatus;
  setupType: SetupType;
  momentumAligned: boolean;
  quality: SetupQuality;
  invalidations: string[];
  proceedToEntry: boolean;
}

export interface SafeTriggerContext {
  status: ContextStatus;
  triggerType: TriggerType;
  triggerStatus: TriggerStatus;
  invalidPrice: number | null;
  entryTriggerConfirmed: boolean;
}

export interface SafeCandidate {
  strike: number;
  optionType: OptionType;
  moneyness: Moneyness;
  premium: number | null;
  delta: number | null;
  spreadPct: number;
  ivTrend: IvTrend;
  oiTrend: OiTrend;
  thetaRisk: boolean;
  liquidity: 'good' | 'poor';
  score: number;
}

export interface StructuredBrief {
  symbol: string;
  generatedAt: string;
  timeframes: {
    '15m': SafeTrendContext;
    '5m': SafeSetupContext;
    '1m': SafeTriggerContext;
  };
  candidates: SafeCandidate[];
  market: MarketConditions;
}

// ============================================
// Recommendation & result
// ============================================

export type RecommendationSource = 'gate' | 'deterministic' | 'reasoning';

export interface EntryZone {
  low: number;
  high: number;
}

export interface Recommendation {
  decision: Decision;
  direction: OptionType | null;
  strike: number | null;
  entry: EntryZone | null;
  stopLoss: number | null;
  targets: number[];
  /** 0.0 - 1.0, banded: enter >= 0.7, wait in [0.5, 0.7), noTrade below */
  confidence: number;
  rationale: string;
  gatesPassed: GateName[];
  source: RecommendationSource;
}

export type PipelineStage = GateName | 'brief' | 'reasoning' | 'pipeline';

export interface PipelineError {
  stage: PipelineStage;
  type: string;
  message: string;
}

export interface AuditEntry {
  stage: PipelineStage;
  name: string;
  timestamp: string;
  input: Record<string, unknown>;
  output: unknown;
  passed: boolean;
  reason?: string;
  durationMs?: number;
}

export interface ReasoningSummary {
  stopReason: string;
  steps: number;
  toolsUsed: string[];
  answer: string | null;
}

export interface PipelineResult {
  runId: string;
  symbol: string;
  startedAt: string;
  recommendation: Recommendation;
  timeframeContexts: TimeframeContexts;
  optionCandidates: OptionCandidate[];
  brief: StructuredBrief | null;
  errors: PipelineError[];
  gatesPassed: GateName[];
  audit: AuditEntry[];
  reasoning?: ReasoningSummary;
}
