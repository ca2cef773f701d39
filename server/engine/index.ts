/**
 * Gate Pipeline Orchestrator
 * Produces exactly one recommendation per symbol by running four hard gates
 *
 * Stages:
 * 1. 15m Trend Context   - Is trading allowed, and which way?
 * 2. 5m Setup            - Is there a clean setup aligned with the trend?
 * 3. Option Feasibility  - Is there a liquid strike worth buying?
 * 4. 1m Trigger          - Has the entry actually triggered?
 * 5. Recommendation      - Deterministic, or adjudicated by the reasoning loop
 *
 * run() never throws. Data failures close the gate they belong to and
 * anything unexpected is reported in `errors` with a noTrade verdict.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AuditEntry,
  GateName,
  OptionCandidate,
  PipelineError,
  PipelineResult,
  PipelineStage,
  ReasoningSummary,
  Recommendation,
  SetupContext,
  StructuredBrief,
  TimeframeContexts,
  TrendContext,
  TriggerContext,
} from '@shared/types/pipeline';
import type { AppConfig } from '../config';
import type { MarketDataSource, OrderGateway } from '../broker/interface';
import { PaperOrderGateway } from '../broker/paper';
import type { OptionChain, TimeframeCode } from '../broker/types';
import { classifyError, errorMessage } from '../lib/agent/errors';
import { AgentLogger } from '../lib/agent/logger';
import { ReasoningLoop } from '../lib/agent/loop';
import { createToolRegistry } from '../lib/agent/tools';
import type { ReasoningClient } from '../lib/agent/types';
import { defaultIndicators, type IndicatorSuite } from '../services/indicators/calculator';
import { seriesFromCandles, toStructuredBrief, type StageSeries } from './contracts';
import { assessMarketConditions } from './session';
import { buildTrendContext } from './step1';
import { buildSetupContext } from './step2';
import { selectCandidates } from './step3';
import { buildTriggerContext } from './step4';
import { applyVerdict, deterministicRecommendation, noTradeRecommendation, parseVerdict } from './step5';

const DAY_MS = 24 * 60 * 60 * 1000;

// How far back each stage asks for candles
const LOOKBACK_DAYS: Record<'15' | '5' | '1', number> = {
  '15': 30,
  '5': 7,
  '1': 1,
};

export const GATE_FAILURE_REASONS: Record<GateName, string> = {
  '15m': '15m: trade not allowed',
  '5m': '5m: proceed to entry denied',
  options: 'options: no liquid strikes',
  '1m': '1m: entry trigger not confirmed',
};

export interface PipelineDeps {
  config: AppConfig;
  dataSource: MarketDataSource;
  indicators?: IndicatorSuite;
  /** Model collaborator; reasoning runs only when configured and present */
  reasoningClient?: ReasoningClient | null;
  /** Backs the execution tools in live mode; defaults to a paper gateway */
  orderGateway?: OrderGateway | null;
  logger?: AgentLogger;
  clock?: () => Date;
}

/**
 * Mutable bookkeeping for one run. Never shared between runs.
 */
class RunRecord {
  readonly audit: AuditEntry[] = [];
  readonly errors: PipelineError[] = [];
  readonly gatesPassed: GateName[] = [];
  readonly contexts: TimeframeContexts = {};
  candidates: OptionCandidate[] = [];
  brief: StructuredBrief | null = null;
  reasoning?: ReasoningSummary;

  constructor(
    readonly runId: string,
    readonly symbol: string,
    readonly startedAt: Date,
    readonly logger: AgentLogger,
  ) {}

  addAudit(
    stage: PipelineStage,
    name: string,
    input: Record<string, unknown>,
    output: unknown,
    passed: boolean,
    reason?: string,
    durationMs?: number,
  ): void {
    this.audit.push({
      stage,
      name,
      timestamp: new Date().toISOString(),
      input,
      output,
      passed,
      reason,
      durationMs,
    });
  }

  addError(stage: PipelineStage, error: unknown): string {
    const classified = classifyError(error, { stage });
    this.errors.push({ stage, type: classified.type, message: classified.message });
    return classified.message;
  }

  result(recommendation: Recommendation): PipelineResult {
    return {
      runId: this.runId,
      symbol: this.symbol,
      startedAt: this.startedAt.toISOString(),
      recommendation,
      timeframeContexts: { ...this.contexts },
      optionCandidates: [...this.candidates],
      brief: this.brief,
      errors: [...this.errors],
      gatesPassed: [...this.gatesPassed],
      audit: [...this.audit],
      ...(this.reasoning ? { reasoning: this.reasoning } : {}),
    };
  }
}

export class TradingPipeline {
  private readonly config: AppConfig;
  private readonly dataSource: MarketDataSource;
  private readonly indicators: IndicatorSuite;
  private readonly reasoningClient: ReasoningClient | null;
  private readonly orderGateway: OrderGateway;
  private readonly logger: AgentLogger;
  private readonly clock: () => Date;

  constructor(deps: PipelineDeps) {
    this.config = deps.config;
    this.dataSource = deps.dataSource;
    this.indicators = deps.indicators ?? defaultIndicators;
    this.reasoningClient = deps.reasoningClient ?? null;
    this.logger = deps.logger ?? new AgentLogger({ level: deps.config.logLevel, scope: 'Pipeline' });
    this.orderGateway = deps.orderGateway ?? new PaperOrderGateway(this.logger.child('Paper'));
    this.clock = deps.clock ?? (() => new Date());
  }

  get reasoningEnabled(): boolean {
    return this.config.reasoning.enabled && this.reasoningClient !== null;
  }

  /**
   * Run every gate for one symbol and return a well-formed result
   */
  async run(symbol: string): Promise<PipelineResult> {
    const normalized = symbol.trim().toUpperCase();
    const logger = this.logger.child('Pipeline');
    const run = new RunRecord(uuidv4(), normalized, this.clock(), logger);
    logger.setRunId(run.runId);

    logger.log('RUN_START', `${normalized} run ${run.runId} (reasoning ${this.reasoningEnabled ? 'on' : 'off'})`);
    const started = Date.now();

    try {
      const recommendation = await this.execute(run);
      logger.log(
        'DECISION',
        `${normalized}: ${recommendation.decision} ` +
          `(confidence ${recommendation.confidence.toFixed(2)}, gates ${run.gatesPassed.join(' > ') || 'none'}, ${Date.now() - started}ms)`,
      );
      return run.result(recommendation);
    } catch (error) {
      const message = run.addError('pipeline', error);
      logger.log('FAILURE', `Pipeline aborted after ${Date.now() - started}ms: ${message}`);
      return run.result(noTradeRecommendation(`pipeline error: ${message}`, run.gatesPassed));
    }
  }

  private async execute(run: RunRecord): Promise<Recommendation> {
    const now = run.startedAt;

    // Stage 1: 15m trend
    const trendSeries = await this.fetchSeries(run, '15m', '15', now);
    const trend = buildTrendContext(trendSeries, this.indicators);
    run.contexts['15m'] = trend;
    if (!this.gate(run, '15m', trend.tradeAllowed, trend, trend.reason)) {
      return noTradeRecommendation(GATE_FAILURE_REASONS['15m'], run.gatesPassed);
    }

    // Stage 2: 5m setup
    const setupSeries = await this.fetchSeries(run, '5m', '5', now);
    const setup = buildSetupContext(setupSeries, trend.bias, this.indicators);
    run.contexts['5m'] = setup;
    if (!this.gate(run, '5m', setup.proceedToEntry, setup, setup.reason)) {
      return noTradeRecommendation(GATE_FAILURE_REASONS['5m'], run.gatesPassed);
    }

    // Stage 3: option chain
    const chain = await this.fetchChain(run);
    if (chain) {
      const fallbackSpot = setup.latestClose ?? trend.latestClose;
      const selection = selectCandidates(chain, trend.bias, fallbackSpot, this.config.pipeline.maxSpreadPct);
      run.candidates = selection.candidates;
      const passed = this.gate(run, 'options', selection.candidates.length > 0, selection, selection.reason);
      if (!passed) {
        return noTradeRecommendation(GATE_FAILURE_REASONS.options, run.gatesPassed);
      }
    } else {
      this.gate(run, 'options', false, null, 'option chain unavailable');
      return noTradeRecommendation(GATE_FAILURE_REASONS.options, run.gatesPassed);
    }

    // Stage 4: 1m trigger
    const triggerSeries = await this.fetchSeries(run, '1m', '1', now);
    const trigger = buildTriggerContext(triggerSeries, trend.bias, this.indicators);
    run.contexts['1m'] = trigger;
    if (!this.gate(run, '1m', trigger.entryTriggerConfirmed, trigger, trigger.reason)) {
      return noTradeRecommendation(GATE_FAILURE_REASONS['1m'], run.gatesPassed);
    }

    // Stage 5: brief and recommendation
    return this.recommend(run, { trend, setup, trigger, chain });
  }

  private gate(
    run: RunRecord,
    gate: GateName,
    passed: boolean,
    output: unknown,
    reason?: string,
  ): boolean {
    run.addAudit(gate, `${gate} gate`, { symbol: run.symbol }, output, passed, reason);
    if (passed) {
      run.gatesPassed.push(gate);
      run.logger.log('GATE_PASS', `${gate}${reason ? `: ${reason}` : ''}`);
    } else {
      run.logger.log('GATE_FAIL', `${GATE_FAILURE_REASONS[gate]}${reason ? ` (${reason})` : ''}`);
    }
    return passed;
  }

  private async fetchSeries(
    run: RunRecord,
    stage: GateName,
    timeframe: keyof typeof LOOKBACK_DAYS,
    now: Date,
  ): Promise<StageSeries> {
    const from = new Date(now.getTime() - LOOKBACK_DAYS[timeframe] * DAY_MS);
    const code: TimeframeCode = timeframe;
    const started = Date.now();
    run.logger.log('FETCHING', `${stage} candles for ${run.symbol}`);

    try {
      const candles = await this.dataSource.fetchCandles(run.symbol, code, from, now);
      run.logger.debug(`${stage} fetch complete: ${candles.length} candles (${Date.now() - started}ms)`);
      return seriesFromCandles(candles);
    } catch (error) {
      const message = run.addError(stage, error);
      run.logger.warn(`${stage} fetch failed (${Date.now() - started}ms): ${message}`);
      run.addAudit(stage, `${stage} fetch`, { timeframe }, { error: message }, false, message, Date.now() - started);
      return { status: 'error', reason: message };
    }
  }

  private async fetchChain(run: RunRecord): Promise<OptionChain | null> {
    const started = Date.now();
    run.logger.log('FETCHING', `option chain for ${run.symbol}`);
    try {
      const chain = await this.dataSource.fetchOptionChain(run.symbol);
      run.logger.debug(`option chain: ${chain.strikes.length} quotes, expiry ${chain.selectedExpiry ?? 'n/a'} (${Date.now() - started}ms)`);
      return chain;
    } catch (error) {
      const message = run.addError('options', error);
      run.logger.warn(`option chain fetch failed (${Date.now() - started}ms): ${message}`);
      return null;
    }
  }

  private async fetchVix(run: RunRecord): Promise<number | null> {
    if (!this.dataSource.fetchVix) return null;
    try {
      return await this.dataSource.fetchVix();
    } catch (error) {
      // VIX only colours the brief; a missing value is reported as unknown regime
      run.logger.warn(`VIX unavailable: ${errorMessage(error)}`);
      return null;
    }
  }

  private async recommend(
    run: RunRecord,
    stages: { trend: TrendContext; setup: SetupContext; trigger: TriggerContext; chain: OptionChain },
  ): Promise<Recommendation> {
    const { trend, setup, trigger, chain } = stages;
    const vix = await this.fetchVix(run);
    const market = assessMarketConditions({
      now: run.startedAt,
      vix,
      selectedExpiry: chain.selectedExpiry,
      eventDates: this.config.pipeline.eventDates,
      trendBias: trend.bias,
    });

    const brief = toStructuredBrief({
      symbol: run.symbol,
      now: run.startedAt,
      trend,
      setup,
      trigger,
      candidates: run.candidates,
      market,
    });
    run.brief = brief;
    run.addAudit('brief', 'Structured brief', { candidates: run.candidates.length }, brief, true, market.noTradeReason ?? undefined);

    const base = deterministicRecommendation({
      trend,
      setup,
      trigger,
      candidates: run.candidates,
      gatesPassed: run.gatesPassed,
    });

    if (!this.reasoningEnabled || this.reasoningClient === null) {
      return base;
    }
    return this.adjudicate(run, brief, base, this.reasoningClient);
  }

  /**
   * Hand the brief to the reasoning loop and fold its verdict into the base recommendation.
   * Any loop failure falls back to the base.
   */
  private async adjudicate(
    run: RunRecord,
    brief: StructuredBrief,
    base: Recommendation,
    client: ReasoningClient,
  ): Promise<Recommendation> {
    if (!brief.timeframes['15m'].tradeAllowed) {
      return noTradeRecommendation('15m permission denied', run.gatesPassed);
    }

    const registry = createToolRegistry({
      mode: this.config.loop.mode,
      brief,
      gateway: this.orderGateway,
    });
    const loop = new ReasoningLoop({
      goal:
        `Decide whether to buy ${base.direction ?? 'an'} option on ${brief.symbol} now. ` +
        `All four gates passed; check the brief for contradictions and market risks before answering.`,
      context: { brief },
      client,
      registry,
      settings: this.config.loop,
      logger: run.logger.child('Agent'),
    });

    const started = Date.now();
    try {
      const outcome = await loop.run();
      run.reasoning = {
        stopReason: outcome.stopReason,
        steps: outcome.steps,
        toolsUsed: outcome.memory.map(entry => entry.tool),
        answer: outcome.answer,
      };
      run.addAudit('reasoning', 'Reasoning loop', { mode: this.config.loop.mode }, run.reasoning, outcome.success, outcome.error, Date.now() - started);

      if (!outcome.success) {
        run.errors.push({ stage: 'reasoning', type: 'REASONING', message: outcome.error ?? 'reasoning loop failed' });
        run.logger.warn('Reasoning failed, using the deterministic recommendation');
        return base;
      }

      // Only a stated verdict moves the confidence; budget stops keep the base
      const answered = outcome.stopReason === 'finalAnswer' || outcome.stopReason === 'lowConfidence';
      if (!answered || outcome.answer === null) {
        return base;
      }
      return applyVerdict(base, parseVerdict(outcome.answer), outcome.answer);
    } catch (error) {
      const message = run.addError('reasoning', error);
      run.logger.warn(`Reasoning loop threw, using the deterministic recommendation: ${message}`);
      return base;
    }
  }
}
