import * as cron from 'node-cron';
import type { PipelineResult } from '@shared/types/pipeline';
import type { TradingPipeline } from '../engine';
import { errorMessage } from '../lib/agent/errors';

export interface WatchOptions {
  symbol: string;
  intervalSeconds: number;
  /** Confidence at or above which an enter verdict raises an alert */
  alertConfidence: number;
  onResult?: (result: PipelineResult, alert: boolean) => void;
}

export interface WatchStatus {
  isRunning: boolean;
  symbol: string | null;
  intervalSeconds: number | null;
  runs: number;
  alerts: number;
  lastRunAt: string | null;
  lastDecision: string | null;
  lastError: string | null;
}

/**
 * Cron expression for "every N seconds". A `*\/N` step restarts at the top of
 * its field, so N has to divide 60 for the ticks to stay evenly spaced.
 * Whole-minute intervals use the minute field; an hour is the longest interval.
 */
export function cronExpressionFor(intervalSeconds: number): string {
  if (!Number.isInteger(intervalSeconds) || intervalSeconds < 1) {
    throw new Error(`Watch interval must be a whole number of seconds >= 1, got ${intervalSeconds}`);
  }
  if (intervalSeconds < 60) {
    if (60 % intervalSeconds !== 0) {
      throw new Error(`Watch interval under a minute must divide 60 seconds evenly, got ${intervalSeconds}`);
    }
    return `*/${intervalSeconds} * * * * *`;
  }
  if (intervalSeconds === 3600) return '0 * * * *';
  const minutes = intervalSeconds / 60;
  if (Number.isInteger(minutes) && minutes < 60 && 60 % minutes === 0) return `*/${minutes} * * * *`;
  throw new Error(`Watch interval above a minute must be a whole number of minutes dividing an hour, got ${intervalSeconds}`);
}

export function isAlert(result: PipelineResult, alertConfidence: number): boolean {
  return result.recommendation.decision === 'enter' && result.recommendation.confidence >= alertConfidence;
}

/**
 * Re-runs the pipeline for one symbol on a fixed interval. Ticks that fire
 * while a run is still in flight are skipped.
 */
export class WatchScheduler {
  private task: cron.ScheduledTask | null = null;
  private options: WatchOptions | null = null;
  private inFlight = false;
  private runs = 0;
  private alerts = 0;
  private lastRunAt: string | null = null;
  private lastDecision: string | null = null;
  private lastError: string | null = null;

  constructor(private readonly pipeline: TradingPipeline) {}

  start(options: WatchOptions): void {
    if (this.task) {
      console.log('[Watch] Scheduler already running');
      return;
    }

    const expression = cronExpressionFor(options.intervalSeconds);
    this.options = options;
    this.task = cron.schedule(expression, () => {
      void this.tick();
    });

    console.log(`[Watch] Watching ${options.symbol} every ${options.intervalSeconds}s (alert at >= ${options.alertConfidence})`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('[Watch] Scheduler stopped');
    }
  }

  getStatus(): WatchStatus {
    return {
      isRunning: this.task !== null,
      symbol: this.options?.symbol ?? null,
      intervalSeconds: this.options?.intervalSeconds ?? null,
      runs: this.runs,
      alerts: this.alerts,
      lastRunAt: this.lastRunAt,
      lastDecision: this.lastDecision,
      lastError: this.lastError,
    };
  }

  /**
   * One watch cycle. Exposed so callers can run a cycle without waiting for the timer.
   */
  async tick(): Promise<PipelineResult | null> {
    const options = this.options;
    if (!options || this.inFlight) return null;

    this.inFlight = true;
    try {
      const result = await this.pipeline.run(options.symbol);
      const alert = isAlert(result, options.alertConfidence);
      const { decision, confidence, strike, direction } = result.recommendation;

      this.runs++;
      this.lastRunAt = new Date().toISOString();
      this.lastDecision = decision;
      this.lastError = result.errors.length > 0 ? result.errors[0].message : null;

      if (alert) {
        this.alerts++;
        console.log(`[Watch] ALERT ${options.symbol}: enter ${strike ?? ''} ${direction ?? ''} (confidence ${confidence.toFixed(2)})`);
      } else {
        console.log(`[Watch] ${options.symbol}: ${decision} (confidence ${confidence.toFixed(2)})`);
      }

      options.onResult?.(result, alert);
      return result;
    } catch (error) {
      this.lastError = errorMessage(error);
      console.error(`[Watch] Cycle failed: ${this.lastError}`);
      return null;
    } finally {
      this.inFlight = false;
    }
  }
}
