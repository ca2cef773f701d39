/**
 * Analysis API Routes
 *
 * Runs the gate pipeline on demand, drives the watch scheduler and exposes
 * the tool catalog the reasoning loop would see in the current safety mode.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { TradingPipeline } from '../engine';
import { errorMessage } from '../lib/agent/errors';
import { createToolRegistry } from '../lib/agent/tools';
import { cronExpressionFor, type WatchScheduler } from '../services/watchScheduler';

const symbolSchema = z
  .string()
  .trim()
  .min(1, 'Symbol is required')
  .max(20, 'Symbol is too long')
  .regex(/^[A-Za-z0-9]+$/, 'Symbol must be alphanumeric')
  .transform(value => value.toUpperCase());

const watchStartSchema = z.object({
  symbol: symbolSchema.optional(),
  intervalSeconds: z.number().int('intervalSeconds must be a whole number').min(1, 'intervalSeconds must be at least 1').optional(),
});

export interface AnalysisRouteDeps {
  config: AppConfig;
  pipeline: TradingPipeline;
  scheduler: WatchScheduler;
}

export function createAnalysisRouter(deps: AnalysisRouteDeps): Router {
  const router = Router();

  // ============================================
  // GET /api/health
  // ============================================

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      ok: true,
      mode: deps.config.loop.mode,
      reasoning: deps.pipeline.reasoningEnabled,
      defaultSymbol: deps.config.pipeline.defaultSymbol,
      watch: deps.scheduler.getStatus(),
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================
  // GET /api/analysis/:symbol
  // Runs every gate and returns the full pipeline result
  // ============================================

  router.get('/analysis/:symbol', async (req: Request, res: Response) => {
    const parsed = symbolSchema.safeParse(req.params.symbol);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.issues[0]?.message ?? 'Invalid symbol' });
      return;
    }

    try {
      const result = await deps.pipeline.run(parsed.data);
      res.json({ ok: true, result });
    } catch (error) {
      // run() reports its own failures; this only guards the response path
      console.error('[AnalysisAPI] Unexpected error:', errorMessage(error));
      res.status(500).json({ ok: false, error: errorMessage(error) });
    }
  });

  // ============================================
  // Watch scheduler
  // GET /api/watch, POST /api/watch/start, POST /api/watch/stop
  // ============================================

  router.get('/watch', (_req: Request, res: Response) => {
    res.json({ ok: true, watch: deps.scheduler.getStatus() });
  });

  router.post('/watch/start', (req: Request, res: Response) => {
    const parsed = watchStartSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.issues[0]?.message ?? 'Invalid watch request' });
      return;
    }

    const status = deps.scheduler.getStatus();
    if (status.isRunning) {
      res.status(409).json({ ok: false, error: `Already watching ${status.symbol ?? 'a symbol'}` });
      return;
    }

    const intervalSeconds = parsed.data.intervalSeconds ?? deps.config.watch.intervalSeconds;
    try {
      cronExpressionFor(intervalSeconds);
    } catch (error) {
      res.status(400).json({ ok: false, error: errorMessage(error) });
      return;
    }

    deps.scheduler.start({
      symbol: parsed.data.symbol ?? deps.config.pipeline.defaultSymbol,
      intervalSeconds,
      alertConfidence: deps.config.watch.alertConfidence,
    });
    res.json({ ok: true, watch: deps.scheduler.getStatus() });
  });

  router.post('/watch/stop', (_req: Request, res: Response) => {
    deps.scheduler.stop();
    res.json({ ok: true, watch: deps.scheduler.getStatus() });
  });

  // ============================================
  // GET /api/tools
  // Tool descriptors for the current safety mode
  // ============================================

  router.get('/tools', (_req: Request, res: Response) => {
    const registry = createToolRegistry({ mode: deps.config.loop.mode });
    res.json({
      ok: true,
      mode: registry.mode,
      tools: registry.toSchema(),
      disabled: registry.list().filter(tool => !tool.enabled).map(tool => tool.name),
    });
  });

  return router;
}
