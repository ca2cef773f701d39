import express, { type NextFunction, type Request, type Response } from 'express';
import { createPipeline } from './bootstrap';
import { loadConfig, type AppConfig } from './config';
import { ConfigurationError, errorMessage } from './lib/agent/errors';
import { AgentLogger } from './lib/agent/logger';
import { createAnalysisRouter } from './routes/analysisRoutes';
import { WatchScheduler } from './services/watchScheduler';

function start(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      for (const issue of error.issues) console.error(`[Config] ${issue}`);
    } else {
      console.error(`[Config] ${errorMessage(error)}`);
    }
    process.exit(1);
  }

  const logger = new AgentLogger({ level: config.logLevel, scope: 'Server' });
  const pipeline = createPipeline(config, logger);
  const scheduler = new WatchScheduler(pipeline);

  const app = express();
  app.use(express.json());

  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      if (req.path.startsWith('/api')) {
        logger.debug(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - started}ms`);
      }
    });
    next();
  });

  app.use('/api', createAnalysisRouter({ config, pipeline, scheduler }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = errorMessage(err);
    console.error('[Server] Unhandled route error:', message);
    res.status(500).json({ ok: false, error: message });
  });

  const server = app.listen(config.port, () => {
    logger.log('RUN_START', `serving on port ${config.port} (${config.env}, mode=${config.loop.mode}, reasoning=${pipeline.reasoningEnabled ? config.reasoning.model : 'off'})`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    scheduler.stop();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start();
