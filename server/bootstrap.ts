// Loads .env before anything reads process.env
import 'dotenv/config';

import type { AppConfig } from './config';
import { DhanClient } from './broker/dhan';
import { PaperOrderGateway } from './broker/paper';
import { TradingPipeline } from './engine';
import type { AgentLogger } from './lib/agent/logger';
import { OllamaClient } from './lib/llm-client';

/**
 * Wire the collaborators for one process from a validated config
 */
export function createPipeline(config: AppConfig, logger: AgentLogger): TradingPipeline {
  const dataSource = new DhanClient({
    baseUrl: config.dhan.baseUrl,
    clientId: config.dhan.clientId,
    accessToken: config.dhan.accessToken,
    timeoutMs: config.dhan.timeoutMs,
    logger: logger.child('Dhan'),
  });

  const reasoningClient = config.reasoning.hostUrl
    ? new OllamaClient({
        hostUrl: config.reasoning.hostUrl,
        model: config.reasoning.model,
        timeoutMs: config.reasoning.timeoutMs,
      })
    : null;

  return new TradingPipeline({
    config,
    dataSource,
    reasoningClient,
    orderGateway: new PaperOrderGateway(logger.child('Paper')),
    logger,
  });
}
