#!/usr/bin/env tsx
/**
 * Command line entry
 *
 * Usage:
 *   npx tsx scripts/analyse.ts analyse [SYMBOL] [--json]
 *   npx tsx scripts/analyse.ts watch [SYMBOL] [--interval SECONDS]
 */

import { pathToFileURL } from 'url';
import type { PipelineResult } from '@shared/types/pipeline';
import { createPipeline } from '../server/bootstrap';
import { loadConfig, type AppConfig } from '../server/config';
import { ConfigurationError, errorMessage } from '../server/lib/agent/errors';
import { AgentLogger } from '../server/lib/agent/logger';
import { WatchScheduler } from '../server/services/watchScheduler';

export type CliCommand =
  | { command: 'analyse'; symbol: string | null; json: boolean }
  | { command: 'watch'; symbol: string | null; intervalSeconds: number | null }
  | { command: 'help' };

export const USAGE = `Usage:
  analyse [SYMBOL] [--json]          Run every gate once and print the recommendation
  watch [SYMBOL] [--interval N]      Re-run every N seconds and flag entry alerts`;

/**
 * Parse argv (without the node and script entries)
 */
export function parseArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  const positional = rest.filter(arg => !arg.startsWith('--'));
  const symbol = positional[0] ? positional[0].toUpperCase() : null;

  if (command === 'analyse' || command === 'analyze') {
    return { command: 'analyse', symbol, json: rest.includes('--json') };
  }

  if (command === 'watch') {
    const flag = rest.indexOf('--interval');
    let intervalSeconds: number | null = null;
    if (flag !== -1) {
      const value = Number(rest[flag + 1]);
      if (!Number.isInteger(value) || value < 1) {
        throw new Error(`--interval expects a whole number of seconds, got "${rest[flag + 1] ?? ''}"`);
      }
      intervalSeconds = value;
    }
    // The interval value is not a symbol
    const watchSymbol = rest.filter((arg, i) => !arg.startsWith('--') && !(flag !== -1 && i === flag + 1))[0];
    return { command: 'watch', symbol: watchSymbol ? watchSymbol.toUpperCase() : null, intervalSeconds };
  }

  return { command: 'help' };
}

/**
 * Plain-text summary of one run
 */
export function formatResult(result: PipelineResult): string {
  const rec = result.recommendation;
  const lines: string[] = [
    `${result.symbol} @ ${result.startedAt}`,
    `Decision:   ${rec.decision.toUpperCase()} (confidence ${rec.confidence.toFixed(2)}, ${rec.source})`,
    `Gates:      ${result.gatesPassed.length > 0 ? result.gatesPassed.join(' > ') : 'none passed'}`,
  ];

  if (rec.direction !== null && rec.strike !== null) {
    lines.push(`Contract:   ${rec.strike} ${rec.direction}`);
  }
  if (rec.entry) {
    lines.push(`Entry:      ${rec.entry.low} - ${rec.entry.high}`);
  }
  if (rec.stopLoss !== null) {
    lines.push(`Stop:       ${rec.stopLoss}`);
  }
  if (rec.targets.length > 0) {
    lines.push(`Targets:    ${rec.targets.join(', ')}`);
  }
  lines.push(`Rationale:  ${rec.rationale}`);

  if (result.brief?.market.noTradeReason) {
    lines.push(`Caution:    ${result.brief.market.noTradeReason}`);
  }
  for (const error of result.errors) {
    lines.push(`Error:      [${error.stage}] ${error.message}`);
  }
  return lines.join('\n');
}

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      for (const issue of error.issues) console.error(`[Config] ${issue}`);
    } else {
      console.error(`[Config] ${errorMessage(error)}`);
    }
    process.exit(1);
  }
}

async function main(argv: string[]): Promise<void> {
  let parsed: CliCommand;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.log(USAGE);
    process.exit(2);
  }

  if (parsed.command === 'help') {
    console.log(USAGE);
    return;
  }

  const config = readConfig();
  const symbol = parsed.symbol ?? config.pipeline.defaultSymbol;

  if (parsed.command === 'analyse') {
    // --json keeps stdout machine-readable
    const logger = new AgentLogger({ level: config.logLevel, scope: 'CLI', silent: parsed.json });
    const pipeline = createPipeline(config, logger);
    const result = await pipeline.run(symbol);
    console.log(parsed.json ? JSON.stringify(result, null, 2) : formatResult(result));
    process.exitCode = result.errors.length > 0 ? 1 : 0;
    return;
  }

  const logger = new AgentLogger({ level: config.logLevel, scope: 'CLI' });
  const scheduler = new WatchScheduler(createPipeline(config, logger));
  scheduler.start({
    symbol,
    intervalSeconds: parsed.intervalSeconds ?? config.watch.intervalSeconds,
    alertConfidence: config.watch.alertConfidence,
    onResult: result => console.log(formatResult(result) + '\n'),
  });

  process.on('SIGINT', () => {
    scheduler.stop();
    process.exit(0);
  });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).catch(error => {
    console.error(`[CLI] ${errorMessage(error)}`);
    process.exit(1);
  });
}
