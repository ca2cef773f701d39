import { afterEach, describe, expect, it, vi } from 'vitest';
import { AgentLogger, type LogEvent } from './logger';

describe('AgentLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints scoped, labelled lines', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    new AgentLogger({ scope: 'Pipeline', timeZone: 'UTC' }).log('GATE_PASS', '15m bullish');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[Pipeline\] \d{2}:\d{2}:\d{2} \[GATE PASS\] 15m bullish$/);
  });

  it('filters below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new AgentLogger({ level: 'info' });
    logger.debug('hidden');
    expect(log).not.toHaveBeenCalled();
    expect(logger.isEnabled('warn')).toBe(true);
  });

  it('routes warnings and failures to the matching console stream', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new AgentLogger();
    logger.warn('VIX unavailable');
    logger.error('pipeline error');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('emits events from children to the parent, with the run id', () => {
    const parent = new AgentLogger({ silent: true });
    parent.setRunId('run-1');
    const events: LogEvent[] = [];
    parent.events.on('log', (event: LogEvent) => events.push(event));

    parent.child('Agent').log('TOOL_CALL', 'get_structured_brief');
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ logType: 'TOOL_CALL', level: 'info', scope: 'Agent', text: 'get_structured_brief', runId: 'run-1' });
  });
});
