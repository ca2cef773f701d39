import { EventEmitter } from 'events';
import type { LogLevel } from '../../config';

// Log types with display configuration
export const LOG_TYPES = {
  RUN_START:   { label: 'RUN START',   level: 'info' },
  FETCHING:    { label: 'FETCHING',    level: 'debug' },
  GATE_PASS:   { label: 'GATE PASS',   level: 'info' },
  GATE_FAIL:   { label: 'GATE FAIL',   level: 'info' },
  THINKING:    { label: 'THINKING',    level: 'debug' },
  TOOL_CALL:   { label: 'TOOL CALL',   level: 'info' },
  TOOL_RESULT: { label: 'TOOL RESULT', level: 'debug' },
  CACHE_HIT:   { label: 'CACHE HIT',   level: 'debug' },
  DECISION:    { label: 'DECISION',    level: 'info' },
  ORDER:       { label: 'ORDER',       level: 'info' },
  STOPPED:     { label: 'STOPPED',     level: 'info' },
  WARNING:     { label: 'WARNING',     level: 'warn' },
  FAILURE:     { label: 'FAILURE',     level: 'error' },
} as const satisfies Record<string, { label: string; level: LogLevel }>;

export type LogType = keyof typeof LOG_TYPES;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEvent {
  logType: LogType;
  level: LogLevel;
  scope: string;
  text: string;
  timestamp: string;
  runId?: string;
}

export interface AgentLoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Suppress console output; events are still emitted */
  silent?: boolean;
  /** Exchange timezone used for the printed clock */
  timeZone?: string;
}

export class AgentLogger {
  readonly events = new EventEmitter();
  private readonly level: LogLevel;
  private readonly scope: string;
  private readonly silent: boolean;
  private readonly timeZone: string;
  private runId: string | null = null;

  constructor(options: AgentLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.scope = options.scope ?? 'Agent';
    this.silent = options.silent ?? false;
    this.timeZone = options.timeZone ?? 'Asia/Kolkata';
  }

  /**
   * Logger sharing level, sink and emitter under another [Scope] prefix
   */
  child(scope: string): AgentLogger {
    const child = new AgentLogger({
      level: this.level,
      scope,
      silent: this.silent,
      timeZone: this.timeZone,
    });
    child.runId = this.runId;
    child.events.on('log', (event: LogEvent) => this.events.emit('log', event));
    return child;
  }

  setRunId(runId: string | null): void {
    this.runId = runId;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  /**
   * Write one tagged line
   */
  log(logType: LogType, text: string): void {
    const config = LOG_TYPES[logType];
    if (!this.isEnabled(config.level)) return;

    const now = new Date();
    const event: LogEvent = {
      logType,
      level: config.level,
      scope: this.scope,
      text,
      timestamp: now.toISOString(),
      runId: this.runId ?? undefined,
    };

    if (!this.silent) {
      const line = `[${this.scope}] ${this.formatTime(now)} [${config.label}] ${text}`;
      if (config.level === 'error') console.error(line);
      else if (config.level === 'warn') console.warn(line);
      else console.log(line);
    }

    this.events.emit('log', event);
  }

  debug(text: string): void {
    this.log('THINKING', text);
  }

  warn(text: string): void {
    this.log('WARNING', text);
  }

  error(text: string): void {
    this.log('FAILURE', text);
  }

  private formatTime(d: Date): string {
    return d.toLocaleTimeString('en-US', {
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
      timeZone: this.timeZone,
    });
  }
}
