/**
 * Centralized Configuration Layer
 * All environment-specific settings in one place, built once at startup
 * and passed by reference to the pipeline, registry, loop and routes.
 */

import { z } from 'zod';
import { ConfigurationError, errorMessage } from './lib/agent/errors';
import { cronExpressionFor } from './services/watchScheduler';
import type { SafetyMode } from './lib/agent/types';

// Environment detection
export type AppEnv = 'development' | 'staging' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function getAppEnv(env: NodeJS.ProcessEnv): AppEnv {
  const value = env.APP_ENV || env.NODE_ENV || 'development';
  if (value === 'staging') return 'staging';
  if (value === 'production') return 'production';
  return 'development';
}

// Empty strings count as unset so `FOO=` in a .env file falls back to the default
const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional(),
);

const numberWithDefault = (fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().finite().default(fallback),
  );

const intWithDefault = (fallback: number, min: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().min(min).default(fallback),
  );

const envSchema = z.object({
  DHAN_CLIENT_ID: z.string({ required_error: 'DHAN_CLIENT_ID is required' }).trim().min(1, 'DHAN_CLIENT_ID is required'),
  DHAN_ACCESS_TOKEN: z.string({ required_error: 'DHAN_ACCESS_TOKEN is required' }).trim().min(1, 'DHAN_ACCESS_TOKEN is required'),
  DHAN_BASE_URL: z.string().url().default('https://api.dhan.co'),
  DATA_TIMEOUT_MS: intWithDefault(10000, 100),

  OLLAMA_HOST_URL: optionalString.pipe(z.string().url().optional()),
  OLLAMA_MODEL: z.string().min(1).default('mistral'),
  LLM_TIMEOUT_MS: intWithDefault(30000, 100),

  TRADING_MODE: z.enum(['alert', 'live']).default('alert'),
  DEFAULT_SYMBOL: z.string().min(1).default('NIFTY'),
  MAX_SPREAD_PCT: numberWithDefault(1.0),
  EVENT_DATES: optionalString,

  LOOP_MAX_STEPS: intWithDefault(3, 1),
  LOOP_EXTRA_STEPS: intWithDefault(2, 0),
  LOOP_MAX_MEMORY: intWithDefault(50, 1),
  LOOP_MAX_HISTORY: intWithDefault(10, 1),
  LOOP_HISTORY_WINDOW: intWithDefault(6, 1),
  LOOP_MAX_TOOL_ERRORS: intWithDefault(5, 1),
  LOOP_MIN_CONFIDENCE: numberWithDefault(0.3),

  ALERT_CONFIDENCE: numberWithDefault(0.75),
  WATCH_INTERVAL_SECONDS: intWithDefault(60, 1),

  PORT: intWithDefault(5000, 0),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface LoopSettings {
  mode: SafetyMode;
  /** Soft step limit */
  maxSteps: number;
  /** Extra steps granted when the model asks to continue */
  extraSteps: number;
  maxMemory: number;
  maxHistory: number;
  /** History entries sent to the model on each step */
  historyWindow: number;
  maxToolErrors: number;
  minConfidence: number;
}

export interface AppConfig {
  env: AppEnv;
  port: number;
  logLevel: LogLevel;
  dhan: {
    baseUrl: string;
    clientId: string;
    accessToken: string;
    timeoutMs: number;
  };
  reasoning: {
    enabled: boolean;
    hostUrl: string | null;
    model: string;
    timeoutMs: number;
  };
  pipeline: {
    defaultSymbol: string;
    maxSpreadPct: number;
    eventDates: string[];
  };
  loop: LoopSettings;
  watch: {
    intervalSeconds: number;
    alertConfidence: number;
  };
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function parseEventDates(raw: string | undefined, issues: string[]): string[] {
  if (!raw) return [];
  const dates = raw.split(',').map(d => d.trim()).filter(Boolean);
  for (const date of dates) {
    if (!DATE_PATTERN.test(date)) {
      issues.push(`EVENT_DATES: "${date}" is not a YYYY-MM-DD date`);
    }
  }
  return dates;
}

/**
 * Build the application config from environment variables.
 * Throws ConfigurationError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const key = issue.path.join('.');
      return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new ConfigurationError(issues);
  }

  const values = parsed.data;
  const issues: string[] = [];
  const eventDates = parseEventDates(values.EVENT_DATES, issues);
  if (values.MAX_SPREAD_PCT <= 0) {
    issues.push('MAX_SPREAD_PCT: must be greater than 0');
  }
  try {
    cronExpressionFor(values.WATCH_INTERVAL_SECONDS);
  } catch (error) {
    issues.push(`WATCH_INTERVAL_SECONDS: ${errorMessage(error)}`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const hostUrl = values.OLLAMA_HOST_URL ?? null;

  return {
    env: getAppEnv(env),
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    dhan: {
      baseUrl: values.DHAN_BASE_URL.replace(/\/+$/, ''),
      clientId: values.DHAN_CLIENT_ID,
      accessToken: values.DHAN_ACCESS_TOKEN,
      timeoutMs: values.DATA_TIMEOUT_MS,
    },
    reasoning: {
      enabled: hostUrl !== null,
      hostUrl: hostUrl ? hostUrl.replace(/\/+$/, '') : null,
      model: values.OLLAMA_MODEL,
      timeoutMs: values.LLM_TIMEOUT_MS,
    },
    pipeline: {
      defaultSymbol: values.DEFAULT_SYMBOL.toUpperCase(),
      maxSpreadPct: values.MAX_SPREAD_PCT,
      eventDates,
    },
    loop: {
      mode: values.TRADING_MODE,
      maxSteps: values.LOOP_MAX_STEPS,
      extraSteps: values.LOOP_EXTRA_STEPS,
      maxMemory: values.LOOP_MAX_MEMORY,
      maxHistory: values.LOOP_MAX_HISTORY,
      historyWindow: values.LOOP_HISTORY_WINDOW,
      maxToolErrors: values.LOOP_MAX_TOOL_ERRORS,
      minConfidence: values.LOOP_MIN_CONFIDENCE,
    },
    watch: {
      intervalSeconds: values.WATCH_INTERVAL_SECONDS,
      alertConfidence: values.ALERT_CONFIDENCE,
    },
  };
}

/** Loop defaults, used when a caller builds a loop without a full config */
export const DEFAULT_LOOP_SETTINGS: LoopSettings = {
  mode: 'alert',
  maxSteps: 3,
  extraSteps: 2,
  maxMemory: 50,
  maxHistory: 10,
  historyWindow: 6,
  maxToolErrors: 5,
  minConfidence: 0.3,
};
