// server/lib/agent/loop-state.ts
import type { LoopSettings } from '../../config';
import type {
  ChatMessage,
  MemoryEntry,
  ModelReply,
  SafetyMode,
  StopReason,
  ToolArgs,
  ToolResult,
} from './types';

// ============================================
// Cache keys
// ============================================

const ALPHANUMERIC = /^[A-Za-z0-9]+$/;

function normalizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return ALPHANUMERIC.test(trimmed) ? trimmed.toUpperCase() : trimmed;
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (typeof value === 'object' && value !== null) {
    const normalized: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      normalized[key.trim().toLowerCase()] = normalizeValue(inner);
    }
    return normalized;
  }
  return value;
}

// JSON with object keys sorted at every depth
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, inner]) => inner !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, inner]) => `${JSON.stringify(key)}:${canonicalJson(inner)}`).join(',')}}`;
  }
  return JSON.stringify(value ?? null);
}

/**
 * Order- and case-insensitive key for a (tool, arguments) pair
 */
export function cacheKey(toolName: string, args: ToolArgs): string {
  return `${toolName.trim()}:${canonicalJson(normalizeValue(args))}`;
}

// What the model sees for a tool result
function toolMessageContent(result: ToolResult): string {
  if (result.success) {
    return JSON.stringify({
      success: true,
      status: 'SUCCESS',
      ...(result.cached ? { cached: true, message: 'Cached result - you already have this data.' } : {}),
      data: result.data ?? null,
    });
  }
  return JSON.stringify({
    success: false,
    status: 'ERROR',
    error: result.error ?? 'Unknown error',
    message: 'Tool execution FAILED.',
  });
}

// ============================================
// Loop state
// ============================================

export interface LoopStateInit {
  goal: string;
  context?: Record<string, unknown>;
  settings: LoopSettings;
}

/**
 * State of one reasoning-loop run. Every operation returns a new instance.
 */
export class LoopState {
  private constructor(
    readonly goal: string,
    readonly context: Readonly<Record<string, unknown>>,
    readonly settings: Readonly<LoopSettings>,
    readonly stepCount: number,
    readonly history: readonly ChatMessage[],
    readonly memory: readonly MemoryEntry[],
    private readonly cache: ReadonlyMap<string, ToolResult>,
  ) {}

  static create(init: LoopStateInit): LoopState {
    return new LoopState(
      init.goal,
      { ...(init.context ?? {}) },
      { ...init.settings },
      0,
      [],
      [],
      new Map(),
    );
  }

  get mode(): SafetyMode {
    return this.settings.mode;
  }

  /**
   * Count a step and record the assistant turn
   */
  appendModelResponse(reply: ModelReply): LoopState {
    const message: ChatMessage = {
      role: 'assistant',
      content: reply.text,
      ...(reply.toolCalls.length > 0 ? { toolCalls: reply.toolCalls.map(call => ({ ...call })) } : {}),
    };
    return new LoopState(
      this.goal,
      this.context,
      this.settings,
      this.stepCount + 1,
      [...this.history, message].slice(-this.settings.maxHistory),
      this.memory,
      this.cache,
    );
  }

  /**
   * Record a tool result in history and memory, trimming both
   */
  appendToolResult(toolName: string, result: ToolResult, args: ToolArgs = {}, now: Date = new Date()): LoopState {
    const message: ChatMessage = {
      role: 'tool',
      toolName,
      content: toolMessageContent(result),
    };
    const entry: MemoryEntry = {
      tool: toolName,
      arguments: { ...args },
      result,
      timestamp: now.toISOString(),
    };
    return new LoopState(
      this.goal,
      this.context,
      this.settings,
      this.stepCount,
      [...this.history, message].slice(-this.settings.maxHistory),
      [...this.memory, entry].slice(-this.settings.maxMemory),
      this.cache,
    );
  }

  getCached(toolName: string, args: ToolArgs): ToolResult | undefined {
    return this.cache.get(cacheKey(toolName, args));
  }

  putCached(toolName: string, args: ToolArgs, result: ToolResult): LoopState {
    const cache = new Map(this.cache);
    cache.set(cacheKey(toolName, args), result);
    return new LoopState(
      this.goal,
      this.context,
      this.settings,
      this.stepCount,
      this.history,
      this.memory,
      cache,
    );
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  toolErrorCount(): number {
    return this.memory.filter(entry => !entry.result.success).length;
  }

  /** History entries sent to the model on the next step */
  recentHistory(): ChatMessage[] {
    return this.history.slice(-this.settings.historyWindow);
  }

  lastAssistantText(): string | null {
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].role === 'assistant') return this.history[i].content;
    }
    return null;
  }
}

// ============================================
// Stop conditions
// ============================================

export type StopDecision = { stop: false } | { stop: true; reason: StopReason };

export interface StopSignals {
  /** The latest reply was classified as a final answer */
  finalAnswer: boolean;
  /** Confidence the latest reply reported, if any */
  confidence: number | null;
}

const CONTINUE_PATTERN = /continue|need more|still missing|one more/i;

/**
 * Pure check run after every step. Order: final answer, low confidence,
 * tool errors, step budget (with a short grace period when the model asks to continue).
 */
export function evaluateStop(state: LoopState, signals: StopSignals): StopDecision {
  const { settings } = state;

  if (signals.finalAnswer) {
    return { stop: true, reason: 'finalAnswer' };
  }

  if (signals.confidence !== null && signals.confidence < settings.minConfidence) {
    return { stop: true, reason: 'lowConfidence' };
  }

  if (state.toolErrorCount() >= settings.maxToolErrors) {
    return { stop: true, reason: 'toolErrors' };
  }

  if (state.stepCount >= settings.maxSteps) {
    const hardLimit = settings.maxSteps + settings.extraSteps;
    const lastText = state.lastAssistantText() ?? '';
    if (state.stepCount < hardLimit && CONTINUE_PATTERN.test(lastText)) {
      return { stop: false };
    }
    return { stop: true, reason: 'stepLimit' };
  }

  return { stop: false };
}
