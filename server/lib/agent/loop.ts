// server/lib/agent/loop.ts
//
// ReAct loop: ask the model, parse the reply, run at most one tool, check
// the stop conditions, repeat. Each loop instance owns its state and cache.

import { DEFAULT_LOOP_SETTINGS, type LoopSettings } from '../../config';
import { errorMessage } from './errors';
import { AgentLogger } from './logger';
import { evaluateStop, LoopState, type StopDecision } from './loop-state';
import { buildMessages } from './prompt';
import { extractConfidence, looksLikeToolCallJson, ResponseParser, type ParsedReply } from './response-parser';
import type { ToolRegistry } from './tools/registry';
import { stripThinking } from './utils/parseJson';
import type { LoopResult, ModelReply, ReasoningClient, StopReason, ToolCall, ToolResult } from './types';

export interface ReasoningLoopOptions {
  goal: string;
  context?: Record<string, unknown>;
  client: ReasoningClient;
  registry: ToolRegistry;
  settings?: Partial<LoopSettings>;
  logger?: AgentLogger;
  toolTimeoutMs?: number;
}

const DEFERRING = /would recommend calling|i should call|need to call|i will call/i;
const SHORT_CALL_WORDS = /\b(?:call|use|execute)\b/i;
const ANALYSIS_WORDS = /analysis|recommend|trend|signal|confidence|entry|strike|bias|setup/i;

/**
 * Pick the answer from the last substantive assistant turn, or summarize tool activity
 */
export function synthesizeAnswer(state: LoopState): string {
  for (let i = state.history.length - 1; i >= 0; i--) {
    const message = state.history[i];
    if (message.role !== 'assistant') continue;

    // <think> blocks never count as the answer
    const content = stripThinking(message.content).text;
    if (content === '') continue;
    if (looksLikeToolCallJson(content)) continue;
    if (DEFERRING.test(content)) continue;
    if (content.length < 30 && SHORT_CALL_WORDS.test(content)) continue;

    if (content.length > 50 || ANALYSIS_WORDS.test(content)) {
      return content;
    }
  }

  if (state.memory.length > 0) {
    const activity = state.memory
      .map(entry => `${entry.tool}: ${entry.result.success ? 'success' : 'error'}`)
      .join(', ');
    return `Agent executed tools (${activity}) but didn't provide a final analysis.`;
  }

  return 'No final answer provided.';
}

export class ReasoningLoop {
  private state: LoopState;
  private readonly client: ReasoningClient;
  private readonly registry: ToolRegistry;
  private readonly parser: ResponseParser;
  private readonly logger: AgentLogger;
  private readonly toolTimeoutMs?: number;

  constructor(options: ReasoningLoopOptions) {
    const settings: LoopSettings = {
      ...DEFAULT_LOOP_SETTINGS,
      ...options.settings,
      mode: options.registry.mode,
    };
    this.state = LoopState.create({ goal: options.goal, context: options.context, settings });
    this.client = options.client;
    this.registry = options.registry;
    this.parser = new ResponseParser(options.registry.list().filter(t => t.enabled).map(t => t.name));
    this.logger = options.logger ?? new AgentLogger({ scope: 'Agent' });
    this.toolTimeoutMs = options.toolTimeoutMs;
  }

  get currentState(): LoopState {
    return this.state;
  }

  async run(): Promise<LoopResult> {
    const { maxSteps, extraSteps } = this.state.settings;
    this.logger.log('RUN_START', `Reasoning loop started (mode=${this.state.mode}, steps=${maxSteps}+${extraSteps})`);

    // The step budget in evaluateStop ends the loop; this bound is a backstop
    const hardLimit = maxSteps + extraSteps;
    while (this.state.stepCount < hardLimit) {
      const tools = this.registry.toSchema();
      const messages = buildMessages(this.state, tools);

      let reply: ModelReply;
      try {
        reply = await this.client.chat(messages, tools);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error(`Model call failed at step ${this.state.stepCount + 1}: ${message}`);
        return this.finish('reasoningError', message);
      }

      this.state = this.state.appendModelResponse(reply);
      const parsed = this.parser.parse(reply);
      this.logger.debug(`Step ${this.state.stepCount}: ${parsed.kind}${parsed.kind === 'toolCall' ? ` (${parsed.source})` : ''}`);

      if (parsed.kind === 'toolCall') {
        await this.runTool(parsed.call);
      }

      const decision = this.evaluate(parsed);
      if (decision.stop) {
        return this.finish(decision.reason);
      }
    }

    return this.finish('stepLimit');
  }

  private evaluate(parsed: ParsedReply): StopDecision {
    return evaluateStop(this.state, {
      finalAnswer: parsed.kind === 'final',
      confidence: extractConfidence(parsed.text),
    });
  }

  private async runTool(call: ToolCall): Promise<void> {
    const cached = this.state.getCached(call.name, call.arguments);
    let result: ToolResult;

    if (cached) {
      this.logger.log('CACHE_HIT', `${call.name} served from cache`);
      result = { ...cached, cached: true, durationMs: 0 };
    } else {
      this.logger.log('TOOL_CALL', `${call.name} ${JSON.stringify(call.arguments)}`);
      result = await this.registry.execute(call.name, call.arguments, { timeoutMs: this.toolTimeoutMs });
      if (result.success) {
        this.state = this.state.putCached(call.name, call.arguments, result);
        this.logger.log('TOOL_RESULT', `${call.name} completed in ${result.durationMs}ms`);
      } else {
        this.logger.warn(`${call.name} failed: ${result.error ?? 'unknown error'}`);
      }
    }

    this.state = this.state.appendToolResult(call.name, result, call.arguments);
  }

  private finish(stopReason: StopReason, error?: string): LoopResult {
    const state = this.state;
    const failed = stopReason === 'reasoningError';
    const answer = failed ? null : synthesizeAnswer(state);

    this.logger.log(
      'STOPPED',
      `Loop finished: ${stopReason} after ${state.stepCount} step(s), ` +
        `tools used: ${state.memory.map(m => m.tool).join(', ') || 'none'}`,
    );

    return {
      success: !failed,
      answer,
      stopReason,
      steps: state.stepCount,
      memory: [...state.memory],
      conversation: [...state.history],
      ...(error ? { error } : {}),
    };
  }
}
