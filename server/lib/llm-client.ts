/**
 * LLM Client for a local or tunnelled Ollama server
 *
 * Speaks /api/chat with native tool calling (stream: false). Any transport
 * failure, non-2xx status or malformed body surfaces as a ReasoningError.
 */

import { z } from 'zod';
import { errorMessage, ReasoningError } from './agent/errors';
import type { ChatMessage, ModelReply, ReasoningClient, ToolArgs, ToolCall, ToolSchema } from './agent/types';

// Wire types (Ollama native format)
export interface OllamaToolCall {
  function: {
    name: string;
    arguments: Record<string, unknown>;
  };
}

export interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_name?: string;
  tool_calls?: OllamaToolCall[];
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaMessage[];
  tools?: ToolSchema[];
  stream: false;
}

const toolCallSchema = z.object({
  function: z.object({
    name: z.string(),
    arguments: z.union([z.record(z.unknown()), z.string()]).optional(),
  }),
});

const chatResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string().nullish(),
    thinking: z.string().nullish(),
    tool_calls: z.array(toolCallSchema).nullish(),
    finish_reason: z.string().nullish(),
  }),
  done: z.boolean().optional(),
  done_reason: z.string().nullish(),
});

export interface OllamaClientOptions {
  hostUrl: string;
  model: string;
  timeoutMs?: number;
}

export interface LLMStatusResponse {
  online: boolean;
  model: string;
  modelAvailable?: boolean;
  error?: string;
}

const DEFAULT_TIMEOUT_MS = 30000;
const STATUS_TIMEOUT_MS = 5000;

function toWireMessage(message: ChatMessage): OllamaMessage {
  return {
    role: message.role,
    content: message.content,
    ...(message.toolName ? { tool_name: message.toolName } : {}),
    ...(message.toolCalls && message.toolCalls.length > 0
      ? { tool_calls: message.toolCalls.map(call => ({ function: { name: call.name, arguments: call.arguments } })) }
      : {}),
  };
}

function parseArguments(raw: Record<string, unknown> | string | undefined): ToolArgs {
  if (raw === undefined) return {};
  if (typeof raw !== 'string') return raw;
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

export class OllamaClient implements ReasoningClient {
  private readonly hostUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OllamaClientOptions) {
    this.hostUrl = options.hostUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * One non-streaming chat turn with the tool catalog attached
   */
  async chat(messages: ChatMessage[], tools: ToolSchema[]): Promise<ModelReply> {
    const body: OllamaChatRequest = {
      model: this.model,
      messages: messages.map(toWireMessage),
      ...(tools.length > 0 ? { tools } : {}),
      stream: false,
    };

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.hostUrl}/api/chat`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeout);
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ReasoningError(`LLM request timed out after ${this.timeoutMs}ms`);
      }
      throw new ReasoningError(`LLM unreachable: ${errorMessage(error)}`);
    }

    try {
      if (!response.ok) {
        const errorText = await response.text();
        throw new ReasoningError(`LLM request failed: ${response.status} - ${errorText.slice(0, 200)}`, response.status);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new ReasoningError(`Malformed LLM response: ${errorMessage(error)}`, response.status);
      }

      const parsed = chatResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new ReasoningError(`Malformed LLM response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, response.status);
      }

      const { message, done, done_reason } = parsed.data;
      const toolCalls: ToolCall[] = (message.tool_calls ?? []).map(call => ({
        name: call.function.name,
        arguments: parseArguments(call.function.arguments),
      }));

      return {
        text: message.content ?? '',
        toolCalls,
        finishReason: message.finish_reason ?? done_reason ?? (done ? 'stop' : null),
      };
    } catch (error) {
      if (error instanceof ReasoningError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ReasoningError(`LLM request timed out after ${this.timeoutMs}ms`);
      }
      throw new ReasoningError(errorMessage(error));
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Check if the server is online and the configured model is pulled
   */
  async checkStatus(): Promise<LLMStatusResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), STATUS_TIMEOUT_MS);

    try {
      const response = await fetch(`${this.hostUrl}/api/tags`, {
        method: 'GET',
        signal: controller.signal,
      });

      if (!response.ok) {
        return { online: false, model: this.model, error: `HTTP ${response.status}` };
      }

      const tags = z
        .object({ models: z.array(z.object({ name: z.string() })).default([]) })
        .safeParse(await response.json());
      const names = tags.success ? tags.data.models.map(m => m.name) : [];

      return {
        online: true,
        model: this.model,
        modelAvailable: names.some(name => name === this.model || name.startsWith(`${this.model}:`)),
      };
    } catch (error) {
      return { online: false, model: this.model, error: errorMessage(error) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
