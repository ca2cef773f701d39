// server/lib/agent/types.ts

// ============================================
// Safety mode
// ============================================

/** alert = read-only analysis, live = execution tools enabled */
export type SafetyMode = 'alert' | 'live';

// ============================================
// Tool definitions
// ============================================

export type ParamType = 'string' | 'integer' | 'number' | 'array' | 'object';

export interface ParamSpec {
  type: ParamType;
  description?: string;
  required?: boolean;
  enum?: readonly string[];
}

export type ParamSchema = Record<string, ParamSpec>;

export type ToolKind = 'analysis' | 'execution';

export type ToolArgs = Record<string, unknown>;

export type ToolHandler = (args: ToolArgs) => unknown | Promise<unknown>;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ParamSchema;
  kind: ToolKind;
  handler: ToolHandler;
  /** Computed from the registry's safety mode */
  enabled: boolean;
}

export type ToolErrorType = 'notFound' | 'disabled' | 'validation' | 'execution' | 'timeout';

export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
  errorType?: ToolErrorType;
  durationMs: number;
  cached?: boolean;
}

/** Tool descriptor as the model sees it */
export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, {
        type: ParamType;
        description?: string;
        enum?: readonly string[];
      }>;
      required: string[];
    };
  };
}

// ============================================
// Model exchange
// ============================================

export interface ToolCall {
  name: string;
  arguments: ToolArgs;
}

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  toolName?: string;
  toolCalls?: ToolCall[];
}

export interface ModelReply {
  text: string;
  toolCalls: ToolCall[];
  finishReason: string | null;
}

/**
 * Remote model collaborator. Throws ReasoningError on transport or format failure.
 */
export interface ReasoningClient {
  chat(messages: ChatMessage[], tools: ToolSchema[]): Promise<ModelReply>;
}

// ============================================
// Loop output
// ============================================

export type StopReason =
  | 'finalAnswer'
  | 'stepLimit'
  | 'lowConfidence'
  | 'toolErrors'
  | 'reasoningError';

export interface MemoryEntry {
  tool: string;
  arguments: ToolArgs;
  result: ToolResult;
  timestamp: string;
}

export interface LoopResult {
  success: boolean;
  answer: string | null;
  stopReason: StopReason;
  steps: number;
  memory: MemoryEntry[];
  conversation: ChatMessage[];
  error?: string;
}
