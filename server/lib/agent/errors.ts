/**
 * Error taxonomy and classification
 *
 * Core operations return result objects instead of throwing past their own
 * boundary. These classes mark the few places where something is thrown,
 * and classifyError() turns anything caught into a reportable shape.
 */

export enum AgentErrorType {
  DATA_SOURCE = 'DATA_SOURCE',
  REASONING = 'REASONING',
  TOOL_EXECUTION = 'TOOL_EXECUTION',
  VALIDATION = 'VALIDATION',
  CONFIGURATION = 'CONFIGURATION',
  TIMEOUT = 'TIMEOUT',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Broker fetch failure. Fails the current gate only.
 */
export class DataSourceError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'DataSourceError';
  }
}

/**
 * Model endpoint unreachable or reply malformed. Triggers the deterministic fallback.
 */
export class ReasoningError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'ReasoningError';
  }
}

/**
 * A tool handler threw or timed out.
 */
export class ToolExecutionError extends Error {
  constructor(public readonly toolName: string, message: string) {
    super(message);
    this.name = 'ToolExecutionError';
  }
}

/**
 * Bad tool arguments. Returned to the model so it can retry.
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly param?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Missing or invalid settings. Fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export interface AgentError {
  type: AgentErrorType;
  message: string;
  recoverable: boolean;
  originalError?: Error;
  context?: Record<string, unknown>;
}

/**
 * Classify a caught value into an AgentError for reporting
 */
export function classifyError(error: unknown, context?: Record<string, unknown>): AgentError {
  if (!(error instanceof Error)) {
    return {
      type: AgentErrorType.UNKNOWN,
      message: String(error),
      recoverable: false,
      context,
    };
  }

  if (error instanceof DataSourceError) {
    return { type: AgentErrorType.DATA_SOURCE, message: error.message, recoverable: true, originalError: error, context };
  }
  if (error instanceof ReasoningError) {
    return { type: AgentErrorType.REASONING, message: error.message, recoverable: true, originalError: error, context };
  }
  if (error instanceof ToolExecutionError) {
    return { type: AgentErrorType.TOOL_EXECUTION, message: error.message, recoverable: true, originalError: error, context };
  }
  if (error instanceof ValidationError) {
    return { type: AgentErrorType.VALIDATION, message: error.message, recoverable: true, originalError: error, context };
  }
  if (error instanceof ConfigurationError) {
    return { type: AgentErrorType.CONFIGURATION, message: error.message, recoverable: false, originalError: error, context };
  }

  const msg = error.message.toLowerCase();

  if (msg.includes('timeout') || msg.includes('timed out') || msg.includes('etimedout') || error.name === 'AbortError') {
    return {
      type: AgentErrorType.TIMEOUT,
      message: 'A request took too long to complete.',
      recoverable: true,
      originalError: error,
      context,
    };
  }

  return {
    type: AgentErrorType.UNKNOWN,
    message: error.message.length > 200 ? error.message.slice(0, 200) + '...' : error.message,
    recoverable: false,
    originalError: error,
    context,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
