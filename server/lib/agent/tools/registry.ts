// server/lib/agent/tools/registry.ts
import { z } from 'zod';
import { errorMessage, ToolExecutionError, ValidationError } from '../errors';
import type {
  ParamSchema,
  ParamSpec,
  SafetyMode,
  ToolArgs,
  ToolDefinition,
  ToolHandler,
  ToolKind,
  ToolResult,
  ToolSchema,
} from '../types';

export const EXECUTION_TOOLS: readonly string[] = ['place_order', 'modify_order', 'cancel_order'];

interface ExecuteOptions {
  timeoutMs?: number;
}

export interface RegisterOptions {
  kind?: ToolKind;
}

const DEFAULT_TIMEOUT_MS = 10000;

class ToolTimeoutError extends ToolExecutionError {}

function typeLabel(spec: ParamSpec): string {
  switch (spec.type) {
    case 'string':
      return 'a string';
    case 'integer':
      return 'an integer';
    case 'number':
      return 'a number';
    case 'array':
      return 'an array';
    case 'object':
      return 'an object';
  }
}

function baseValidator(
  name: string,
  spec: ParamSpec,
  messages: { required_error: string; invalid_type_error: string },
): z.ZodTypeAny {
  switch (spec.type) {
    case 'string': {
      const allowed = spec.enum;
      return allowed
        ? z.string(messages).refine(value => allowed.includes(value), {
            message: `Parameter ${name} must be one of: ${allowed.join(', ')}`,
          })
        : z.string(messages);
    }
    case 'integer':
      return z.number(messages).int({ message: messages.invalid_type_error });
    case 'number':
      return z.number(messages).finite({ message: messages.invalid_type_error });
    case 'array':
      return z.array(z.unknown(), messages);
    case 'object':
      return z.record(z.unknown(), messages);
  }
}

function paramValidator(name: string, spec: ParamSpec): z.ZodTypeAny {
  const messages = {
    required_error: `Missing required parameter: ${name}`,
    invalid_type_error: `Parameter ${name} must be ${typeLabel(spec)}`,
  };

  const validator = baseValidator(name, spec, messages);
  return spec.required ? validator : validator.optional();
}

/**
 * Build a zod schema from a tool's parameter declaration
 */
export function buildArgsSchema(parameters: ParamSchema): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(parameters)) {
    shape[name] = paramValidator(name, spec);
  }
  return z.object(shape);
}

function isPlainObject(value: unknown): value is ToolArgs {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate raw arguments against a parameter declaration.
 * Null values count as absent. Throws ValidationError on the first problem.
 */
export function validateArguments(parameters: ParamSchema, args: unknown): ToolArgs {
  if (args !== undefined && args !== null && !isPlainObject(args)) {
    throw new ValidationError('Arguments must be an object');
  }

  const source: ToolArgs = isPlainObject(args) ? args : {};
  const cleaned: ToolArgs = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== null && value !== undefined) cleaned[key] = value;
  }

  const parsed = buildArgsSchema(parameters).safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const param = typeof issue.path[0] === 'string' ? issue.path[0] : undefined;
    throw new ValidationError(issue.message, param);
  }
  return parsed.data;
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  constructor(readonly mode: SafetyMode = 'alert') {}

  register(
    name: string,
    description: string,
    parameters: ParamSchema,
    handler: ToolHandler,
    options: RegisterOptions = {},
  ): void {
    const kind = options.kind ?? (EXECUTION_TOOLS.includes(name) ? 'execution' : 'analysis');
    this.tools.set(name, {
      name,
      description,
      parameters,
      kind,
      handler,
      enabled: kind === 'analysis' || this.mode === 'live',
    });
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  isEnabled(name: string): boolean {
    return this.tools.get(name)?.enabled ?? false;
  }

  /**
   * Descriptors for enabled tools, in the function-calling format the model expects
   */
  toSchema(): ToolSchema[] {
    return this.list()
      .filter(tool => tool.enabled)
      .map(tool => ({
        type: 'function' as const,
        function: {
          name: tool.name,
          description: tool.description,
          parameters: {
            type: 'object' as const,
            properties: Object.fromEntries(
              Object.entries(tool.parameters).map(([param, spec]) => [
                param,
                {
                  type: spec.type,
                  ...(spec.description ? { description: spec.description } : {}),
                  ...(spec.enum ? { enum: spec.enum } : {}),
                },
              ]),
            ),
            required: Object.entries(tool.parameters)
              .filter(([, spec]) => spec.required)
              .map(([param]) => param),
          },
        },
      }));
  }

  /**
   * Validate and run a tool. Never throws: every failure comes back as a ToolResult.
   */
  async execute(name: string, args: unknown, options: ExecuteOptions = {}): Promise<ToolResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const tool = this.tools.get(name);
    const startTime = Date.now();

    if (!tool) {
      return {
        success: false,
        error: `Tool '${name}' not found`,
        errorType: 'notFound',
        durationMs: 0,
      };
    }

    if (!tool.enabled) {
      return {
        success: false,
        error: `Tool '${name}' is disabled in alert mode`,
        errorType: 'disabled',
        durationMs: 0,
      };
    }

    let validArgs: ToolArgs;
    try {
      validArgs = validateArguments(tool.parameters, args);
    } catch (error) {
      return {
        success: false,
        error: `Invalid arguments: ${errorMessage(error)}`,
        errorType: 'validation',
        durationMs: Date.now() - startTime,
      };
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      const data = await Promise.race([
        Promise.resolve().then(() => tool.handler(validArgs)),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new ToolTimeoutError(name, `Tool '${name}' timed out after ${timeoutMs}ms`)),
            timeoutMs,
          );
        }),
      ]);

      return {
        success: true,
        data,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        success: false,
        error: errorMessage(error),
        errorType: error instanceof ToolTimeoutError ? 'timeout' : 'execution',
        durationMs: Date.now() - startTime,
      };
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
