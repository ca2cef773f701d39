// server/lib/agent/response-parser.ts
//
// Models do not always use the native tool-call channel; some describe the
// call as JSON or prose instead. The text path below is best-effort and runs
// a fixed chain, first match wins:
//
//   1. explicit final-answer markers          -> final
//   2. structured: fenced / whole-reply JSON   -> tool call
//   3. brace scan from {"name": ...}           -> tool call (regex salvage on bad JSON)
//   4. keyword guess ("call get_x")            -> tool call, only for registered tools
//   5. long reply with concluding language     -> final
//   6. anything else                           -> plain text, loop again

import { extractJSON, findClosingBrace, stripThinking } from './utils/parseJson';
import type { ModelReply, ToolArgs, ToolCall } from './types';

export type CallSource = 'native' | 'structured' | 'braceScan' | 'keyword';

export type ParsedReply =
  | { kind: 'toolCall'; call: ToolCall; source: CallSource; text: string }
  | { kind: 'final'; text: string }
  | { kind: 'text'; text: string };

export interface CallExtractor {
  readonly name: CallSource;
  /** Returns null to give up and pass the text down the chain */
  extract(text: string): ToolCall | null;
}

// ============================================
// Text classification
// ============================================

const FINAL_MARKERS = /final answer|analysis complete|here's my|here is my|recommendation:|conclusion:|i have enough|sufficient information|in summary|to summarize/i;
// "call" counts only when followed by a tool_name
const STILL_WORKING = /\b(?:need (?:more|to)|missing|requires?|fetch|tools?)\b|\bcall(?:ing)?\s+(?:the\s+)?`?[a-z]+_[a-z_]+/i;
const CONCLUDING = /final.*answer|conclusion|recommendation|summary|analysis|based on|according to|the data shows|indicators show/i;
const SUBSTANTIAL_LENGTH = 100;

const TOOL_CALL_SHAPE = /^\s*\{\s*"name"\s*:|"tool_calls"|```json/;
const INLINE_CALL = /\{\s*"name"\s*:/;

/**
 * Reply text that looks like a tool call encoded as JSON
 */
export function looksLikeToolCallJson(text: string): boolean {
  if (TOOL_CALL_SHAPE.test(text)) return true;
  if (/"function"\s*:/.test(text) && text.length < 500) return true;
  return INLINE_CALL.test(text) && text.length < 500;
}

export function isExplicitFinal(text: string): boolean {
  return FINAL_MARKERS.test(text) && !STILL_WORKING.test(text) && !looksLikeToolCallJson(text);
}

export function isSubstantialFinal(text: string): boolean {
  return text.length > SUBSTANTIAL_LENGTH && CONCLUDING.test(text) && !looksLikeToolCallJson(text);
}

const CONFIDENCE_PATTERN =
  /confidence(?:\s+(?:level|score))?\s*(?:is|of|[:=])?\s*(\d+(?:\.\d+)?)\s*(?:(%)|(?:\/|out\s+of)\s*(10|100)\b)?/i;

/**
 * Confidence the model stated in prose, scaled to 0-1.
 * Understands "0.8", "80%", "80", "8/10" and "8 out of 10".
 */
export function extractConfidence(text: string): number | null {
  const match = text.match(CONFIDENCE_PATTERN);
  if (!match) return null;
  const raw = parseFloat(match[1]);
  if (!Number.isFinite(raw)) return null;

  let value: number;
  if (match[3] === '10') {
    value = raw / 10;
  } else if (match[2] === '%' || match[3] === '100' || raw > 1) {
    value = raw / 100;
  } else {
    value = raw;
  }
  return Math.min(1, Math.max(0, value));
}

// ============================================
// Call normalization
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseArguments(raw: unknown): ToolArgs {
  if (isRecord(raw)) return raw;
  if (typeof raw === 'string' && raw.trim() !== '') {
    try {
      const parsed: unknown = JSON.parse(raw);
      return isRecord(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }
  return {};
}

/**
 * Accepts {name, arguments|parameters}, {function: {...}} and {tool_calls: [...]}
 */
export function toToolCall(value: unknown): ToolCall | null {
  if (!isRecord(value)) return null;

  if (Array.isArray(value.tool_calls) && value.tool_calls.length > 0) {
    return toToolCall(value.tool_calls[0]);
  }
  if (isRecord(value.function)) {
    return toToolCall(value.function);
  }
  if (typeof value.name === 'string' && value.name.trim() !== '') {
    return {
      name: value.name.trim(),
      arguments: parseArguments(value.arguments ?? value.parameters ?? value.args),
    };
  }
  return null;
}

// ============================================
// Extractors
// ============================================

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/;

export const structuredExtractor: CallExtractor = {
  name: 'structured',
  extract(text) {
    const fenced = text.match(FENCED_JSON);
    const candidate = fenced ? fenced[1].trim() : text.trim();
    if (!candidate.startsWith('{')) return null;
    try {
      return toToolCall(JSON.parse(candidate));
    } catch {
      return null;
    }
  },
};

const NAME_FIELD = /"name"\s*:\s*"([A-Za-z_][A-Za-z0-9_]*)"/;
const ARGS_FIELD = /"(?:arguments|parameters)"\s*:\s*\{/;

// Pull name and arguments out of JSON that does not parse as a whole
function salvageCall(text: string): ToolCall | null {
  const nameMatch = text.match(NAME_FIELD);
  if (!nameMatch) return null;

  let args: ToolArgs = {};
  const argsMatch = ARGS_FIELD.exec(text);
  if (argsMatch) {
    const open = argsMatch.index + argsMatch[0].length - 1;
    const close = findClosingBrace(text, open);
    if (close !== -1) {
      args = parseArguments(text.substring(open, close + 1));
    }
  }
  return { name: nameMatch[1], arguments: args };
}

export const braceScanExtractor: CallExtractor = {
  name: 'braceScan',
  extract(text) {
    if (!INLINE_CALL.test(text)) return null;
    const { json } = extractJSON(text, INLINE_CALL);
    return toToolCall(json) ?? salvageCall(text);
  },
};

const KEYWORD_CALL = /(?:call|use|execute|run)\s+(?:the\s+)?(?:tool\s+)?`?([a-z_]+)`?/gi;
const TOOL_PREFIXES = ['validate_', 'check_', 'get_', 'calculate_', 'fetch_', 'analyze_', 'detect_'];
const KEYWORD_MAX_LENGTH = 500;

/**
 * Guess a call from prose. Gives up on long replies and on names the registry does not know.
 */
export function keywordExtractor(knownTools: ReadonlySet<string>): CallExtractor {
  return {
    name: 'keyword',
    extract(text) {
      if (text.length > KEYWORD_MAX_LENGTH) return null;
      for (const match of text.matchAll(KEYWORD_CALL)) {
        const name = match[1].toLowerCase();
        if (TOOL_PREFIXES.some(prefix => name.startsWith(prefix)) && knownTools.has(name)) {
          return { name, arguments: {} };
        }
      }
      return null;
    },
  };
}

// ============================================
// Parser
// ============================================

export class ResponseParser {
  private readonly extractors: CallExtractor[];

  constructor(knownTools: Iterable<string>) {
    this.extractors = [
      structuredExtractor,
      braceScanExtractor,
      keywordExtractor(new Set(knownTools)),
    ];
  }

  parse(reply: ModelReply): ParsedReply {
    const { text } = stripThinking(reply.text);

    // Native channel first; one call per step
    const native = reply.toolCalls[0];
    if (native) {
      return { kind: 'toolCall', call: native, source: 'native', text };
    }

    if (isExplicitFinal(text)) {
      return { kind: 'final', text };
    }

    for (const extractor of this.extractors) {
      const call = extractor.extract(text);
      if (call) {
        return { kind: 'toolCall', call, source: extractor.name, text };
      }
    }

    if (isSubstantialFinal(text)) {
      return { kind: 'final', text };
    }

    return { kind: 'text', text };
  }
}
