import { describe, expect, it } from 'vitest';
import {
  extractConfidence,
  keywordExtractor,
  looksLikeToolCallJson,
  ResponseParser,
  toToolCall,
} from './response-parser';
import type { ModelReply } from './types';

const TOOLS = ['validate_signal_alignment', 'check_market_conditions', 'detect_contradictions', 'get_structured_brief'];

function text(content: string): ModelReply {
  return { text: content, toolCalls: [], finishReason: 'stop' };
}

describe('ResponseParser', () => {
  const parser = new ResponseParser(TOOLS);

  it('prefers native tool calls', () => {
    const parsed = parser.parse({
      text: 'Final answer: enter',
      toolCalls: [{ name: 'get_structured_brief', arguments: {} }],
      finishReason: 'tool_calls',
    });
    expect(parsed).toEqual({
      kind: 'toolCall',
      call: { name: 'get_structured_brief', arguments: {} },
      source: 'native',
      text: 'Final answer: enter',
    });
  });

  it('classifies explicit final answers', () => {
    expect(parser.parse(text('Final answer: enter the 24000 CE. Confidence: 0.8'))).toEqual({
      kind: 'final',
      text: 'Final answer: enter the 24000 CE. Confidence: 0.8',
    });
  });

  it('does not treat a final marker as final while the model still needs data', () => {
    expect(parser.parse(text('Final answer pending, I need more data')).kind).toBe('text');
  });

  it('strips thinking before classifying', () => {
    expect(parser.parse(text('<think>should I call tools?</think>Final answer: wait. Confidence: 0.55'))).toEqual({
      kind: 'final',
      text: 'Final answer: wait. Confidence: 0.55',
    });
  });

  it('reads a fenced JSON call', () => {
    const parsed = parser.parse(text('```json\n{"name": "check_market_conditions", "arguments": {"volatility": "low"}}\n```'));
    expect(parsed).toMatchObject({
      kind: 'toolCall',
      source: 'structured',
      call: { name: 'check_market_conditions', arguments: { volatility: 'low' } },
    });
  });

  it('unwraps function and tool_calls envelopes', () => {
    expect(parser.parse(text('{"function": {"name": "get_structured_brief", "arguments": "{}"}}'))).toMatchObject({
      call: { name: 'get_structured_brief', arguments: {} },
      source: 'structured',
    });
    expect(parser.parse(text('{"tool_calls": [{"name": "detect_contradictions", "parameters": {"signals": {}}}]}'))).toMatchObject({
      call: { name: 'detect_contradictions', arguments: { signals: {} } },
    });
  });

  it('finds a call embedded in prose', () => {
    const parsed = parser.parse(text(
      'Let me check. {"name": "detect_contradictions", "arguments": {"signals": {"tf_15m_bias": "bullish"}}} then decide',
    ));
    expect(parsed).toMatchObject({
      kind: 'toolCall',
      source: 'braceScan',
      call: { name: 'detect_contradictions', arguments: { signals: { tf_15m_bias: 'bullish' } } },
    });
  });

  it('salvages name and arguments from truncated JSON', () => {
    const parsed = parser.parse(text('{"name": "validate_signal_alignment", "arguments": {"tf_15m": {"bias": "bullish"}}, oops'));
    expect(parsed).toMatchObject({
      kind: 'toolCall',
      source: 'braceScan',
      call: { name: 'validate_signal_alignment', arguments: { tf_15m: { bias: 'bullish' } } },
    });
  });

  it('guesses a call from prose only for registered tools', () => {
    expect(parser.parse(text('I will call get_structured_brief now'))).toMatchObject({
      kind: 'toolCall',
      source: 'keyword',
      call: { name: 'get_structured_brief', arguments: {} },
    });
    expect(parser.parse(text('I will call get_weather now')).kind).toBe('text');
  });

  it('accepts a long concluding reply as final', () => {
    const reply = 'Based on the 15m trend and the 5m pullback, the 24000 CE looks like the better strike for a scalp entry near 24020 with a tight stop.';
    expect(parser.parse(text(reply))).toEqual({ kind: 'final', text: reply });
  });

  it('falls back to plain text', () => {
    expect(parser.parse(text('Hmm.'))).toEqual({ kind: 'text', text: 'Hmm.' });
  });
});

describe('keywordExtractor', () => {
  it('ignores long replies', () => {
    const extractor = keywordExtractor(new Set(['get_structured_brief']));
    expect(extractor.extract(`call get_structured_brief ${'x'.repeat(500)}`)).toBeNull();
  });
});

describe('toToolCall', () => {
  it('rejects shapes without a name', () => {
    expect(toToolCall({ arguments: {} })).toBeNull();
    expect(toToolCall('get_structured_brief')).toBeNull();
  });

  it('treats unparseable string arguments as empty', () => {
    expect(toToolCall({ name: 'x', arguments: '{oops' })).toEqual({ name: 'x', arguments: {} });
  });
});

describe('extractConfidence', () => {
  it('scales percentages and whole numbers to 0-1', () => {
    expect(extractConfidence('Confidence: 0.4')).toBe(0.4);
    expect(extractConfidence('Confidence: 85%')).toBe(0.85);
    expect(extractConfidence('confidence level is 72')).toBe(0.72);
    expect(extractConfidence('Confidence score = 150')).toBe(1);
  });

  it('reads ratings out of ten or a hundred', () => {
    expect(extractConfidence('Confidence: 8/10')).toBe(0.8);
    expect(extractConfidence('confidence is 7 out of 10, the setup is clean')).toBe(0.7);
    expect(extractConfidence('Confidence: 85/100')).toBe(0.85);
    expect(extractConfidence('Confidence: 12/10')).toBe(1);
  });

  it('returns null when no figure is given', () => {
    expect(extractConfidence('I am fairly confident')).toBeNull();
  });
});

describe('looksLikeToolCallJson', () => {
  it('detects call-shaped text', () => {
    expect(looksLikeToolCallJson('{"name": "get_structured_brief"}')).toBe(true);
    expect(looksLikeToolCallJson('see {"name": "x"} here')).toBe(true);
    expect(looksLikeToolCallJson('Trend is bullish')).toBe(false);
  });
});
