// server/lib/agent/prompt.ts
import type { LoopState } from './loop-state';
import type { ChatMessage, ToolSchema } from './types';

function toolLines(tools: ToolSchema[]): string {
  if (tools.length === 0) return '- (none)';
  return tools
    .map(tool => {
      const params = Object.entries(tool.function.parameters.properties)
        .map(([name, spec]) => `${name}: ${spec.description ?? spec.type}`)
        .join(', ');
      return `- ${tool.function.name}: ${tool.function.description}${params ? ` (params: ${params})` : ''}`;
    })
    .join('\n');
}

export function buildSystemPrompt(tools: ToolSchema[], state: LoopState): string {
  const { maxSteps } = state.settings;
  const modeLine = state.mode === 'alert'
    ? 'Execution tools are DISABLED - analysis only.'
    : 'Execution tools are ENABLED - use them only when explicitly authorized.';

  return `You are a technical analysis assistant for Indian index options (NIFTY, BANKNIFTY, SENSEX).

You receive a structured brief: per-timeframe facts (15m trend, 5m setup, 1m trigger),
up to two scored option candidates and market-condition flags. You never see raw prices.

Available tools:
${toolLines(tools)}

WORKFLOW - OBSERVE, ACT, DECIDE:
1. OBSERVE: read the brief. Every hard gate has already passed.
2. ACT (only if needed): call ONE tool per response using the tool_calls channel, then wait for its result.
   Never call the same tool twice with the same arguments; repeated calls return the cached result.
3. DECIDE: when you have enough information, stop calling tools and answer.

You have a soft limit of ${maxSteps} steps. If you truly need more, say "need more" and explain why.

FINAL ANSWER FORMAT:
- Start with "Final answer:".
- State the trade stance (enter, wait or avoid), the strike you prefer and why.
- End with "Confidence: X" where X is between 0.0 and 1.0.

Current mode: ${state.mode}. ${modeLine}`;
}

export function buildUserPrompt(state: LoopState): string {
  const parts: string[] = [`Your goal: ${state.goal}`, ''];

  if (Object.keys(state.context).length > 0) {
    parts.push('Initial Context:');
    parts.push(JSON.stringify(state.context, null, 2));
    parts.push('');
  }

  if (state.memory.length > 0) {
    parts.push('Recent Tool Results:');
    for (const item of state.memory.slice(-5)) {
      parts.push(`- ${item.tool}: ${item.result.success ? 'Success' : `Error: ${item.result.error ?? 'unknown'}`}`);
    }
    parts.push('');
  }

  parts.push(`Step: ${state.stepCount + 1}/${state.settings.maxSteps}`);
  parts.push('');
  parts.push('What would you like to do next? You can call a tool or provide a final answer.');
  return parts.join('\n');
}

/**
 * System prompt, user goal and the trimmed history window
 */
export function buildMessages(state: LoopState, tools: ToolSchema[]): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(tools, state) },
    { role: 'user', content: buildUserPrompt(state) },
    ...state.recentHistory(),
  ];
}
