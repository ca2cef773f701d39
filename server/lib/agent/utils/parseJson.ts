export interface ExtractedJSON {
  json: unknown;
  thinking: string;
  error?: string;
}

/**
 * Strip <think>...</think> reasoning blocks, returning the remaining text and the thinking
 */
export function stripThinking(content: string): { text: string; thinking: string } {
  const thinkMatch = content.match(/<think>([\s\S]*?)<\/think>/);
  const thinking = thinkMatch ? thinkMatch[1].trim() : '';
  const text = content.replace(/<think>[\s\S]*?<\/think>/g, '').trim();
  return { text, thinking };
}

/**
 * Index of the brace closing the object that opens at `startIdx`, or -1.
 * Braces inside JSON strings are ignored.
 */
export function findClosingBrace(text: string, startIdx: number): number {
  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = startIdx; i < text.length; i++) {
    const char = text[i];

    // Handle escape sequences inside strings
    if (escapeNext) {
      escapeNext = false;
      continue;
    }

    if (char === '\\' && inString) {
      escapeNext = true;
      continue;
    }

    // Toggle string mode on quotes
    if (char === '"') {
      inString = !inString;
      continue;
    }

    // Only count braces outside strings
    if (!inString) {
      if (char === '{') depth++;
      else if (char === '}') depth--;

      if (depth === 0) {
        return i;
      }
    }
  }

  return -1;
}

/**
 * Extract the first JSON object from a model reply, handling:
 * - <think>...</think> tags
 * - Markdown code blocks (```json)
 * - Trailing text after JSON
 *
 * `anchor` narrows the search to the object starting at the first match of that pattern.
 */
export function extractJSON(content: string, anchor?: RegExp): ExtractedJSON {
  const { text, thinking } = stripThinking(content);

  // Strip markdown code fences
  const cleaned = text.replace(/```(?:json)?\s*/g, '').replace(/```/g, '').trim();

  let startIdx: number;
  if (anchor) {
    const match = anchor.exec(cleaned);
    startIdx = match ? match.index : -1;
  } else {
    startIdx = cleaned.indexOf('{');
  }
  if (startIdx === -1) {
    return { json: null, thinking, error: 'No JSON object found' };
  }

  const endIdx = findClosingBrace(cleaned, startIdx);
  if (endIdx === -1) {
    return { json: null, thinking, error: 'Incomplete JSON (unmatched braces)' };
  }

  try {
    const json: unknown = JSON.parse(cleaned.substring(startIdx, endIdx + 1));
    return { json, thinking };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { json: null, thinking, error: `JSON.parse failed: ${msg}` };
  }
}
