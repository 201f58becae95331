/**
 * Pure JSON / string-processing helpers for LLM output.
 */

/**
 * Extract JSON content from an LLM response that may be wrapped in markdown code blocks.
 * Returns the trimmed content inside the first code block, or the original content if none found.
 */
export function extractJSONFromCodeBlock(content: string): string {
  const codeBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (codeBlockMatch) return codeBlockMatch[1].trim();

  // Opening fence with no closing fence (truncated answer)
  const openFence = content.match(/```(?:json)?\s*([\s\S]*)$/);
  return (openFence ? openFence[1] : content).trim();
}

/**
 * Close brackets and strings left open by a truncated JSON document.
 * Trailing commas and dangling keys are dropped first.
 */
export function repairTruncatedJSON(json: string): string {
  const closers: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of json) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') closers.push('}');
    else if (ch === '[') closers.push(']');
    else if (ch === '}' || ch === ']') closers.pop();
  }

  let repaired = json.trimEnd();
  if (inString) repaired += '"';
  // `"key":` or `"key": ` with no value, or a trailing comma
  repaired = repaired.replace(/,\s*"[^"]*"\s*:\s*$/, '').replace(/[,:]\s*$/, '');
  return repaired + closers.reverse().join('');
}

/**
 * Parse JSON, returning null instead of throwing.
 */
export function tryParseJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Recover a JSON object from free-form LLM output.
 *
 * Tries, in order: the fenced or raw content, the outermost `{...}` span,
 * and the content with truncated brackets closed. Returns null when none
 * of them yields an object.
 */
export function recoverJSONObject(content: string): Record<string, unknown> | null {
  const body = extractJSONFromCodeBlock(content);
  const candidates = [body];

  const objectMatch = content.match(/\{[\s\S]*\}/);
  if (objectMatch) candidates.push(objectMatch[0]);

  const start = body.indexOf('{');
  if (start >= 0) candidates.push(repairTruncatedJSON(body.slice(start)));

  for (const candidate of candidates) {
    const parsed = tryParseJSON(candidate);
    if (isPlainObject(parsed)) return parsed;
  }
  return null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
