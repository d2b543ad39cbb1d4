import logger from './logger.js';

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Appends the closers a truncated completion left off. */
function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  return s.replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for LLM outputs that may include markdown fences,
 * surrounding prose, trailing commas or a truncated tail.
 * Returns the parsed value untyped; callers validate it with zod.
 */
export function repairJSON(text: string): unknown {
  if (!text) return null;

  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  const direct = tryParse(cleaned);
  if (direct.ok) return direct.value;

  // Cut the outermost object/array out of surrounding prose
  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  const useBrace = firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket);
  const start = useBrace ? firstBrace : firstBracket;
  if (start >= 0) {
    const lastClose = cleaned.lastIndexOf(useBrace ? '}' : ']');
    cleaned = lastClose > start ? cleaned.slice(start, lastClose + 1) : cleaned.slice(start);
    const sliced = tryParse(cleaned);
    if (sliced.ok) return sliced.value;
  }

  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const trailingFixed = tryParse(noTrailing);
  if (trailingFixed.ok) return trailingFixed.value;

  if (noTrailing.length > 50_000) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return null;
  }

  // Unquoted keys: { key: "value" } → { "key": "value" }
  const quotedKeys = noTrailing.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const keysFixed = tryParse(quotedKeys);
  if (keysFixed.ok) return keysFixed.value;

  const closed = closePartial(quotedKeys);
  if (closed !== quotedKeys) {
    const closedFixed = tryParse(closed);
    if (closedFixed.ok) return closedFixed.value;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
