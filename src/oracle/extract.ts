/**
 * Pull a JSON object out of a model reply.
 *
 * Models wrap JSON in prose or code fences and leave trailing commas.
 * Strategies, in order: fenced ```json block, the first balanced {...}
 * object (with a trailing-comma repair), then the whole reply.
 */

const FENCE_PATTERNS = [
  /```json\s*(\{[\s\S]*?\})\s*```/,
  /```\s*(\{[\s\S]*?\})\s*```/,
];

export function extractJson(reply: string): Record<string, unknown> | null {
  for (const pattern of FENCE_PATTERNS) {
    const match = pattern.exec(reply);
    if (match) {
      const parsed = tryParse(match[1]);
      if (parsed) return parsed;
    }
  }

  const balanced = firstBalancedObject(reply);
  if (balanced) {
    const parsed = tryParse(balanced) ?? tryParse(balanced.replace(/,(\s*[}\]])/g, '$1'));
    if (parsed) return parsed;
  }

  return tryParse(reply.trim());
}

function firstBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === '{') depth++;
    if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParse(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
