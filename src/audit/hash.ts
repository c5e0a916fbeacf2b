import crypto from 'node:crypto';

export function sha256(data: string): string {
  return `sha256:${crypto.createHash('sha256').update(data, 'utf8').digest('hex')}`;
}

/**
 * Canonical JSON: sorted keys at every level, no whitespace.
 */
export function canonicalJSON(obj: unknown): string {
  return JSON.stringify(sortKeys(obj));
}

function sortKeys(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (Array.isArray(obj)) return obj.map(sortKeys);
  if (typeof obj === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(value);
    }
    return sorted;
  }
  return obj;
}
