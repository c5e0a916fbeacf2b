/**
 * Prompt construction for the intent translator.
 *
 * The model sees a closed list of operations and must answer with one JSON
 * object matching RESPONSE_SCHEMA. Context is bounded: the current
 * directory and a few recent listings, never file contents.
 */

import { OPERATION_KINDS, type ContextSnapshot } from '../core/types.js';

export const MAX_CONTEXT_LISTINGS = 3;
export const MAX_LISTING_ENTRIES = 40;

export const SYSTEM_PROMPT = `You are a file navigation assistant. You turn one user request into one file operation.

Available operations (field "kind"):
- read: show the contents of a file (fields: path)
- list: list a directory (fields: path)
- search: find files under a directory by name pattern and/or content (fields: path, pattern?, query?)
- move: move or rename files (fields: sources, destination)
- copy: copy files or directories (fields: sources, destination)
- delete: delete files or directories (fields: paths)
- execute: run a program or script with arguments (fields: path, args)

Rules:
- Paths may be absolute or relative to the current directory.
- Use only the operations above. Never invent one.
- Put every operation in "operations"; use several entries only when they share one kind.
- If the request is unclear or could mean different things, leave "operations" empty and ask in "clarification".
- Be conservative with "confidence" (0 to 1).

Respond with valid JSON only, no text before or after it.`;

export const RESPONSE_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    summary: { type: 'string' },
    confidence: { type: 'number' },
    clarification: { type: 'string' },
    operations: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          kind: { type: 'string', enum: [...OPERATION_KINDS] },
          path: { type: 'string' },
          paths: { type: 'array', items: { type: 'string' } },
          sources: { type: 'array', items: { type: 'string' } },
          destination: { type: 'string' },
          query: { type: 'string' },
          pattern: { type: 'string' },
          args: { type: 'array', items: { type: 'string' } },
        },
        required: ['kind'],
      },
    },
  },
  required: ['summary', 'confidence', 'operations'],
};

export const JSON_ONLY_NOTE =
  'IMPORTANT: Your previous reply was not valid JSON for the schema. Respond with one JSON object only.';

export function lowConfidenceNote(confidence: number): string {
  return `Your previous answer had confidence ${Math.round(confidence * 100)}%. ` +
    'Be more specific, or leave "operations" empty and ask for clarification.';
}

export function buildPrompt(userText: string, context: ContextSnapshot, notes: readonly string[] = []): string {
  const lines = [`Current directory: ${context.cwd}`];

  const listings = context.recentListings.slice(-MAX_CONTEXT_LISTINGS);
  for (const listing of listings) {
    const shown = listing.entries.slice(0, MAX_LISTING_ENTRIES);
    lines.push('', `Contents of ${listing.directory}:`);
    lines.push(shown.length > 0 ? shown.map(e => `  ${e}`).join('\n') : '  (empty)');
    if (listing.entries.length > shown.length) {
      lines.push(`  ... ${listing.entries.length - shown.length} more`);
    }
  }

  lines.push('', `User request: ${userText}`);
  for (const note of notes) {
    lines.push('', note);
  }
  return lines.join('\n');
}
