/**
 * Intent Translator: user text in, one ActionProposal out.
 *
 * Asks the oracle for a JSON plan, extracts it, and checks every field
 * against the closed operation set. Unparsable and low-confidence replies
 * are retried with a corrective note, up to maxAttempts. A clarification
 * question or mixed operation kinds end the loop at once. The translator
 * never touches the filesystem.
 */

import { v4 as uuidv4 } from 'uuid';
import { NavigatorError, OracleError, ProposalError } from './errors.js';
import { withDeadline } from './deadline.js';
import { isOperationKind, type ActionProposal, type ContextSnapshot, type OperationKind } from './types.js';
import { compileGlob } from '../policy/glob.js';
import { extractJson, isRecord } from '../oracle/extract.js';
import {
  JSON_ONLY_NOTE,
  RESPONSE_SCHEMA,
  SYSTEM_PROMPT,
  buildPrompt,
  lowConfidenceNote,
} from '../oracle/prompt.js';
import type { Oracle } from '../oracle/types.js';

export const DEFAULT_ORACLE_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

export interface TranslatorOptions {
  oracle: Oracle;
  timeoutMs?: number;
  maxAttempts?: number;
  confidenceThreshold?: number;
}

export interface TranslateOptions {
  signal?: AbortSignal;
}

export class IntentTranslator {
  private oracle: Oracle;
  private timeoutMs: number;
  private maxAttempts: number;
  private threshold: number;

  constructor(options: TranslatorOptions) {
    this.oracle = options.oracle;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  }

  /**
   * Throws OracleError when the model cannot be reached in time and
   * ProposalError when no acceptable proposal came back.
   */
  async translate(userText: string, context: ContextSnapshot, options: TranslateOptions = {}): Promise<ActionProposal> {
    if (userText.trim() === '') {
      throw new ProposalError('AmbiguousIntent', 'Nothing to do: the request is empty');
    }

    const notes: string[] = [];
    let lastError: ProposalError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const prompt = buildPrompt(userText, context, notes);
      const reply = await withDeadline(
        signal => this.oracle.generate({ system: SYSTEM_PROMPT, prompt, schema: RESPONSE_SCHEMA }, signal),
        {
          timeoutMs: this.timeoutMs,
          signal: options.signal,
          onTimeout: () => new OracleError(`${this.oracle.name} did not reply within ${Math.round(this.timeoutMs / 1000)}s`),
          onCancel: () => new NavigatorError('Cancelled', 'Request cancelled while waiting for the model'),
        },
      );

      const parsed = extractJson(reply);
      if (parsed === null) {
        lastError = new ProposalError('UnparsableResponse', 'The model did not reply with a JSON object', preview(reply));
        console.log(`  [translator] attempt ${attempt}/${this.maxAttempts}: unparsable reply`);
        addNote(notes, JSON_ONLY_NOTE);
        continue;
      }

      let proposal: ActionProposal;
      try {
        proposal = interpretPlan(parsed);
      } catch (err) {
        if (err instanceof ProposalError && err.reason === 'UnparsableResponse') {
          lastError = new ProposalError(err.reason, err.message, preview(reply));
          console.log(`  [translator] attempt ${attempt}/${this.maxAttempts}: ${err.message}`);
          addNote(notes, `${JSON_ONLY_NOTE} Problem: ${err.message}`);
          continue;
        }
        throw err;
      }

      if (proposal.confidence < this.threshold) {
        lastError = new ProposalError(
          'AmbiguousIntent',
          `Not confident enough to act (${pct(proposal.confidence)} < ${pct(this.threshold)}): ${proposal.summary}`,
          preview(reply),
        );
        console.log(`  [translator] attempt ${attempt}/${this.maxAttempts}: confidence ${pct(proposal.confidence)} below ${pct(this.threshold)}`);
        addNote(notes, lowConfidenceNote(proposal.confidence));
        continue;
      }

      console.log(`  [translator] ${proposal.kind}: ${proposal.summary} (${pct(proposal.confidence)})`);
      return proposal;
    }

    throw lastError ?? new ProposalError('UnparsableResponse', 'The model gave no usable reply');
  }
}

/**
 * Turn one parsed reply into a frozen proposal.
 * Throws ProposalError: UnparsableResponse for a malformed plan,
 * AmbiguousIntent for a clarification request or a plan that mixes kinds.
 */
export function interpretPlan(plan: Record<string, unknown>): ActionProposal {
  if (typeof plan.clarification === 'string' && plan.clarification.trim() !== '') {
    throw new ProposalError('AmbiguousIntent', plan.clarification.trim());
  }

  const confidence = plan.confidence;
  if (typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw unparsable('"confidence" must be a number between 0 and 1');
  }

  if (!Array.isArray(plan.operations)) {
    throw unparsable('"operations" must be a list');
  }
  if (plan.operations.length === 0) {
    throw new ProposalError('AmbiguousIntent', 'The model proposed no operation');
  }

  const operations: Array<Record<string, unknown> & { kind: OperationKind }> = [];
  for (const [i, op] of plan.operations.entries()) {
    if (!isRecord(op)) {
      throw unparsable(`operations[${i}] must be an object`);
    }
    const kind = op.kind;
    if (!isOperationKind(kind)) {
      throw unparsable(`operations[${i}]: unknown kind "${String(kind)}"`);
    }
    operations.push({ ...op, kind });
  }

  const kinds = [...new Set(operations.map(op => op.kind))];
  if (kinds.length > 1) {
    throw new ProposalError('AmbiguousIntent', `The request mixes several operations (${kinds.join(', ')}); ask for one at a time`);
  }

  const kind = kinds[0];
  const base = {
    id: `pr_${uuidv4()}`,
    summary: typeof plan.summary === 'string' && plan.summary.trim() !== '' ? plan.summary.trim() : `${kind} request`,
    confidence,
  };

  switch (kind) {
    case 'read':
    case 'list': {
      const op = single(operations, kind);
      return Object.freeze({ ...base, kind, path: requireString(op, 'path', kind) });
    }

    case 'search': {
      const op = single(operations, kind);
      const query = optionalString(op, 'query');
      const pattern = optionalString(op, 'pattern');
      if (query === undefined && pattern === undefined) {
        throw unparsable('search needs a "query" or a "pattern"');
      }
      if (pattern !== undefined) {
        try {
          compileGlob(pattern);
        } catch (err) {
          throw unparsable((err as Error).message);
        }
      }
      return Object.freeze({
        ...base,
        kind,
        path: optionalString(op, 'path') ?? '.',
        ...(query !== undefined ? { query } : {}),
        ...(pattern !== undefined ? { pattern } : {}),
      });
    }

    case 'move':
    case 'copy': {
      const destinations = new Set(operations.map(op => requireString(op, 'destination', kind)));
      if (destinations.size > 1) {
        throw new ProposalError('AmbiguousIntent', `The ${kind} names several destinations (${[...destinations].join(', ')})`);
      }
      const sources = operations.flatMap(op => pathList(op, 'sources', 'source', kind));
      return Object.freeze({
        ...base,
        kind,
        sources: Object.freeze(sources),
        destination: [...destinations][0],
      });
    }

    case 'delete': {
      const paths = operations.flatMap(op => pathList(op, 'paths', 'path', kind));
      return Object.freeze({ ...base, kind, paths: Object.freeze(paths) });
    }

    case 'execute': {
      const op = single(operations, kind);
      const args = op.args === undefined ? [] : op.args;
      if (!Array.isArray(args) || !args.every((a): a is string => typeof a === 'string')) {
        throw unparsable('execute "args" must be a list of strings');
      }
      return Object.freeze({ ...base, kind, path: requireString(op, 'path', kind), args: Object.freeze([...args]) });
    }
  }
}

function single(operations: Array<Record<string, unknown>>, kind: OperationKind): Record<string, unknown> {
  if (operations.length > 1) {
    throw new ProposalError('AmbiguousIntent', `The model proposed ${operations.length} separate ${kind} operations; ask for one at a time`);
  }
  return operations[0];
}

function requireString(op: Record<string, unknown>, field: string, kind: OperationKind): string {
  const value = op[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw unparsable(`${kind} is missing "${field}"`);
  }
  return value.trim();
}

function optionalString(op: Record<string, unknown>, field: string): string | undefined {
  const value = op[field];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/** A list field, or its singular spelling (some models write "source" for one file). */
function pathList(op: Record<string, unknown>, field: string, singular: string, kind: OperationKind): string[] {
  const value = op[field];
  if (Array.isArray(value)) {
    const paths = value.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map(v => v.trim());
    if (paths.length === 0 || paths.length !== value.length) {
      throw unparsable(`${kind} "${field}" must be a non-empty list of paths`);
    }
    return paths;
  }
  const one = optionalString(op, singular);
  if (one === undefined) {
    throw unparsable(`${kind} is missing "${field}"`);
  }
  return [one];
}

function unparsable(message: string): ProposalError {
  return new ProposalError('UnparsableResponse', message);
}

function addNote(notes: string[], note: string): void {
  if (!notes.includes(note)) notes.push(note);
}

function preview(reply: string): string {
  const flat = reply.replace(/\s+/g, ' ').trim();
  return flat.length > 300 ? `${flat.slice(0, 300)}...` : flat;
}

function pct(value: number): string {
  return `${Math.round(value * 100)}%`;
}
