import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PolicyParser, type Policy, type PolicyFile } from '../policy/parser.js';
import type { ConfirmationChannel, ConfirmationDecision, ConfirmationRequest } from '../core/channel.js';
import type { Oracle, OracleRequest } from '../oracle/types.js';

/** Real (symlink-free) temp directory. */
export function makeTmpDir(prefix = 'navbuddy-test-'): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content, 'utf-8');
  }
}

export function testPolicy(roots: string[], overrides: Partial<PolicyFile> = {}): Policy {
  return PolicyParser.build({ allowed_roots: roots, ...overrides });
}

export function plan(
  operations: Array<Record<string, unknown>>,
  extra: { summary?: string; confidence?: number; clarification?: string } = {},
): string {
  return JSON.stringify({
    summary: extra.summary ?? 'test plan',
    confidence: extra.confidence ?? 0.95,
    ...(extra.clarification !== undefined ? { clarification: extra.clarification } : {}),
    operations,
  });
}

/**
 * Oracle that plays back canned replies in order (the last one repeats).
 * An Error entry is thrown instead of returned; 'hang' waits for the signal.
 */
export class ScriptedOracle implements Oracle {
  readonly name = 'scripted';
  readonly calls: OracleRequest[] = [];
  private replies: Array<string | Error | 'hang'>;

  constructor(replies: Array<string | Error | 'hang'>) {
    this.replies = replies;
  }

  async generate(request: OracleRequest, signal: AbortSignal): Promise<string> {
    this.calls.push(request);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) throw new Error('ScriptedOracle has no replies');
    if (reply instanceof Error) throw reply;
    if (reply === 'hang') {
      return new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    return reply;
  }
}

/** Channel with a fixed behaviour that records every request it sees. */
export class ScriptedChannel implements ConfirmationChannel {
  readonly name = 'scripted';
  readonly requests: ConfirmationRequest[] = [];
  private behaviour: 'approve' | 'decline' | 'never';
  private onAsk?: (request: ConfirmationRequest) => void;

  constructor(behaviour: 'approve' | 'decline' | 'never', onAsk?: (request: ConfirmationRequest) => void) {
    this.behaviour = behaviour;
    this.onAsk = onAsk;
  }

  async confirm(request: ConfirmationRequest, signal: AbortSignal): Promise<ConfirmationDecision> {
    this.requests.push(request);
    this.onAsk?.(request);
    switch (this.behaviour) {
      case 'approve':
        return { approved: true };
      case 'decline':
        return { approved: false, reason: 'Not today' };
      case 'never':
        return new Promise((resolve) => {
          signal.addEventListener('abort', () => resolve({ approved: false, reason: 'gave up' }), { once: true });
        });
    }
  }
}
