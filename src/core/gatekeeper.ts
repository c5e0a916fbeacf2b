/**
 * ExecutionGatekeeper: one request from user text to audit entry
 *
 *   received → validating → (awaiting_confirmation) → executing → recorded
 *
 * For each request:
 *   1. Translate the text into an ActionProposal (failures end here, unaudited)
 *   2. Resolve every path against one policy snapshot
 *   3. Lease the paths (shared for reads, exclusive for mutations)
 *   4. If policy says so: ask the channel, wait for an answer or the deadline
 *   5. Execute on canonical paths only
 *   6. Append the audit entry, release the lease, return the result
 *
 * Request-local errors never escape submit() or process(); they become a
 * denied or failed ExecutionResult.
 */

import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { ConfirmationError, NavigatorError, toResultError } from './errors.js';
import { withDeadline } from './deadline.js';
import { PathLockTable, type LockClaim, type PathLease } from './locks.js';
import { FileOperations, type OperationOutcome } from './operations.js';
import { checkSubtree, resolvePath } from './resolver.js';
import type { ConfirmationChannel, ConfirmationRequest } from './channel.js';
import type { IntentTranslator } from './translator.js';
import {
  riskTier,
  type ActionProposal,
  type ContextSnapshot,
  type ExecutionResult,
  type ExecutionStatus,
  type RequestState,
  type ResolvedPath,
  type TransferItem,
  type ValidatedAction,
} from './types.js';
import type { AuditLog } from '../audit/logger.js';
import type { Policy } from '../policy/parser.js';
import type { PolicyStore } from '../policy/store.js';

export const DEFAULT_CONFIRMATION_TIMEOUT_MS = 120_000;

export interface StateChange {
  requestId: string;
  state: RequestState;
  proposal?: ActionProposal;
}

export interface GatekeeperOptions {
  policyStore: PolicyStore;
  translator: IntentTranslator;
  channel: ConfirmationChannel;
  audit: AuditLog;
  locks?: PathLockTable;
  operations?: FileOperations;
  confirmationTimeoutMs?: number;
  onStateChange?: (change: StateChange) => void;
}

export interface SubmitOptions {
  context?: ContextSnapshot;
  signal?: AbortSignal;
}

export interface ProcessOptions {
  requestId?: string;
  /** Base for relative paths in the proposal. Defaults to the first allowed root. */
  cwd?: string;
  signal?: AbortSignal;
}

/** Codes that mean "not allowed" rather than "tried and failed". */
const DENIAL_CODES = new Set([
  'OutsideAllowedRoot',
  'ExcludedByPattern',
  'DepthExceeded',
  'UnreadablePath',
  'SymlinkEscape',
  'ProtectedRoot',
  'Conflict',
  'TimeoutExpired',
  'ConfirmationDeclined',
  'Cancelled',
]);

export class ExecutionGatekeeper {
  private policyStore: PolicyStore;
  private translator: IntentTranslator;
  private channel: ConfirmationChannel;
  private audit: AuditLog;
  private locks: PathLockTable;
  private operations: FileOperations;
  private confirmationTimeoutMs: number;
  private listeners: Array<(change: StateChange) => void> = [];

  constructor(options: GatekeeperOptions) {
    this.policyStore = options.policyStore;
    this.translator = options.translator;
    this.channel = options.channel;
    this.audit = options.audit;
    this.locks = options.locks ?? new PathLockTable();
    this.operations = options.operations ?? new FileOperations();
    this.confirmationTimeoutMs = options.confirmationTimeoutMs ?? DEFAULT_CONFIRMATION_TIMEOUT_MS;
    if (options.onStateChange) this.listeners.push(options.onStateChange);
  }

  /** Subscribe to state transitions of every request. */
  onStateChange(listener: (change: StateChange) => void): void {
    this.listeners.push(listener);
  }

  async submit(userText: string, options: SubmitOptions = {}): Promise<ExecutionResult> {
    const requestId = `rq_${uuidv4()}`;
    this.transition({ requestId, state: 'received' });

    const policy = this.policyStore.current();
    const context = options.context ?? { cwd: policy.roots[0], recentListings: [] };

    let proposal: ActionProposal;
    try {
      proposal = await this.translator.translate(userText, context, { signal: options.signal });
    } catch (err) {
      const error = toResultError(err);
      console.log(`  [gate] ${requestId} no proposal: ${error.code} (${error.message})`);
      return { requestId, status: 'failed', affected: [], error, timestamp: new Date().toISOString() };
    }

    return this.process(proposal, userText, { requestId, cwd: context.cwd, signal: options.signal });
  }

  /** Run an existing proposal through validation, confirmation and execution. */
  async process(proposal: ActionProposal, userText: string, options: ProcessOptions = {}): Promise<ExecutionResult> {
    const requestId = options.requestId ?? `rq_${uuidv4()}`;
    const tier = riskTier(proposal.kind);
    const policy = this.policyStore.current();

    this.transition({ requestId, state: 'validating', proposal });
    let action: ValidatedAction;
    try {
      action = await validateProposal(proposal, policy, options.cwd ?? policy.roots[0]);
    } catch (err) {
      return this.record(requestId, proposal, userText, null, false, { error: toResultError(err) });
    }

    let lease: PathLease;
    try {
      lease = this.locks.tryAcquire(requestId, lockClaims(action));
    } catch (err) {
      return this.record(requestId, proposal, userText, action, false, { error: toResultError(err) });
    }

    try {
      let confirmed = false;
      if (policy.confirm.has(proposal.kind)) {
        this.transition({ requestId, state: 'awaiting_confirmation', proposal });
        try {
          await this.confirm(requestId, proposal, userText, touchedPaths(action), options.signal);
        } catch (err) {
          return this.record(requestId, proposal, userText, action, false, { error: toResultError(err) });
        }
        confirmed = true;
      }

      if (options.signal?.aborted) {
        const cancelled = new ConfirmationError('Cancelled', 'Request cancelled before execution');
        return this.record(requestId, proposal, userText, action, confirmed, { error: cancelled.toResultError() });
      }

      this.transition({ requestId, state: 'executing', proposal });
      console.log(`  [gate] ${requestId} executing ${proposal.kind} (${tier})`);
      let outcome: OperationOutcome;
      try {
        outcome = await this.operations.run(action, policy);
      } catch (err) {
        outcome = { affected: [], error: toResultError(err) };
      }
      return this.record(requestId, proposal, userText, action, confirmed, outcome);
    } finally {
      lease.release();
    }
  }

  private async confirm(
    requestId: string,
    proposal: ActionProposal,
    userText: string,
    paths: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    const rule = `confirm: ${proposal.kind}`;
    const request: ConfirmationRequest = {
      id: `cf_${uuidv4()}`,
      requestId,
      kind: proposal.kind,
      tier: riskTier(proposal.kind),
      summary: proposal.summary,
      userText,
      paths,
      rule,
      expiresAt: new Date(Date.now() + this.confirmationTimeoutMs).toISOString(),
    };
    console.log(`  [gate] ${requestId} ${proposal.kind} -> awaiting confirmation via ${this.channel.name} (${rule})`);

    const decision = await withDeadline(
      async (channelSignal) => {
        try {
          return await this.channel.confirm(request, channelSignal);
        } catch (err) {
          return { approved: false, reason: `Confirmation channel failed: ${(err as Error).message}` };
        }
      },
      {
        timeoutMs: this.confirmationTimeoutMs,
        signal,
        onTimeout: () => new ConfirmationError(
          'TimeoutExpired',
          `No confirmation within ${Math.round(this.confirmationTimeoutMs / 1000)}s; nothing was changed`,
          rule,
        ),
        onCancel: () => new ConfirmationError('Cancelled', 'Request cancelled while awaiting confirmation', rule),
      },
    );

    if (!decision.approved) {
      throw new ConfirmationError('ConfirmationDeclined', decision.reason ?? 'Declined', rule);
    }
    console.log(`  [gate] ${requestId} approved${decision.reason ? ` (${decision.reason})` : ''}`);
  }

  private record(
    requestId: string,
    proposal: ActionProposal,
    userText: string,
    action: ValidatedAction | null,
    confirmed: boolean,
    outcome: Partial<OperationOutcome>,
  ): ExecutionResult {
    const status: ExecutionStatus = outcome.error === undefined
      ? 'success'
      : DENIAL_CODES.has(outcome.error.code) ? 'denied' : 'failed';

    let result: ExecutionResult = {
      requestId,
      status,
      kind: proposal.kind,
      tier: riskTier(proposal.kind),
      summary: proposal.summary,
      affected: outcome.affected ?? [],
      timestamp: new Date().toISOString(),
    };
    if (outcome.items) result.items = outcome.items;
    if (outcome.output) result.output = outcome.output;
    if (outcome.error) result.error = outcome.error;

    let auditId: string;
    try {
      auditId = this.audit.append({ userText, proposal, action, result, confirmed }).id;
    } catch (err) {
      const message = `Audit entry not written: ${(err as Error).message}`;
      console.error(`  [gate] ${requestId} ${message}`);
      // append may already have frozen the result
      result = { ...result, auditError: { code: 'AuditUnavailable', message } };
      auditId = 'none';
    }
    this.transition({ requestId, state: 'recorded', proposal });

    const detail = outcome.error
      ? `${outcome.error.code}${outcome.error.rule ? ` [${outcome.error.rule}]` : ''}: ${outcome.error.message}`
      : `${result.affected.length} path(s)`;
    console.log(`  [gate] ${requestId} ${proposal.kind} -> ${status} (${detail}) audit ${auditId}`);
    return result;
  }

  private transition(change: StateChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}

/**
 * Resolve every path of the proposal against one policy snapshot.
 * Directories that a mutation acts on recursively are checked entry by
 * entry. The first failure rejects the whole proposal.
 */
export async function validateProposal(proposal: ActionProposal, policy: Policy, cwd: string): Promise<ValidatedAction> {
  const source = (p: string) => resolvePath(p, policy, { cwd, mustExist: true });

  let action: ValidatedAction;
  switch (proposal.kind) {
    case 'read':
    case 'list':
      action = { kind: proposal.kind, proposalId: proposal.id, path: await source(proposal.path) };
      break;

    case 'search':
      action = {
        kind: 'search',
        proposalId: proposal.id,
        path: await source(proposal.path),
        ...(proposal.query !== undefined ? { query: proposal.query } : {}),
        ...(proposal.pattern !== undefined ? { pattern: proposal.pattern } : {}),
      };
      break;

    case 'move':
    case 'copy': {
      const sources: ResolvedPath[] = [];
      for (const raw of proposal.sources) {
        const resolved = await source(raw);
        if (proposal.kind === 'move') protectRoot(resolved, 'move');
        sources.push(resolved);
      }
      const destination = await resolvePath(proposal.destination, policy, { cwd, mustExist: false });
      const intoDirectory = destination.exists && destination.isDirectory;
      if (sources.length > 1 && !intoDirectory) {
        throw new NavigatorError(
          'NotADirectory',
          `${destination.canonical} must be an existing directory to ${proposal.kind} ${sources.length} items into it`,
        );
      }
      const items: TransferItem[] = [];
      for (const s of sources) {
        const target = intoDirectory
          ? await resolvePath(path.join(destination.canonical, path.basename(s.canonical)), policy, { mustExist: false })
          : destination;
        await checkSubtree(s, policy, target);
        items.push(Object.freeze({ source: s, target }));
      }
      action = { kind: proposal.kind, proposalId: proposal.id, items: Object.freeze(items) };
      break;
    }

    case 'delete': {
      const paths: ResolvedPath[] = [];
      for (const raw of proposal.paths) {
        const resolved = await source(raw);
        protectRoot(resolved, 'delete');
        await checkSubtree(resolved, policy);
        paths.push(resolved);
      }
      action = { kind: 'delete', proposalId: proposal.id, paths: Object.freeze(paths) };
      break;
    }

    case 'execute': {
      const file = await source(proposal.path);
      if (file.isDirectory) {
        throw new NavigatorError('IsADirectory', `${file.canonical} is a directory, not a program`);
      }
      action = { kind: 'execute', proposalId: proposal.id, path: file, args: Object.freeze([...proposal.args]) };
      break;
    }
  }

  return Object.freeze(action);
}

function protectRoot(resolved: ResolvedPath, verb: string): void {
  if (resolved.canonical === resolved.root) {
    throw new NavigatorError('ProtectedRoot', `Refusing to ${verb} the allowed root ${resolved.root}`, 'allowed_roots');
  }
}

/** Shared claims for what is only read, exclusive for what changes. */
export function lockClaims(action: ValidatedAction): LockClaim[] {
  switch (action.kind) {
    case 'read':
    case 'list':
    case 'search':
      return [{ path: action.path.canonical, mode: 'shared' }];
    case 'move':
      return action.items.flatMap(item => [
        { path: item.source.canonical, mode: 'exclusive' as const },
        { path: item.target.canonical, mode: 'exclusive' as const },
      ]);
    case 'copy':
      return action.items.flatMap(item => [
        { path: item.source.canonical, mode: 'shared' as const },
        { path: item.target.canonical, mode: 'exclusive' as const },
      ]);
    case 'delete':
      return action.paths.map(p => ({ path: p.canonical, mode: 'exclusive' as const }));
    case 'execute':
      return [{ path: action.path.canonical, mode: 'exclusive' }];
  }
}

function touchedPaths(action: ValidatedAction): string[] {
  switch (action.kind) {
    case 'move':
    case 'copy':
      return action.items.map(item => `${item.source.canonical} -> ${item.target.canonical}`);
    case 'delete':
      return action.paths.map(p => p.canonical);
    case 'read':
    case 'list':
    case 'search':
    case 'execute':
      return [action.path.canonical];
  }
}
