/**
 * Core Types: ActionProposal, ValidatedAction, ExecutionResult, AuditEntry
 *
 * An ActionProposal is what the oracle says the user wants.
 * A ValidatedAction is a proposal whose every path survived the resolver.
 * An ExecutionResult is what happened; an AuditEntry is the permanent record.
 */

export const OPERATION_KINDS = ['read', 'list', 'search', 'move', 'copy', 'delete', 'execute'] as const;

export type OperationKind = typeof OPERATION_KINDS[number];

export function isOperationKind(value: unknown): value is OperationKind {
  return OPERATION_KINDS.some(kind => kind === value);
}

/** read_only: read/list/search. modify: move/copy. destructive: delete. system: execute. */
export type RiskTier = 'read_only' | 'modify' | 'destructive' | 'system';

export function riskTier(kind: OperationKind): RiskTier {
  switch (kind) {
    case 'read':
    case 'list':
    case 'search':
      return 'read_only';
    case 'move':
    case 'copy':
      return 'modify';
    case 'delete':
      return 'destructive';
    case 'execute':
      return 'system';
  }
}

// ---------------------------------------------------------------------------
// Proposals
// ---------------------------------------------------------------------------

interface ProposalBase {
  readonly id: string;
  readonly summary: string;
  readonly confidence: number;
}

export interface ReadProposal extends ProposalBase {
  readonly kind: 'read';
  readonly path: string;
}

export interface ListProposal extends ProposalBase {
  readonly kind: 'list';
  readonly path: string;
}

export interface SearchProposal extends ProposalBase {
  readonly kind: 'search';
  readonly path: string;
  /** Text to look for inside files (case-insensitive). */
  readonly query?: string;
  /** Glob on file names. */
  readonly pattern?: string;
}

export interface MoveProposal extends ProposalBase {
  readonly kind: 'move';
  readonly sources: readonly string[];
  readonly destination: string;
}

export interface CopyProposal extends ProposalBase {
  readonly kind: 'copy';
  readonly sources: readonly string[];
  readonly destination: string;
}

export interface DeleteProposal extends ProposalBase {
  readonly kind: 'delete';
  readonly paths: readonly string[];
}

export interface ExecuteProposal extends ProposalBase {
  readonly kind: 'execute';
  readonly path: string;
  readonly args: readonly string[];
}

export type ActionProposal =
  | ReadProposal
  | ListProposal
  | SearchProposal
  | MoveProposal
  | CopyProposal
  | DeleteProposal
  | ExecuteProposal;

// ---------------------------------------------------------------------------
// Validated actions
// ---------------------------------------------------------------------------

export interface ResolvedPath {
  /** The string the proposal carried. */
  readonly raw: string;
  readonly canonical: string;
  /** Allowed root the path sits under (the deepest one when roots nest). */
  readonly root: string;
  readonly depth: number;
  readonly exists: boolean;
  readonly isDirectory: boolean;
}

export interface TransferItem {
  readonly source: ResolvedPath;
  /** Final location of this item (destination, or destination/<basename>). */
  readonly target: ResolvedPath;
}

export type ValidatedAction =
  | { readonly kind: 'read'; readonly proposalId: string; readonly path: ResolvedPath }
  | { readonly kind: 'list'; readonly proposalId: string; readonly path: ResolvedPath }
  | {
      readonly kind: 'search';
      readonly proposalId: string;
      readonly path: ResolvedPath;
      readonly query?: string;
      readonly pattern?: string;
    }
  | { readonly kind: 'move'; readonly proposalId: string; readonly items: readonly TransferItem[] }
  | { readonly kind: 'copy'; readonly proposalId: string; readonly items: readonly TransferItem[] }
  | { readonly kind: 'delete'; readonly proposalId: string; readonly paths: readonly ResolvedPath[] }
  | {
      readonly kind: 'execute';
      readonly proposalId: string;
      readonly path: ResolvedPath;
      readonly args: readonly string[];
    };

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type ExecutionStatus = 'success' | 'denied' | 'failed';

export interface ResultError {
  code: string;
  message: string;
  /** Policy rule that triggered a denial, when there is one. */
  rule?: string;
}

export interface ItemResult {
  path: string;
  target?: string;
  ok: boolean;
  error?: ResultError;
}

export interface DirectoryEntry {
  name: string;
  type: 'file' | 'directory' | 'symlink' | 'other';
  size: number;
}

export interface SearchMatch {
  path: string;
  /** First matching line, when searching by content. */
  line?: number;
  preview?: string;
}

export type OperationOutput =
  | { kind: 'read'; content: string; bytes: number; truncated: boolean }
  | { kind: 'list'; directory: string; entries: DirectoryEntry[]; hidden: number }
  | { kind: 'search'; matches: SearchMatch[]; scanned: number; truncated: boolean }
  | { kind: 'execute'; exitCode: number | null; stdout: string; stderr: string };

export interface ExecutionResult {
  requestId: string;
  status: ExecutionStatus;
  kind?: OperationKind;
  tier?: RiskTier;
  summary?: string;
  affected: string[];
  items?: ItemResult[];
  output?: OperationOutput;
  error?: ResultError;
  /** Set when the outcome stands but its audit entry could not be written. */
  auditError?: ResultError;
  timestamp: string;
}

export interface AuditEntry {
  id: string;
  timestamp: string;
  userText: string;
  proposal: ActionProposal;
  action: ValidatedAction | null;
  result: ExecutionResult;
  confirmed: boolean;
  previousHash: string | null;
  hash: string;
}

// ---------------------------------------------------------------------------
// Navigation context
// ---------------------------------------------------------------------------

export interface RecentListing {
  directory: string;
  entries: string[];
}

export interface ContextSnapshot {
  cwd: string;
  recentListings: RecentListing[];
}

export type RequestState =
  | 'received'
  | 'validating'
  | 'awaiting_confirmation'
  | 'executing'
  | 'recorded';
