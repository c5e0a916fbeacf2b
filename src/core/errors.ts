/**
 * Error taxonomy
 *
 * Every error a request can hit carries a stable `code` so it can be turned
 * into an ExecutionResult without string matching. Only ConfigurationError
 * is fatal; everything else is local to one request.
 */

import type { ResultError } from './types.js';

export class NavigatorError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    /** Policy rule behind a denial, when there is one. */
    public readonly rule?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'NavigatorError';
  }

  toResultError(): ResultError {
    return this.rule === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, rule: this.rule };
  }
}

export class ConfigurationError extends NavigatorError {
  constructor(public readonly problems: string[], public readonly source?: string) {
    super(
      'ConfigurationError',
      `Invalid configuration${source ? ` in ${source}` : ''}:\n` +
      problems.map(p => `  - ${p}`).join('\n'),
    );
    this.name = 'ConfigurationError';
  }
}

export type PathResolutionReason =
  | 'OutsideAllowedRoot'
  | 'ExcludedByPattern'
  | 'DepthExceeded'
  | 'UnreadablePath'
  | 'SymlinkEscape';

export class PathResolutionError extends NavigatorError {
  constructor(
    public readonly reason: PathResolutionReason,
    public readonly path: string,
    message: string,
    rule?: string,
  ) {
    super(reason, message, rule);
    this.name = 'PathResolutionError';
  }
}

export class OracleError extends NavigatorError {
  constructor(message: string, cause?: unknown) {
    super('OracleUnavailable', message, undefined, { cause });
    this.name = 'OracleError';
  }
}

export type ProposalErrorReason = 'UnparsableResponse' | 'AmbiguousIntent';

export class ProposalError extends NavigatorError {
  constructor(
    public readonly reason: ProposalErrorReason,
    message: string,
    /** Raw oracle reply, truncated, for diagnostics. */
    public readonly preview?: string,
  ) {
    super(reason, message);
    this.name = 'ProposalError';
  }
}

export type ConfirmationErrorReason = 'TimeoutExpired' | 'ConfirmationDeclined' | 'Cancelled';

export class ConfirmationError extends NavigatorError {
  constructor(public readonly reason: ConfirmationErrorReason, message: string, rule?: string) {
    super(reason, message, rule);
    this.name = 'ConfirmationError';
  }
}

export type ExecutionFailure =
  | 'PermissionDenied'
  | 'NotFound'
  | 'DiskFull'
  | 'AlreadyExists'
  | 'NotADirectory'
  | 'IsADirectory'
  | 'PartialFailure'
  | 'IoError';

export class ExecutionError extends NavigatorError {
  constructor(
    public readonly failure: ExecutionFailure,
    public readonly path: string,
    message: string,
    cause?: unknown,
  ) {
    super(failure, message, undefined, { cause });
    this.name = 'ExecutionError';
  }

  /** Map a Node errno error from an fs call to an ExecutionError. */
  static fromFs(err: unknown, filePath: string): ExecutionError {
    if (err instanceof ExecutionError) return err;
    const errno = errnoOf(err);
    switch (errno) {
      case 'EACCES':
      case 'EPERM':
        return new ExecutionError('PermissionDenied', filePath, `Permission denied: ${filePath}`, err);
      case 'ENOENT':
        return new ExecutionError('NotFound', filePath, `Not found: ${filePath}`, err);
      case 'ENOSPC':
      case 'EDQUOT':
        return new ExecutionError('DiskFull', filePath, `No space left on device while writing ${filePath}`, err);
      case 'EEXIST':
      case 'ENOTEMPTY':
      case 'ERR_FS_CP_EEXIST':
        return new ExecutionError('AlreadyExists', filePath, `Already exists: ${filePath}`, err);
      case 'ENOTDIR':
        return new ExecutionError('NotADirectory', filePath, `Not a directory: ${filePath}`, err);
      case 'EISDIR':
      case 'ERR_FS_EISDIR':
        return new ExecutionError('IsADirectory', filePath, `Is a directory: ${filePath}`, err);
      default:
        return new ExecutionError('IoError', filePath, err instanceof Error ? err.message : String(err), err);
    }
  }
}

export class ConflictError extends NavigatorError {
  constructor(public readonly path: string, public readonly heldBy: string) {
    super('Conflict', `Another request (${heldBy}) is operating on ${path}; resubmit once it has finished`);
    this.name = 'ConflictError';
  }
}

export function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Anything thrown inside a request, as a result error. */
export function toResultError(err: unknown): ResultError {
  if (err instanceof NavigatorError) return err.toResultError();
  return { code: 'InternalError', message: err instanceof Error ? err.message : String(err) };
}
