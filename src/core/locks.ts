import { ConflictError } from './errors.js';
import { isWithin } from './resolver.js';

export type LockMode = 'shared' | 'exclusive';

export interface LockClaim {
  path: string;
  mode: LockMode;
}

export interface PathLease {
  readonly owner: string;
  readonly claims: readonly LockClaim[];
  release(): void;
}

interface HeldLease {
  owner: string;
  claims: LockClaim[];
}

/**
 * Advisory locks keyed by canonical path.
 *
 * Shared claims coexist; an exclusive claim conflicts with any other claim on
 * the same path, an ancestor, or a descendant. Acquisition never waits: a
 * conflicting request fails with ConflictError and the caller may resubmit.
 */
export class PathLockTable {
  private leases = new Map<number, HeldLease>();
  private nextId = 1;

  tryAcquire(owner: string, claims: LockClaim[]): PathLease {
    const merged = mergeClaims(claims);

    for (const held of this.leases.values()) {
      for (const mine of merged) {
        for (const theirs of held.claims) {
          if (mine.mode === 'shared' && theirs.mode === 'shared') continue;
          if (isWithin(mine.path, theirs.path) || isWithin(theirs.path, mine.path)) {
            throw new ConflictError(mine.path, held.owner);
          }
        }
      }
    }

    const id = this.nextId++;
    this.leases.set(id, { owner, claims: merged });
    let released = false;
    return {
      owner,
      claims: merged,
      release: () => {
        if (released) return;
        released = true;
        this.leases.delete(id);
      },
    };
  }

  get size(): number {
    return this.leases.size;
  }
}

/** One claim per path; exclusive wins when a request claims a path twice. */
function mergeClaims(claims: LockClaim[]): LockClaim[] {
  const byPath = new Map<string, LockMode>();
  for (const claim of claims) {
    if (byPath.get(claim.path) !== 'exclusive') {
      byPath.set(claim.path, claim.mode);
    }
  }
  return [...byPath.entries()].map(([p, mode]) => ({ path: p, mode }));
}
