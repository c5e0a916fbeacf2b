/**
 * PolicyStore: holds the current Policy snapshot.
 *
 * Readers take a snapshot with current() and keep it for the whole request.
 * A reload builds a complete new Policy first and only then swaps it in,
 * so nobody ever sees a half-valid policy. A failed reload keeps the old one.
 */

import type { Policy } from './parser.js';
import { PolicyParser } from './parser.js';

export class PolicyStore {
  private snapshot: Policy;
  private generation = 1;

  constructor(initial: Policy) {
    this.snapshot = initial;
  }

  static fromFile(filePath: string): PolicyStore {
    return new PolicyStore(PolicyParser.parseFile(filePath));
  }

  current(): Policy {
    return this.snapshot;
  }

  get version(): number {
    return this.generation;
  }

  swap(next: Policy): Policy {
    const previous = this.snapshot;
    this.snapshot = next;
    this.generation += 1;
    console.log(`  [policy] Swapped in policy v${this.generation} (${next.roots.length} root(s), max_depth ${next.maxDepth})`);
    return previous;
  }

  /**
   * Re-read the file the current policy came from (or `filePath`).
   * Throws ConfigurationError and leaves the current snapshot untouched on failure.
   */
  reload(filePath?: string): Policy {
    const source = filePath ?? this.snapshot.source;
    if (!source) {
      throw new Error('Policy was not loaded from a file; pass a path to reload');
    }
    const next = PolicyParser.parseFile(source);
    this.swap(next);
    return next;
  }
}
