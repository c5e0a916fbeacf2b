import type { ContextSnapshot, ExecutionResult, RecentListing } from './types.js';
import { MAX_CONTEXT_LISTINGS, MAX_LISTING_ENTRIES } from '../oracle/prompt.js';

/**
 * Navigation state of one interactive session.
 *
 * The current directory follows successful list results; the last few
 * listings are kept so follow-up requests ("open the second one") have
 * something to refer to. Snapshots are copies and stay bounded.
 */
export class NavigationSession {
  private cwd: string;
  private listings: RecentListing[] = [];

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  get currentDirectory(): string {
    return this.cwd;
  }

  snapshot(): ContextSnapshot {
    return {
      cwd: this.cwd,
      recentListings: this.listings.map(l => ({ directory: l.directory, entries: [...l.entries] })),
    };
  }

  /** `directory` must already be resolved. */
  moveTo(directory: string): void {
    this.cwd = directory;
  }

  /** Fold a request's result into the session. */
  observe(result: ExecutionResult): void {
    if (result.status !== 'success' || result.output?.kind !== 'list') return;
    const { directory, entries } = result.output;
    this.cwd = directory;
    this.listings = this.listings.filter(l => l.directory !== directory);
    this.listings.push({
      directory,
      entries: entries.slice(0, MAX_LISTING_ENTRIES).map(e => (e.type === 'directory' ? `${e.name}/` : e.name)),
    });
    if (this.listings.length > MAX_CONTEXT_LISTINGS) {
      this.listings = this.listings.slice(-MAX_CONTEXT_LISTINGS);
    }
  }
}
