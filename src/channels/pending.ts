/**
 * PendingConfirmations: confirmation requests settled from outside.
 *
 * confirm() parks the request until respond() is called for its id (the
 * HTTP gateway does this) or its signal fires. Settled and expired requests
 * are forgotten; responding to them reports false.
 */

import type { ConfirmationChannel, ConfirmationDecision, ConfirmationRequest } from '../core/channel.js';

interface PendingEntry {
  request: ConfirmationRequest;
  settle: (decision: ConfirmationDecision) => void;
}

export class PendingConfirmations implements ConfirmationChannel {
  readonly name = 'http';
  private pending = new Map<string, PendingEntry>();
  private listeners: Array<(request: ConfirmationRequest) => void> = [];

  confirm(request: ConfirmationRequest, signal: AbortSignal): Promise<ConfirmationDecision> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve({ approved: false, reason: 'Confirmation window closed' });
        return;
      }
      const onAbort = () => {
        this.pending.delete(request.id);
        resolve({ approved: false, reason: 'Confirmation window closed' });
      };

      this.pending.set(request.id, {
        request,
        settle: (decision) => {
          signal.removeEventListener('abort', onAbort);
          this.pending.delete(request.id);
          resolve(decision);
        },
      });
      signal.addEventListener('abort', onAbort, { once: true });

      console.log(`  [confirm] Waiting for decision on ${request.id} (${request.kind}, expires ${request.expiresAt})`);
      for (const listener of this.listeners) listener(request);
    });
  }

  /** Settle a pending request. Returns false when the id is unknown or already settled. */
  respond(id: string, decision: ConfirmationDecision): boolean {
    const entry = this.pending.get(id);
    if (!entry) return false;
    entry.settle(decision);
    return true;
  }

  list(): ConfirmationRequest[] {
    return [...this.pending.values()].map(e => e.request);
  }

  get(id: string): ConfirmationRequest | undefined {
    return this.pending.get(id)?.request;
  }

  /** Called whenever a new request starts waiting. */
  onRequest(listener: (request: ConfirmationRequest) => void): void {
    this.listeners.push(listener);
  }
}
