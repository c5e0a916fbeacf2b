/**
 * Channel: how a confirmation request reaches a human
 *
 * The gatekeeper hands the channel a request and an AbortSignal that fires
 * when the confirmation window closes. Channels answer with a decision;
 * anything other than an explicit approval is a denial.
 */

import type { OperationKind, RiskTier } from './types.js';

export interface ConfirmationRequest {
  id: string;
  requestId: string;
  kind: OperationKind;
  tier: RiskTier;
  summary: string;
  userText: string;
  /** Canonical paths the operation will touch. */
  paths: string[];
  /** Policy rule that asked for confirmation. */
  rule: string;
  expiresAt: string;
}

export interface ConfirmationDecision {
  approved: boolean;
  reason?: string;
}

export interface ConfirmationChannel {
  readonly name: string;
  confirm(request: ConfirmationRequest, signal: AbortSignal): Promise<ConfirmationDecision>;
}

// ---------------------------------------------------------------------------
// StaticChannel: fixed answer (--yes, or a channel of "deny")
// ---------------------------------------------------------------------------

export class StaticChannel implements ConfirmationChannel {
  readonly name: string;

  constructor(private readonly approved: boolean) {
    this.name = approved ? 'auto-approve' : 'auto-deny';
  }

  async confirm(_request: ConfirmationRequest): Promise<ConfirmationDecision> {
    return this.approved
      ? { approved: true, reason: 'Pre-approved' }
      : { approved: false, reason: 'Confirmation channel denies all requests' };
  }
}

// ---------------------------------------------------------------------------
// WebhookChannel: HTTP POST to an external approver
// ---------------------------------------------------------------------------

export class WebhookChannel implements ConfirmationChannel {
  readonly name = 'webhook';
  private url: string;
  private secret?: string;

  constructor(url: string, secret?: string) {
    this.url = url;
    this.secret = secret;
  }

  async confirm(request: ConfirmationRequest, signal: AbortSignal): Promise<ConfirmationDecision> {
    if (!this.url) {
      return { approved: false, reason: 'Webhook URL not configured' };
    }

    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.secret ? { 'X-Navbuddy-Secret': this.secret } : {}),
        },
        body: JSON.stringify({ type: 'confirmation_request', request }),
        signal,
      });
      if (!res.ok) {
        return { approved: false, reason: `Webhook returned HTTP ${res.status}` };
      }
      const body: unknown = await res.json();
      return parseDecision(body);
    } catch (err) {
      return { approved: false, reason: `Webhook error: ${(err as Error).message}` };
    }
  }
}

function parseDecision(body: unknown): ConfirmationDecision {
  if (typeof body !== 'object' || body === null) {
    return { approved: false, reason: 'Webhook returned no decision' };
  }
  const approved = 'approved' in body && body.approved === true;
  const reason = 'reason' in body && typeof body.reason === 'string' ? body.reason : undefined;
  return reason === undefined ? { approved } : { approved, reason };
}

export function formatConfirmation(request: ConfirmationRequest): string[] {
  const lines = [
    `Action:   ${request.kind} (${request.tier.replace('_', ' ')})`,
    `Summary:  ${request.summary}`,
    `Rule:     ${request.rule}`,
  ];
  if (request.paths.length > 0) {
    lines.push('Paths:');
    const shown = request.paths.slice(0, 10);
    for (const p of shown) lines.push(`  ${p}`);
    if (request.paths.length > shown.length) {
      lines.push(`  ... and ${request.paths.length - shown.length} more`);
    }
  }
  return lines;
}
