import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PendingConfirmations } from '../channels/pending.js';
import type { ConfirmationRequest } from '../core/channel.js';

function request(id: string): ConfirmationRequest {
  return {
    id,
    requestId: `rq_${id}`,
    kind: 'move',
    tier: 'modify',
    summary: 'Move report',
    userText: 'move the report',
    paths: ['/data/report.pdf -> /data/Archive/report.pdf'],
    rule: 'confirm: move',
    expiresAt: '2026-01-01T00:02:00.000Z',
  };
}

describe('PendingConfirmations', () => {
  it('parks a request until it is answered', async () => {
    const pending = new PendingConfirmations();
    const seen: string[] = [];
    pending.onRequest(r => seen.push(r.id));

    const decision = pending.confirm(request('cf_1'), new AbortController().signal);
    assert.deepEqual(seen, ['cf_1']);
    assert.deepEqual(pending.list().map(r => r.id), ['cf_1']);
    assert.equal(pending.get('cf_1')?.summary, 'Move report');

    assert.equal(pending.respond('cf_1', { approved: true, reason: 'looks fine' }), true);
    assert.deepEqual(await decision, { approved: true, reason: 'looks fine' });
    assert.deepEqual(pending.list(), []);
  });

  it('reports unknown and already settled ids', async () => {
    const pending = new PendingConfirmations();
    assert.equal(pending.respond('cf_missing', { approved: true }), false);

    const decision = pending.confirm(request('cf_2'), new AbortController().signal);
    pending.respond('cf_2', { approved: false });
    assert.equal(pending.respond('cf_2', { approved: true }), false);
    assert.deepEqual(await decision, { approved: false });
  });

  it('forgets a request when its window closes', async () => {
    const pending = new PendingConfirmations();
    const controller = new AbortController();
    const decision = pending.confirm(request('cf_3'), controller.signal);

    controller.abort();

    assert.deepEqual(await decision, { approved: false, reason: 'Confirmation window closed' });
    assert.equal(pending.get('cf_3'), undefined);
    assert.equal(pending.respond('cf_3', { approved: true }), false);
  });

  it('declines at once for an already closed window', async () => {
    const pending = new PendingConfirmations();
    const controller = new AbortController();
    controller.abort();
    assert.deepEqual(await pending.confirm(request('cf_4'), controller.signal), {
      approved: false,
      reason: 'Confirmation window closed',
    });
    assert.deepEqual(pending.list(), []);
  });
});
