import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { withDeadline } from '../core/deadline.js';

const errors = {
  onTimeout: () => new Error('timed out'),
  onCancel: () => new Error('cancelled'),
};

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('task saw abort')), { once: true });
  });
}

describe('withDeadline', () => {
  it('returns the task result in time', async () => {
    assert.equal(await withDeadline(async () => 'done', { timeoutMs: 1000, ...errors }), 'done');
  });

  it('passes task errors through', async () => {
    await assert.rejects(
      withDeadline(async () => { throw new Error('boom'); }, { timeoutMs: 1000, ...errors }),
      /boom/,
    );
  });

  it('rejects with the timeout error and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    await assert.rejects(
      withDeadline((signal) => { taskSignal = signal; return never(signal); }, { timeoutMs: 10, ...errors }),
      /timed out/,
    );
    assert.equal(taskSignal?.aborted, true);
  });

  it('settles even when the task ignores its signal', async () => {
    await assert.rejects(
      withDeadline(() => new Promise<string>(() => {}), { timeoutMs: 10, ...errors }),
      /timed out/,
    );
  });

  it('rejects with the cancel error when the caller aborts', async () => {
    const controller = new AbortController();
    const pending = withDeadline(never, { timeoutMs: 1000, signal: controller.signal, ...errors });
    controller.abort();
    await assert.rejects(pending, /cancelled/);
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;
    await assert.rejects(
      withDeadline(async () => { started = true; return 1; }, { timeoutMs: 1000, signal: controller.signal, ...errors }),
      /cancelled/,
    );
    assert.equal(started, false);
  });
});
