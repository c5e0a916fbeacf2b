import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PathLockTable } from '../core/locks.js';
import { ConflictError } from '../core/errors.js';

describe('PathLockTable', () => {
  it('lets shared claims coexist', () => {
    const table = new PathLockTable();
    const a = table.tryAcquire('rq_a', [{ path: '/data/docs', mode: 'shared' }]);
    const b = table.tryAcquire('rq_b', [{ path: '/data/docs/file.txt', mode: 'shared' }]);
    assert.equal(table.size, 2);
    a.release();
    b.release();
    assert.equal(table.size, 0);
  });

  it('rejects an exclusive claim overlapping a held claim', () => {
    const table = new PathLockTable();
    table.tryAcquire('rq_a', [{ path: '/data/docs', mode: 'shared' }]);
    assert.throws(
      () => table.tryAcquire('rq_b', [{ path: '/data/docs/file.txt', mode: 'exclusive' }]),
      (err: unknown) => err instanceof ConflictError && err.heldBy === 'rq_a' && err.code === 'Conflict',
    );
  });

  it('rejects a shared claim under a held exclusive ancestor', () => {
    const table = new PathLockTable();
    table.tryAcquire('rq_a', [{ path: '/data/docs', mode: 'exclusive' }]);
    assert.throws(() => table.tryAcquire('rq_b', [{ path: '/data/docs/a/b', mode: 'shared' }]), ConflictError);
  });

  it('does not confuse siblings sharing a prefix', () => {
    const table = new PathLockTable();
    table.tryAcquire('rq_a', [{ path: '/data/docs', mode: 'exclusive' }]);
    const lease = table.tryAcquire('rq_b', [{ path: '/data/docs2', mode: 'exclusive' }]);
    assert.equal(lease.owner, 'rq_b');
  });

  it('frees claims on release and tolerates a double release', () => {
    const table = new PathLockTable();
    const lease = table.tryAcquire('rq_a', [{ path: '/data/x', mode: 'exclusive' }]);
    lease.release();
    lease.release();
    const again = table.tryAcquire('rq_b', [{ path: '/data/x', mode: 'exclusive' }]);
    assert.equal(table.size, 1);
    again.release();
  });

  it('merges duplicate paths, exclusive winning', () => {
    const table = new PathLockTable();
    const lease = table.tryAcquire('rq_a', [
      { path: '/data/x', mode: 'shared' },
      { path: '/data/x', mode: 'exclusive' },
      { path: '/data/y', mode: 'shared' },
    ]);
    assert.deepEqual(lease.claims, [
      { path: '/data/x', mode: 'exclusive' },
      { path: '/data/y', mode: 'shared' },
    ]);
  });

  it('acquires nothing when any claim conflicts', () => {
    const table = new PathLockTable();
    table.tryAcquire('rq_a', [{ path: '/data/busy', mode: 'exclusive' }]);
    assert.throws(() => table.tryAcquire('rq_b', [
      { path: '/data/free', mode: 'exclusive' },
      { path: '/data/busy', mode: 'shared' },
    ]), ConflictError);
    assert.equal(table.size, 1);
    table.tryAcquire('rq_c', [{ path: '/data/free', mode: 'exclusive' }]);
  });
});
