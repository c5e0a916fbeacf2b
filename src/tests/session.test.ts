import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NavigationSession } from '../core/session.js';
import type { DirectoryEntry, ExecutionResult } from '../core/types.js';

function listed(directory: string, entries: DirectoryEntry[]): ExecutionResult {
  return {
    requestId: 'rq_1',
    status: 'success',
    kind: 'list',
    affected: [directory],
    output: { kind: 'list', directory, entries, hidden: 0 },
    timestamp: '2026-01-01T00:00:00.000Z',
  };
}

describe('NavigationSession', () => {
  it('follows successful listings', () => {
    const session = new NavigationSession('/home/user');
    session.observe(listed('/home/user/Documents', [
      { name: 'Taxes', type: 'directory', size: 0 },
      { name: 'cv.pdf', type: 'file', size: 1200 },
    ]));

    assert.equal(session.currentDirectory, '/home/user/Documents');
    assert.deepEqual(session.snapshot(), {
      cwd: '/home/user/Documents',
      recentListings: [{ directory: '/home/user/Documents', entries: ['Taxes/', 'cv.pdf'] }],
    });
  });

  it('ignores failures and other kinds', () => {
    const session = new NavigationSession('/home/user');
    session.observe({ ...listed('/elsewhere', []), status: 'denied' });
    session.observe({
      requestId: 'rq_2',
      status: 'success',
      kind: 'read',
      affected: ['/home/user/a.txt'],
      output: { kind: 'read', content: 'a', bytes: 1, truncated: false },
      timestamp: '2026-01-01T00:00:00.000Z',
    });
    assert.deepEqual(session.snapshot(), { cwd: '/home/user', recentListings: [] });
  });

  it('keeps the last three listings, most recent last', () => {
    const session = new NavigationSession('/');
    for (const dir of ['/a', '/b', '/c', '/a', '/d']) {
      session.observe(listed(dir, []));
    }
    assert.deepEqual(session.snapshot().recentListings.map(l => l.directory), ['/c', '/a', '/d']);
  });

  it('caps entries per listing', () => {
    const session = new NavigationSession('/');
    const entries: DirectoryEntry[] = Array.from({ length: 50 }, (_, i) => ({ name: `f${i}`, type: 'file', size: 0 }));
    session.observe(listed('/big', entries));
    assert.equal(session.snapshot().recentListings[0].entries.length, 40);
  });

  it('hands out copies', () => {
    const session = new NavigationSession('/');
    session.observe(listed('/a', [{ name: 'x', type: 'file', size: 0 }]));
    session.snapshot().recentListings[0].entries.push('injected');
    assert.deepEqual(session.snapshot().recentListings[0].entries, ['x']);
    session.moveTo('/b');
    assert.equal(session.currentDirectory, '/b');
  });
});
