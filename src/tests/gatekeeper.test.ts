import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { ExecutionGatekeeper, type StateChange } from '../core/gatekeeper.js';
import { IntentTranslator } from '../core/translator.js';
import { FileAuditLog, type AuditLog } from '../audit/logger.js';
import { PolicyStore } from '../policy/store.js';
import type { ConfirmationChannel, ConfirmationRequest } from '../core/channel.js';
import type { ActionProposal } from '../core/types.js';
import { ScriptedChannel, ScriptedOracle, makeTmpDir, plan, testPolicy, writeFiles } from './helpers.js';

const base = { id: 'pr_test', summary: 'test', confidence: 0.9 };

describe('ExecutionGatekeeper', () => {
  let tmp: string;
  let home: string;
  let audit: FileAuditLog;
  let store: PolicyStore;

  function gatekeeper(channel: ConfirmationChannel, replies: string[] = [], confirmationTimeoutMs = 5000) {
    return new ExecutionGatekeeper({
      policyStore: store,
      translator: new IntentTranslator({ oracle: new ScriptedOracle(replies.length > 0 ? replies : ['{}']) }),
      channel,
      audit,
      confirmationTimeoutMs,
    });
  }

  beforeEach(() => {
    tmp = makeTmpDir();
    home = path.join(tmp, 'home');
    writeFiles(home, {
      'notes/old.txt': 'old notes',
      'notes/keep.txt': 'keep me',
      'report.pdf': '%PDF',
    });
    fs.mkdirSync(path.join(home, 'Archive'));
    audit = new FileAuditLog(path.join(tmp, 'state', 'audit.jsonl'));
    store = new PolicyStore(testPolicy([home], { excluded_patterns: ['*.tmp'] }));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('runs a read-only request without confirmation', async () => {
    const channel = new ScriptedChannel('decline');
    const gate = gatekeeper(channel, [plan([{ kind: 'read', path: 'notes/keep.txt' }], { summary: 'Read keep.txt' })]);

    const result = await gate.submit('show me keep.txt');

    assert.equal(result.status, 'success');
    assert.equal(result.kind, 'read');
    assert.equal(result.tier, 'read_only');
    assert.equal(result.summary, 'Read keep.txt');
    assert.deepEqual(result.output, { kind: 'read', content: 'keep me', bytes: 7, truncated: false });
    assert.equal(channel.requests.length, 0);
    assert.equal(audit.size, 1);
    assert.equal(audit.tail(1)[0].confirmed, false);
  });

  it('denies when confirmation times out and changes nothing', async () => {
    const channel = new ScriptedChannel('never');
    const gate = gatekeeper(channel, [plan([{ kind: 'delete', paths: ['notes/old.txt'] }], { summary: 'Delete old notes' })], 50);

    const result = await gate.submit('delete my old notes');

    assert.equal(result.status, 'denied');
    assert.equal(result.error?.code, 'TimeoutExpired');
    assert.equal(result.error?.rule, 'confirm: delete');
    assert.deepEqual(result.affected, []);
    assert.equal(fs.existsSync(path.join(home, 'notes', 'old.txt')), true);

    const [entry] = audit.tail(1);
    assert.equal(entry.confirmed, false);
    assert.equal(entry.result.status, 'denied');
    assert.equal(entry.userText, 'delete my old notes');
  });

  it('asks before mutating and respects a decline', async () => {
    const seen: boolean[] = [];
    const channel = new ScriptedChannel('decline', () => {
      seen.push(fs.existsSync(path.join(home, 'notes', 'old.txt')));
    });
    const gate = gatekeeper(channel);

    const proposal: ActionProposal = { ...base, kind: 'delete', paths: ['notes/old.txt'] };
    const result = await gate.process(proposal, 'delete old.txt');

    assert.deepEqual(seen, [true]);
    assert.equal(result.status, 'denied');
    assert.deepEqual(result.error, { code: 'ConfirmationDeclined', message: 'Not today', rule: 'confirm: delete' });
    assert.equal(fs.existsSync(path.join(home, 'notes', 'old.txt')), true);
  });

  it('executes after approval and walks every state', async () => {
    const states: StateChange['state'][] = [];
    const channel = new ScriptedChannel('approve');
    const gate = gatekeeper(channel, [plan([{ kind: 'move', sources: ['report.pdf'], destination: 'Archive' }])]);
    gate.onStateChange(change => states.push(change.state));

    const result = await gate.submit('move report.pdf to Archive');

    assert.equal(result.status, 'success');
    assert.equal(result.tier, 'modify');
    assert.deepEqual(result.affected, [path.join(home, 'report.pdf'), path.join(home, 'Archive', 'report.pdf')]);
    assert.deepEqual(states, ['received', 'validating', 'awaiting_confirmation', 'executing', 'recorded']);

    const request = channel.requests[0];
    assert.equal(request.kind, 'move');
    assert.equal(request.tier, 'modify');
    assert.equal(request.rule, 'confirm: move');
    assert.deepEqual(request.paths, [`${path.join(home, 'report.pdf')} -> ${path.join(home, 'Archive', 'report.pdf')}`]);
    assert.ok(request.id.startsWith('cf_'));

    assert.equal(audit.tail(1)[0].confirmed, true);
    assert.equal(audit.verifyChain().valid, true);
  });

  it('denies a path outside the roots before asking', async () => {
    const channel = new ScriptedChannel('approve');
    const gate = gatekeeper(channel);

    const result = await gate.process({ ...base, kind: 'delete', paths: [tmp] }, 'delete everything');

    assert.equal(result.status, 'denied');
    assert.equal(result.error?.code, 'OutsideAllowedRoot');
    assert.equal(result.error?.rule, 'allowed_roots');
    assert.equal(channel.requests.length, 0);
    assert.equal(audit.tail(1)[0].action, null);
  });

  it('does not audit a request the translator could not understand', async () => {
    const gate = gatekeeper(new ScriptedChannel('approve'), ['no idea, sorry']);

    const result = await gate.submit('frobnicate the thing');

    assert.equal(result.status, 'failed');
    assert.equal(result.kind, undefined);
    assert.equal(result.error?.code, 'UnparsableResponse');
    assert.ok(result.requestId.startsWith('rq_'));
    assert.equal(audit.size, 0);
  });

  it('reports a partial batch failure', async () => {
    const channel = new ScriptedChannel('approve', () => {
      // Disappears between confirmation and execution
      fs.rmSync(path.join(home, 'notes', 'keep.txt'));
    });
    const gate = gatekeeper(channel);

    const result = await gate.process({ ...base, kind: 'delete', paths: ['notes/old.txt', 'notes/keep.txt'] }, 'delete both');

    assert.equal(result.status, 'failed');
    assert.deepEqual(result.error, { code: 'PartialFailure', message: '1 of 2 items failed' });
    assert.deepEqual(result.affected, [path.join(home, 'notes', 'old.txt')]);
    assert.equal(result.items?.[1].error?.code, 'NotFound');
  });

  it('denies a conflicting concurrent request', async () => {
    let asked: (request: ConfirmationRequest) => void = () => {};
    const waiting = new Promise<ConfirmationRequest>(resolve => { asked = resolve; });
    const channel = new ScriptedChannel('never', request => asked(request));
    const gate = gatekeeper(channel);
    const controller = new AbortController();

    const first = gate.process({ ...base, kind: 'delete', paths: ['notes'] }, 'delete notes', { signal: controller.signal });
    await waiting;

    const second = await gate.process({ ...base, kind: 'read', path: 'notes/keep.txt' }, 'read keep');
    assert.equal(second.status, 'denied');
    assert.equal(second.error?.code, 'Conflict');

    controller.abort();
    const firstResult = await first;
    assert.equal(firstResult.status, 'denied');
    assert.equal(firstResult.error?.code, 'Cancelled');
    assert.equal(fs.existsSync(path.join(home, 'notes', 'keep.txt')), true);

    // The lease is gone once the first request is recorded
    const third = await gate.process({ ...base, kind: 'read', path: 'notes/keep.txt' }, 'read keep');
    assert.equal(third.status, 'success');
  });

  it('treats a failing channel as a decline', async () => {
    const channel: ConfirmationChannel = {
      name: 'broken',
      confirm: async () => {
        throw new Error('boom');
      },
    };
    const gate = gatekeeper(channel);

    const result = await gate.process({ ...base, kind: 'delete', paths: ['report.pdf'] }, 'delete report');

    assert.equal(result.status, 'denied');
    assert.equal(result.error?.code, 'ConfirmationDeclined');
    assert.equal(result.error?.message, 'Confirmation channel failed: boom');
    assert.equal(fs.existsSync(path.join(home, 'report.pdf')), true);
  });

  it('refuses to delete an allowed root', async () => {
    const gate = gatekeeper(new ScriptedChannel('approve'));
    const result = await gate.process({ ...base, kind: 'delete', paths: ['.'] }, 'delete this folder');
    assert.equal(result.status, 'denied');
    assert.equal(result.error?.code, 'ProtectedRoot');
    assert.equal(fs.existsSync(home), true);
  });

  it('denies deleting a directory that holds an excluded file', async () => {
    writeFiles(home, { 'project/README.md': 'readme', 'project/.env': 'TOKEN=test-secret' });
    store.swap(testPolicy([home], { excluded_patterns: ['.env', '.git'] }));
    const channel = new ScriptedChannel('approve');
    const gate = gatekeeper(channel);

    const direct = await gate.process({ ...base, kind: 'delete', paths: ['project/.env'] }, 'delete the env file');
    const whole = await gate.process({ ...base, kind: 'delete', paths: ['project'] }, 'delete the project');

    assert.equal(direct.status, 'denied');
    assert.equal(direct.error?.code, 'ExcludedByPattern');
    assert.equal(whole.status, 'denied');
    assert.equal(whole.error?.code, 'ExcludedByPattern');
    assert.equal(whole.error?.rule, 'excluded_patterns: ".env"');
    assert.equal(channel.requests.length, 0);
    assert.equal(fs.existsSync(path.join(home, 'project', '.env')), true);
    assert.equal(fs.existsSync(path.join(home, 'project', 'README.md')), true);
  });

  it('still returns the outcome when the audit log cannot be written', async () => {
    const failingAudit: AuditLog = {
      append: (record) => {
        Object.freeze(record.result);
        throw Object.assign(new Error('no space left on device'), { code: 'ENOSPC' });
      },
    };
    const gate = new ExecutionGatekeeper({
      policyStore: store,
      translator: new IntentTranslator({ oracle: new ScriptedOracle(['{}']) }),
      channel: new ScriptedChannel('approve'),
      audit: failingAudit,
    });
    const states: string[] = [];
    gate.onStateChange(change => states.push(change.state));

    const result = await gate.process({ ...base, kind: 'delete', paths: ['notes/old.txt'] }, 'delete old notes');

    assert.equal(result.status, 'success');
    assert.deepEqual(result.affected, [path.join(home, 'notes', 'old.txt')]);
    assert.deepEqual(result.auditError, {
      code: 'AuditUnavailable',
      message: 'Audit entry not written: no space left on device',
    });
    assert.equal(states[states.length - 1], 'recorded');
    assert.equal(fs.existsSync(path.join(home, 'notes', 'old.txt')), false);
  });

  it('validates against the policy current at request time', async () => {
    const gate = gatekeeper(new ScriptedChannel('approve'));
    store.swap(testPolicy([path.join(home, 'notes')]));

    const result = await gate.process({ ...base, kind: 'read', path: path.join(home, 'report.pdf') }, 'read report');
    assert.equal(result.status, 'denied');
    assert.equal(result.error?.code, 'OutsideAllowedRoot');
  });
});
