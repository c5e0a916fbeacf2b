import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { PolicyParser } from '../policy/parser.js';
import { PolicyStore } from '../policy/store.js';
import { getDefaultPolicy } from '../policy/defaults.js';
import { ConfigurationError } from '../core/errors.js';
import { makeTmpDir } from './helpers.js';

describe('PolicyParser', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = makeTmpDir();
    fs.mkdirSync(path.join(tmp, 'docs'));
    fs.mkdirSync(path.join(tmp, 'projects'));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('parses a valid policy and canonicalizes roots', () => {
    const policy = PolicyParser.parse(`
allowed_roots:
  - ${tmp}/docs
  - ${tmp}/projects/../docs
  - ${tmp}/projects
excluded_patterns: ["*.tmp", ".git"]
max_depth: 3
confirm: [delete]
`);
    assert.deepEqual(policy.roots, [path.join(tmp, 'docs'), path.join(tmp, 'projects')]);
    assert.deepEqual(policy.excluded.map(m => m.pattern), ['*.tmp', '.git']);
    assert.equal(policy.maxDepth, 3);
    assert.deepEqual([...policy.confirm], ['delete']);
    assert.equal(policy.followSymlinks, false);
  });

  it('applies defaults for optional fields', () => {
    const policy = PolicyParser.build({ allowed_roots: [tmp] });
    assert.equal(policy.maxDepth, 8);
    assert.deepEqual([...policy.confirm], ['move', 'copy', 'delete', 'execute']);
    assert.equal(policy.excluded.length, 0);
  });

  it('resolves relative roots against the policy file directory', () => {
    const file = path.join(tmp, 'policy.yml');
    fs.writeFileSync(file, 'allowed_roots: [docs]\n');
    const policy = PolicyParser.parseFile(file);
    assert.deepEqual(policy.roots, [path.join(tmp, 'docs')]);
    assert.equal(policy.source, file);
  });

  it('collects every problem at once', () => {
    const errors = PolicyParser.validate({
      allowed_roots: [path.join(tmp, 'missing')],
      excluded_patterns: ['[oops'],
      max_depth: -1,
      confirm: ['explode'],
      colour: 'blue',
    });
    assert.equal(errors.length, 5);
    assert.equal(errors[0], 'Unknown field "colour"');
    assert.equal(errors[1], `allowed_roots[0]: ${path.join(tmp, 'missing')} does not exist`);
    assert.match(errors[2], /^excluded_patterns\[0\]: Invalid pattern "\[oops"/);
    assert.equal(errors[3], 'Invalid max_depth: "-1". Must be a non-negative integer');
    assert.match(errors[4], /^Invalid confirm kind "explode"/);
  });

  it('rejects a root that is a file', () => {
    const file = path.join(tmp, 'plain.txt');
    fs.writeFileSync(file, 'x');
    assert.deepEqual(PolicyParser.validate({ allowed_roots: [file] }), [
      `allowed_roots[0]: ${file} is not a directory`,
    ]);
  });

  it('rejects an empty root list', () => {
    assert.deepEqual(PolicyParser.validate({ allowed_roots: [] }), [
      '"allowed_roots" must be a non-empty list of directories',
    ]);
  });

  it('throws ConfigurationError with problems for bad YAML', () => {
    assert.throws(
      () => PolicyParser.parse('allowed_roots: [unclosed'),
      (err: unknown) => err instanceof ConfigurationError && err.problems[0].startsWith('YAML syntax error'),
    );
  });

  it('describes a snapshot as a plain policy file', () => {
    const policy = PolicyParser.build({ allowed_roots: [tmp], excluded_patterns: ['.env'], confirm: ['execute', 'move'] });
    assert.deepEqual(PolicyParser.describe(policy), {
      allowed_roots: [tmp],
      excluded_patterns: ['.env'],
      max_depth: 8,
      confirm: ['move', 'execute'],
      follow_symlinks: false,
    });
  });
});

describe('PolicyStore', () => {
  let tmp: string;
  let file: string;

  beforeEach(() => {
    tmp = makeTmpDir();
    fs.mkdirSync(path.join(tmp, 'a'));
    fs.mkdirSync(path.join(tmp, 'b'));
    file = path.join(tmp, 'policy.yml');
    fs.writeFileSync(file, 'allowed_roots: [a]\n');
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('swaps in a reloaded policy and bumps the version', () => {
    const store = PolicyStore.fromFile(file);
    const before = store.current();
    assert.equal(store.version, 1);

    fs.writeFileSync(file, 'allowed_roots: [b]\nmax_depth: 2\n');
    const next = store.reload();

    assert.equal(store.version, 2);
    assert.equal(store.current(), next);
    assert.deepEqual(next.roots, [path.join(tmp, 'b')]);
    // Snapshots already taken are unaffected
    assert.deepEqual(before.roots, [path.join(tmp, 'a')]);
  });

  it('keeps the old snapshot when a reload is invalid', () => {
    const store = PolicyStore.fromFile(file);
    const before = store.current();

    fs.writeFileSync(file, 'allowed_roots: [nowhere]\n');
    assert.throws(() => store.reload(), ConfigurationError);

    assert.equal(store.current(), before);
    assert.equal(store.version, 1);
  });

  it('refuses to reload a policy that has no source file', () => {
    const store = new PolicyStore(PolicyParser.build({ allowed_roots: [tmp] }));
    assert.throws(() => store.reload(), /not loaded from a file/);
  });
});

describe('getDefaultPolicy', () => {
  it('produces a policy that validates', () => {
    const tmp = makeTmpDir();
    try {
      const file = getDefaultPolicy([tmp]);
      assert.deepEqual(PolicyParser.validate(file), []);
      assert.ok(file.excluded_patterns?.includes('.ssh'));
    } finally {
      fs.rmSync(tmp, { recursive: true, force: true });
    }
  });
});
