import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { GlobSyntaxError, compileGlob, globMatch } from '../policy/glob.js';

describe('compileGlob', () => {
  it('matches * within one segment', () => {
    const m = compileGlob('*.tmp');
    assert.equal(m.test('notes.tmp'), true);
    assert.equal(m.test('notes.txt'), false);
    assert.equal(m.test('a/notes.tmp'), false);
    assert.equal(m.anchored, false);
  });

  it('matches ** across segments and **/ as zero or more directories', () => {
    assert.equal(globMatch('a/b/c.log', '**/*.log'), true);
    assert.equal(globMatch('c.log', '**/*.log'), true);
    assert.equal(globMatch('a/b/c.log', 'a/**'), true);
  });

  it('handles ? and character classes', () => {
    assert.equal(globMatch('file1.txt', 'file?.txt'), true);
    assert.equal(globMatch('file10.txt', 'file?.txt'), false);
    assert.equal(globMatch('b.md', '[abc].md'), true);
    assert.equal(globMatch('d.md', '[abc].md'), false);
    assert.equal(globMatch('d.md', '[!abc].md'), true);
    assert.equal(globMatch('5.md', '[0-9].md'), true);
  });

  it('escapes regex metacharacters', () => {
    assert.equal(globMatch('a+b(1).txt', 'a+b(1).txt'), true);
    assert.equal(globMatch('aab1txt', 'a+b(1).txt'), false);
  });

  it('marks patterns containing / as anchored', () => {
    assert.equal(compileGlob('docs/*.md').anchored, true);
  });

  it('rejects empty patterns and broken classes', () => {
    assert.throws(() => compileGlob(''), GlobSyntaxError);
    assert.throws(() => compileGlob('[abc'), /unterminated character class/);
    assert.throws(() => compileGlob('[!]x'), /unterminated character class|empty character class/);
  });
});
