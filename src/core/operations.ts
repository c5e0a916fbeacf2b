/**
 * File operations: the only code that touches the filesystem for a request.
 *
 * Works exclusively on canonical paths from a ValidatedAction. Nothing here
 * re-resolves user input. Errors are classified with ExecutionError.fromFs
 * and never retried. Move and copy never overwrite an existing target.
 */

import { execFile } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { ExecutionError, errnoOf, toResultError } from './errors.js';
import { excludedBy, isWithin } from './resolver.js';
import { compileGlob, type GlobMatcher } from '../policy/glob.js';
import type { Policy } from '../policy/parser.js';
import type {
  DirectoryEntry,
  ItemResult,
  OperationOutput,
  ResolvedPath,
  ResultError,
  SearchMatch,
  TransferItem,
  ValidatedAction,
} from './types.js';

export interface OperationLimits {
  /** Bytes returned by read. */
  maxReadBytes: number;
  maxSearchResults: number;
  maxSearchFiles: number;
  /** Files larger than this are matched by name only. */
  maxSearchFileBytes: number;
  executeTimeoutMs: number;
  maxOutputBytes: number;
}

export const DEFAULT_LIMITS: OperationLimits = {
  maxReadBytes: 256 * 1024,
  maxSearchResults: 100,
  maxSearchFiles: 5000,
  maxSearchFileBytes: 1024 * 1024,
  executeTimeoutMs: 30_000,
  maxOutputBytes: 1024 * 1024,
};

export interface OperationOutcome {
  /** Canonical paths actually read, created, moved or removed. */
  affected: string[];
  items?: ItemResult[];
  output?: OperationOutput;
  /** Set when at least one batch item failed. */
  error?: ResultError;
}

export class FileOperations {
  private limits: OperationLimits;

  constructor(limits: Partial<OperationLimits> = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  /**
   * Run one validated action. Single-path operations throw ExecutionError;
   * batches report per item and set `error` when any item failed.
   */
  async run(action: ValidatedAction, policy: Policy): Promise<OperationOutcome> {
    switch (action.kind) {
      case 'read':
        return this.read(action.path);
      case 'list':
        return this.list(action.path, policy);
      case 'search':
        return this.search(action.path, policy, action.query, action.pattern);
      case 'move':
        return this.batch(action.items.map(item => ({
          path: item.source.canonical,
          target: item.target.canonical,
          run: () => this.move(item),
        })));
      case 'copy':
        return this.batch(action.items.map(item => ({
          path: item.source.canonical,
          target: item.target.canonical,
          run: () => this.copy(item),
        })));
      case 'delete':
        return this.batch(action.paths.map(p => ({
          path: p.canonical,
          run: () => this.remove(p),
        })));
      case 'execute':
        return this.execute(action.path, action.args);
    }
  }

  // -------------------------------------------------------------------------
  // Read-only
  // -------------------------------------------------------------------------

  private async read(file: ResolvedPath): Promise<OperationOutcome> {
    if (file.isDirectory) {
      throw new ExecutionError('IsADirectory', file.canonical, `${file.canonical} is a directory; list it instead`);
    }
    try {
      const handle = await fs.promises.open(file.canonical, 'r');
      try {
        const { size } = await handle.stat();
        const length = Math.min(size, this.limits.maxReadBytes);
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, 0);
        return {
          affected: [file.canonical],
          output: {
            kind: 'read',
            content: buffer.subarray(0, bytesRead).toString('utf-8'),
            bytes: size,
            truncated: size > bytesRead,
          },
        };
      } finally {
        await handle.close();
      }
    } catch (err) {
      throw ExecutionError.fromFs(err, file.canonical);
    }
  }

  private async list(dir: ResolvedPath, policy: Policy): Promise<OperationOutcome> {
    if (!dir.isDirectory) {
      throw new ExecutionError('NotADirectory', dir.canonical, `${dir.canonical} is not a directory`);
    }
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(dir.canonical, { withFileTypes: true });
    } catch (err) {
      throw ExecutionError.fromFs(err, dir.canonical);
    }

    const entries: DirectoryEntry[] = [];
    let hidden = 0;
    for (const dirent of dirents) {
      const full = path.join(dir.canonical, dirent.name);
      if (excludedBy(full, dir.root, policy)) {
        hidden++;
        continue;
      }
      const size = dirent.isFile()
        ? await fs.promises.lstat(full).then(s => s.size, () => 0)
        : 0;
      entries.push({ name: dirent.name, type: entryType(dirent), size });
    }

    entries.sort((a, b) => {
      if (a.type === 'directory' && b.type !== 'directory') return -1;
      if (b.type === 'directory' && a.type !== 'directory') return 1;
      return a.name.localeCompare(b.name);
    });

    return {
      affected: [dir.canonical],
      output: { kind: 'list', directory: dir.canonical, entries, hidden },
    };
  }

  /**
   * Walk `dir` without following symlinks, staying within max_depth and
   * skipping excluded entries. Names match `pattern` (a glob on the name,
   * or on the path below `dir` when it contains "/"); contents match
   * `query` case-insensitively. With both, a file must match both.
   */
  private async search(dir: ResolvedPath, policy: Policy, query?: string, pattern?: string): Promise<OperationOutcome> {
    if (!dir.isDirectory) {
      throw new ExecutionError('NotADirectory', dir.canonical, `${dir.canonical} is not a directory`);
    }
    const matcher: GlobMatcher | null = pattern === undefined ? null : compileGlob(pattern);
    const needle = query?.toLowerCase();
    const matches: SearchMatch[] = [];
    let scanned = 0;
    let truncated = false;

    const walk = async (current: string, depth: number): Promise<void> => {
      if (depth + 1 > policy.maxDepth) return;
      let dirents: fs.Dirent[];
      try {
        dirents = await fs.promises.readdir(current, { withFileTypes: true });
      } catch (err) {
        if (current === dir.canonical) throw ExecutionError.fromFs(err, current);
        return;
      }
      dirents.sort((a, b) => a.name.localeCompare(b.name));

      for (const dirent of dirents) {
        if (truncated) return;
        const full = path.join(current, dirent.name);
        if (dirent.isSymbolicLink() || excludedBy(full, dir.root, policy)) continue;

        if (dirent.isDirectory()) {
          await walk(full, depth + 1);
          continue;
        }
        if (!dirent.isFile()) continue;

        if (scanned >= this.limits.maxSearchFiles) {
          truncated = true;
          return;
        }
        scanned++;

        if (matcher) {
          const subject = matcher.anchored ? path.relative(dir.canonical, full).split(path.sep).join('/') : dirent.name;
          if (!matcher.test(subject)) continue;
        }

        if (needle === undefined) {
          matches.push({ path: full });
        } else {
          const hit = await this.findInFile(full, needle);
          if (hit) matches.push({ path: full, ...hit });
        }

        if (matches.length >= this.limits.maxSearchResults) {
          truncated = true;
          return;
        }
      }
    };

    await walk(dir.canonical, dir.depth);

    return {
      affected: [dir.canonical],
      output: { kind: 'search', matches, scanned, truncated },
    };
  }

  private async findInFile(file: string, needle: string): Promise<{ line: number; preview: string } | null> {
    let content: Buffer;
    try {
      const stat = await fs.promises.stat(file);
      if (stat.size > this.limits.maxSearchFileBytes) return null;
      content = await fs.promises.readFile(file);
    } catch {
      // unreadable files are skipped
      return null;
    }
    if (content.includes(0)) return null;

    const lines = content.toString('utf-8').split(/\r?\n/);
    for (const [i, line] of lines.entries()) {
      if (line.toLowerCase().includes(needle)) {
        const trimmed = line.trim();
        return { line: i + 1, preview: trimmed.length > 120 ? `${trimmed.slice(0, 120)}...` : trimmed };
      }
    }
    return null;
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  private async batch(items: Array<{ path: string; target?: string; run: () => Promise<string[]> }>): Promise<OperationOutcome> {
    const results: ItemResult[] = [];
    const affected: string[] = [];

    for (const item of items) {
      const base = item.target === undefined ? { path: item.path } : { path: item.path, target: item.target };
      try {
        affected.push(...await item.run());
        results.push({ ...base, ok: true });
      } catch (err) {
        const error = toResultError(ExecutionError.fromFs(err, item.path));
        console.log(`  [ops] ${item.path}: ${error.code} (${error.message})`);
        results.push({ ...base, ok: false, error });
      }
    }

    const failed = results.filter(r => !r.ok);
    const outcome: OperationOutcome = { affected, items: results };
    if (failed.length === 1 && results.length === 1) {
      outcome.error = failed[0].error;
    } else if (failed.length > 0) {
      outcome.error = {
        code: 'PartialFailure',
        message: `${failed.length} of ${results.length} items failed`,
      };
    }
    return outcome;
  }

  private async move(item: TransferItem): Promise<string[]> {
    const { source, target } = item;
    await this.checkTransfer(source, target, 'move');
    try {
      await fs.promises.rename(source.canonical, target.canonical);
    } catch (err) {
      if (errnoOf(err) !== 'EXDEV') {
        throw ExecutionError.fromFs(err, source.canonical);
      }
      // Different filesystem: copy, then remove the original.
      await this.copyTree(source.canonical, target.canonical);
      await fs.promises.rm(source.canonical, { recursive: true }).catch((rmErr: unknown) => {
        throw ExecutionError.fromFs(rmErr, source.canonical);
      });
    }
    console.log(`  [ops] moved ${source.canonical} -> ${target.canonical}`);
    return [source.canonical, target.canonical];
  }

  private async copy(item: TransferItem): Promise<string[]> {
    const { source, target } = item;
    await this.checkTransfer(source, target, 'copy');
    await this.copyTree(source.canonical, target.canonical);
    console.log(`  [ops] copied ${source.canonical} -> ${target.canonical}`);
    return [target.canonical];
  }

  private async remove(target: ResolvedPath): Promise<string[]> {
    try {
      await fs.promises.rm(target.canonical, { recursive: true });
    } catch (err) {
      throw ExecutionError.fromFs(err, target.canonical);
    }
    console.log(`  [ops] deleted ${target.canonical}`);
    return [target.canonical];
  }

  private async checkTransfer(source: ResolvedPath, target: ResolvedPath, verb: string): Promise<void> {
    if (source.canonical === target.canonical || isWithin(target.canonical, source.canonical)) {
      throw new ExecutionError('IoError', source.canonical, `Cannot ${verb} ${source.canonical} into itself`);
    }
    const existing = await fs.promises.lstat(target.canonical).catch(() => null);
    if (existing) {
      throw new ExecutionError('AlreadyExists', target.canonical, `Already exists: ${target.canonical}`);
    }
  }

  private async copyTree(from: string, to: string): Promise<void> {
    try {
      await fs.promises.cp(from, to, { recursive: true, errorOnExist: true, force: false });
    } catch (err) {
      throw ExecutionError.fromFs(err, to);
    }
  }

  // -------------------------------------------------------------------------
  // Execute
  // -------------------------------------------------------------------------

  /** Runs the file directly (no shell), in its own directory. */
  private execute(file: ResolvedPath, args: readonly string[]): Promise<OperationOutcome> {
    if (file.isDirectory) {
      return Promise.reject(new ExecutionError('IsADirectory', file.canonical, `${file.canonical} is a directory`));
    }
    console.log(`  [ops] executing ${file.canonical} ${args.join(' ')}`.trimEnd());

    return new Promise((resolve, reject) => {
      execFile(
        file.canonical,
        [...args],
        {
          cwd: path.dirname(file.canonical),
          timeout: this.limits.executeTimeoutMs,
          maxBuffer: this.limits.maxOutputBytes,
          shell: false,
        },
        (err, stdout, stderr) => {
          if (err && typeof err.code !== 'number') {
            if (errnoOf(err) === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
              reject(new ExecutionError('IoError', file.canonical, `${file.canonical} was stopped after writing more than ${this.limits.maxOutputBytes} bytes of output`, err));
            } else if (err.killed) {
              reject(new ExecutionError('IoError', file.canonical, `${file.canonical} was stopped after ${this.limits.executeTimeoutMs}ms`, err));
            } else {
              reject(ExecutionError.fromFs(err, file.canonical));
            }
            return;
          }
          const exitCode = err && typeof err.code === 'number' ? err.code : 0;
          const outcome: OperationOutcome = {
            affected: [file.canonical],
            output: { kind: 'execute', exitCode, stdout, stderr },
          };
          if (exitCode !== 0) {
            outcome.error = { code: 'IoError', message: `${path.basename(file.canonical)} exited with status ${exitCode}` };
          }
          resolve(outcome);
        },
      );
    });
  }
}

function entryType(dirent: fs.Dirent): DirectoryEntry['type'] {
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  if (dirent.isSymbolicLink()) return 'symlink';
  return 'other';
}
