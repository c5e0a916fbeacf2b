/**
 * Policy Parser
 *
 * Parses and validates navbuddy policy files. A policy only becomes a
 * Policy snapshot once every field has passed validation; errors are
 * collected so the user sees all of them at once.
 *
 * Policy format:
 *   allowed_roots: [~/Documents, ~/projects]
 *   excluded_patterns: ["*.tmp", ".git", "node_modules"]
 *   max_depth: 8
 *   confirm: [move, delete, execute]
 *   follow_symlinks: false
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { ConfigurationError } from '../core/errors.js';
import { OPERATION_KINDS, isOperationKind, type OperationKind } from '../core/types.js';
import { compileGlob, type GlobMatcher } from './glob.js';

export interface PolicyFile {
  allowed_roots: string[];
  excluded_patterns?: string[];
  max_depth?: number;
  confirm?: string[];
  follow_symlinks?: boolean;
}

export interface Policy {
  /** Canonical root directories, in declared order. */
  readonly roots: readonly string[];
  readonly excluded: readonly GlobMatcher[];
  readonly maxDepth: number;
  readonly confirm: ReadonlySet<OperationKind>;
  readonly followSymlinks: boolean;
  readonly source?: string;
  readonly loadedAt: string;
}

export const DEFAULT_MAX_DEPTH = 8;
export const DEFAULT_CONFIRM: readonly OperationKind[] = ['move', 'copy', 'delete', 'execute'];

const KNOWN_KEYS = ['allowed_roots', 'excluded_patterns', 'max_depth', 'confirm', 'follow_symlinks'];

export class PolicyParser {
  /**
   * Parse and validate a YAML policy file.
   */
  static parseFile(filePath: string): Policy {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new ConfigurationError([`Cannot read policy file: ${(err as Error).message}`], filePath);
    }
    return PolicyParser.parse(content, { source: filePath, baseDir: path.dirname(path.resolve(filePath)) });
  }

  /**
   * Parse and validate a YAML policy string.
   */
  static parse(yamlContent: string, options: { source?: string; baseDir?: string } = {}): Policy {
    let raw: unknown;
    try {
      raw = yamlParse(yamlContent);
    } catch (err) {
      throw new ConfigurationError([`YAML syntax error: ${(err as Error).message}`], options.source);
    }
    return PolicyParser.build(raw, options);
  }

  /**
   * Validate an already-parsed policy object and freeze it into a snapshot.
   */
  static build(raw: unknown, options: { source?: string; baseDir?: string } = {}): Policy {
    const errors = PolicyParser.validate(raw, options.baseDir);
    if (errors.length > 0 || !isRecord(raw)) {
      throw new ConfigurationError(errors.length > 0 ? errors : ['Policy must be a mapping'], options.source);
    }

    const roots = canonicalRoots(stringList(raw.allowed_roots), options.baseDir);
    const excluded = stringList(raw.excluded_patterns).map(compileGlob);
    const confirmKinds = raw.confirm === undefined
      ? DEFAULT_CONFIRM
      : stringList(raw.confirm).filter(isOperationKind);

    return Object.freeze({
      roots: Object.freeze(roots),
      excluded: Object.freeze(excluded),
      maxDepth: typeof raw.max_depth === 'number' ? raw.max_depth : DEFAULT_MAX_DEPTH,
      confirm: new Set<OperationKind>(confirmKinds),
      followSymlinks: raw.follow_symlinks === true,
      source: options.source,
      loadedAt: new Date().toISOString(),
    });
  }

  /**
   * Validate a parsed policy and return any errors.
   */
  static validate(raw: unknown, baseDir?: string): string[] {
    const errors: string[] = [];

    if (!isRecord(raw)) {
      errors.push('Policy must be a mapping');
      return errors;
    }

    for (const key of Object.keys(raw)) {
      if (!KNOWN_KEYS.includes(key)) {
        errors.push(`Unknown field "${key}"`);
      }
    }

    // Roots
    const roots = raw.allowed_roots;
    if (!Array.isArray(roots) || roots.length === 0) {
      errors.push('"allowed_roots" must be a non-empty list of directories');
    } else {
      roots.forEach((root, i) => {
        const prefix = `allowed_roots[${i}]`;
        if (typeof root !== 'string' || root.trim() === '') {
          errors.push(`${prefix}: must be a non-empty string`);
          return;
        }
        const problem = checkRoot(expandHome(root), baseDir);
        if (problem) errors.push(`${prefix}: ${problem}`);
      });
    }

    // Excluded patterns
    if (raw.excluded_patterns !== undefined) {
      if (!Array.isArray(raw.excluded_patterns)) {
        errors.push('"excluded_patterns" must be a list of glob patterns');
      } else {
        raw.excluded_patterns.forEach((pattern, i) => {
          if (typeof pattern !== 'string') {
            errors.push(`excluded_patterns[${i}]: must be a string`);
            return;
          }
          try {
            compileGlob(pattern);
          } catch (err) {
            errors.push(`excluded_patterns[${i}]: ${(err as Error).message}`);
          }
        });
      }
    }

    // Depth
    if (raw.max_depth !== undefined) {
      if (typeof raw.max_depth !== 'number' || !Number.isInteger(raw.max_depth) || raw.max_depth < 0) {
        errors.push(`Invalid max_depth: "${String(raw.max_depth)}". Must be a non-negative integer`);
      }
    }

    // Confirmation set
    if (raw.confirm !== undefined) {
      if (!Array.isArray(raw.confirm)) {
        errors.push('"confirm" must be a list of operation kinds');
      } else {
        for (const kind of raw.confirm) {
          if (!isOperationKind(kind)) {
            errors.push(`Invalid confirm kind "${String(kind)}". Must be one of: ${OPERATION_KINDS.join(', ')}`);
          }
        }
      }
    }

    if (raw.follow_symlinks !== undefined && typeof raw.follow_symlinks !== 'boolean') {
      errors.push('"follow_symlinks" must be true or false');
    }

    return errors;
  }

  /**
   * Plain, serializable view of a snapshot (for `policy show` and the gateway).
   */
  static describe(policy: Policy): PolicyFile {
    return {
      allowed_roots: [...policy.roots],
      excluded_patterns: policy.excluded.map(m => m.pattern),
      max_depth: policy.maxDepth,
      confirm: OPERATION_KINDS.filter(k => policy.confirm.has(k)),
      follow_symlinks: policy.followSymlinks,
    };
  }
}

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

function checkRoot(root: string, baseDir?: string): string | null {
  const absolute = path.resolve(baseDir ?? process.cwd(), root);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(absolute);
  } catch {
    return `${absolute} does not exist`;
  }
  if (!stat.isDirectory()) {
    return `${absolute} is not a directory`;
  }
  try {
    fs.accessSync(absolute, fs.constants.R_OK | fs.constants.X_OK);
  } catch {
    return `${absolute} is not readable`;
  }
  return null;
}

function canonicalRoots(roots: string[], baseDir?: string): string[] {
  const canonical = roots.map(root => fs.realpathSync(path.resolve(baseDir ?? process.cwd(), expandHome(root))));
  return [...new Set(canonical)];
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
