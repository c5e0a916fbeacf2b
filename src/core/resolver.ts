/**
 * Path Resolver: the only way from a raw string to a filesystem path.
 *
 * Steps (first failure wins):
 *   1. Expand ~, resolve against cwd, canonicalize through realpath.
 *      Missing tails are appended to the realpath of the nearest existing
 *      ancestor, so destinations that do not exist yet still canonicalize.
 *   2. Symlink escape: with follow_symlinks off, a path whose canonical form
 *      differs from its literal form and lands outside every root.
 *   3. Containment in an allowed root.
 *   4. Depth below the nearest root.
 *   5. Excluded patterns.
 *   6. Existence and readability (or, for destinations, an existing parent).
 */

import fs from 'node:fs';
import path from 'node:path';
import { PathResolutionError, errnoOf } from './errors.js';
import { expandHome, type Policy } from '../policy/parser.js';
import type { GlobMatcher } from '../policy/glob.js';
import type { ResolvedPath } from './types.js';

export interface ResolveOptions {
  /** Base for relative paths. Defaults to the first allowed root. */
  cwd?: string;
  /** Sources must exist and be readable; destinations only need a parent directory. */
  mustExist?: boolean;
}

export async function resolvePath(
  rawPath: string,
  policy: Policy,
  options: ResolveOptions = {},
): Promise<ResolvedPath> {
  const mustExist = options.mustExist ?? true;
  const base = options.cwd ?? policy.roots[0];
  const literal = path.resolve(base, expandHome(rawPath.trim()));

  // 1. Canonicalize
  const { canonical, exists } = await canonicalize(literal, rawPath);

  // 2. Symlink escape
  const root = nearestRoot(canonical, policy.roots);
  if (!policy.followSymlinks && canonical !== literal && root === null) {
    throw new PathResolutionError(
      'SymlinkEscape',
      rawPath,
      `${literal} is a symbolic link to ${canonical}, outside every allowed root`,
      'follow_symlinks: false',
    );
  }

  // 3. Containment
  if (root === null) {
    throw new PathResolutionError(
      'OutsideAllowedRoot',
      rawPath,
      `${canonical} is outside the allowed roots (${policy.roots.join(', ')})`,
      'allowed_roots',
    );
  }

  // 4. Depth, 5. Excluded patterns
  const rel = path.relative(root, canonical);
  const segments = rel === '' ? [] : rel.split(path.sep);
  denyHidden(canonical, root, segments.length, policy, rawPath);

  // 6. Existence / readability
  let isDirectory = false;
  if (exists) {
    try {
      const stat = await fs.promises.stat(canonical);
      isDirectory = stat.isDirectory();
      if (mustExist) {
        await fs.promises.access(canonical, fs.constants.R_OK);
      }
    } catch (err) {
      throw new PathResolutionError('UnreadablePath', rawPath, `${canonical} is not readable (${errnoOf(err) ?? 'error'})`);
    }
  } else if (mustExist) {
    throw new PathResolutionError('UnreadablePath', rawPath, `${canonical} does not exist`);
  } else {
    if (await fs.promises.lstat(canonical).then(() => true, () => false)) {
      throw new PathResolutionError('UnreadablePath', rawPath, `${canonical} is a dangling symbolic link`);
    }
    const parent = path.dirname(canonical);
    const parentStat = await fs.promises.stat(parent).catch(() => null);
    if (!parentStat || !parentStat.isDirectory()) {
      throw new PathResolutionError('UnreadablePath', rawPath, `Parent directory ${parent} does not exist`);
    }
  }

  return Object.freeze({
    raw: rawPath,
    canonical,
    root,
    depth: segments.length,
    exists,
    isDirectory,
  });
}

/**
 * Check every entry below a directory that a recursive delete, move or copy
 * would touch, with the same depth and exclusion rules as resolvePath.
 * `landing` checks the same entries again at their new location.
 * Symbolic links are not followed.
 */
export async function checkSubtree(dir: ResolvedPath, policy: Policy, landing?: ResolvedPath): Promise<void> {
  if (!dir.isDirectory) return;

  const walk = async (current: string, below: string[]): Promise<void> => {
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(current, { withFileTypes: true });
    } catch (err) {
      throw new PathResolutionError('UnreadablePath', dir.raw, `${current} is not readable (${errnoOf(err) ?? 'error'})`);
    }
    for (const dirent of dirents) {
      const segments = [...below, dirent.name];
      const full = path.join(current, dirent.name);
      denyHidden(full, dir.root, dir.depth + segments.length, policy, dir.raw);
      if (landing) {
        denyHidden(path.join(landing.canonical, ...segments), landing.root, landing.depth + segments.length, policy, dir.raw);
      }
      if (dirent.isDirectory()) await walk(full, segments);
    }
  };

  await walk(dir.canonical, []);
}

function denyHidden(canonical: string, root: string, depth: number, policy: Policy, rawPath: string): void {
  if (depth > policy.maxDepth) {
    throw new PathResolutionError(
      'DepthExceeded',
      rawPath,
      `${canonical} is ${depth} level(s) below ${root}; the limit is ${policy.maxDepth}`,
      `max_depth: ${policy.maxDepth}`,
    );
  }
  const matcher = excludedBy(canonical, root, policy);
  if (matcher) {
    throw new PathResolutionError(
      'ExcludedByPattern',
      rawPath,
      `${canonical} matches excluded pattern "${matcher.pattern}"`,
      `excluded_patterns: "${matcher.pattern}"`,
    );
  }
}

/**
 * First excluded pattern matching `canonical`, or null. Patterns without "/"
 * test each segment below `root`; the others test the full and relative path.
 */
export function excludedBy(canonical: string, root: string, policy: Policy): GlobMatcher | null {
  const rel = path.relative(root, canonical);
  const segments = rel === '' ? [] : rel.split(path.sep);
  for (const matcher of policy.excluded) {
    const hit = matcher.anchored
      ? matcher.test(canonical) || matcher.test(rel)
      : segments.some(segment => matcher.test(segment));
    if (hit) return matcher;
  }
  return null;
}

/** Deepest allowed root that contains (or equals) `p`, or null. */
export function nearestRoot(p: string, roots: readonly string[]): string | null {
  let best: string | null = null;
  for (const root of roots) {
    if (isWithin(p, root) && (best === null || root.length > best.length)) {
      best = root;
    }
  }
  return best;
}

export function isWithin(p: string, root: string): boolean {
  const rel = path.relative(root, p);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

async function canonicalize(literal: string, rawPath: string): Promise<{ canonical: string; exists: boolean }> {
  const missing: string[] = [];
  let current = literal;

  for (;;) {
    try {
      const real = await fs.promises.realpath(current);
      return {
        canonical: missing.length === 0 ? real : path.join(real, ...missing.reverse()),
        exists: missing.length === 0,
      };
    } catch (err) {
      const code = errnoOf(err);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        throw new PathResolutionError('UnreadablePath', rawPath, `Cannot resolve ${literal} (${code ?? 'error'})`);
      }
      const parent = path.dirname(current);
      if (parent === current) {
        throw new PathResolutionError('UnreadablePath', rawPath, `Cannot resolve ${literal}`);
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}
