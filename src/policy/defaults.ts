/**
 * Default Policy
 *
 * Written by `navbuddy init`. Roots default to the user's home directory;
 * everything that changes files asks first.
 */

import os from 'node:os';
import { DEFAULT_CONFIRM, DEFAULT_MAX_DEPTH, type PolicyFile } from './parser.js';

export const DEFAULT_EXCLUDED_PATTERNS = [
  '.git',
  '.ssh',
  '.gnupg',
  'node_modules',
  '*.tmp',
  '.env',
];

export function getDefaultPolicy(roots: string[] = [os.homedir()]): PolicyFile {
  return {
    allowed_roots: roots,
    excluded_patterns: [...DEFAULT_EXCLUDED_PATTERNS],
    max_depth: DEFAULT_MAX_DEPTH,
    confirm: [...DEFAULT_CONFIRM],
    follow_symlinks: false,
  };
}
