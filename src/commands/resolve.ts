/**
 * navbuddy resolve: run one path through the resolver
 *
 * Prints the canonical path, or the reason and rule that reject it.
 */

import path from 'node:path';
import { loadConfig } from '../config/config.js';
import { PathResolutionError } from '../core/errors.js';
import { resolvePath } from '../core/resolver.js';
import { PolicyParser, expandHome, type Policy } from '../policy/parser.js';
import { exitWithError } from './output.js';

interface ResolveOptions {
  cwd?: string;
  destination?: boolean;
}

export async function resolveCommand(rawPath: string, options: ResolveOptions): Promise<void> {
  let policy: Policy;
  try {
    policy = PolicyParser.parseFile(loadConfig().policyPath);
  } catch (err) {
    exitWithError(err);
  }

  const cwd = options.cwd ? path.resolve(expandHome(options.cwd)) : undefined;
  try {
    const resolved = await resolvePath(rawPath, policy, { cwd, mustExist: !options.destination });
    console.log(`  ✅ ${resolved.canonical}`);
    console.log(`     root ${resolved.root}, depth ${resolved.depth}${resolved.exists ? '' : ', does not exist yet'}`);
  } catch (err) {
    if (err instanceof PathResolutionError) {
      console.log(`  🚫 ${err.reason}: ${err.message}`);
      if (err.rule) console.log(`     Rule: ${err.rule}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
