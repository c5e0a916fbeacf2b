/**
 * navbuddy policy: inspect sandbox policies
 *
 * Commands:
 *   navbuddy policy check [file]   Validate a policy file (default: the active one)
 *   navbuddy policy show           Display the active policy, canonicalized
 */

import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { loadConfig } from '../config/config.js';
import { ConfigurationError } from '../core/errors.js';
import { PolicyParser } from '../policy/parser.js';
import { exitWithError } from './output.js';

export async function policyCommand(action: string, file?: string): Promise<void> {
  let activePolicy: string;
  try {
    activePolicy = loadConfig().policyPath;
  } catch (err) {
    exitWithError(err);
  }

  switch (action) {
    case 'check': {
      const resolvedPath = path.resolve(file ?? activePolicy);
      if (!fs.existsSync(resolvedPath)) {
        console.error(`  ❌ File not found: ${resolvedPath}`);
        process.exit(1);
      }

      try {
        const policy = PolicyParser.parseFile(resolvedPath);
        console.log(`  ✅ Policy is valid: ${resolvedPath}`);
        console.log(`  Roots:    ${policy.roots.join(', ')}`);
        console.log(`  Excluded: ${policy.excluded.map(m => m.pattern).join(', ') || '(none)'}`);
        console.log(`  Depth:    ${policy.maxDepth}`);
        console.log(`  Confirm:  ${[...policy.confirm].join(', ') || '(nothing)'}`);
      } catch (err) {
        if (err instanceof ConfigurationError) {
          console.error('  ❌ Policy validation errors:');
          for (const problem of err.problems) {
            console.error(`    - ${problem}`);
          }
        } else {
          console.error(`  ❌ Failed to parse policy: ${(err as Error).message}`);
        }
        process.exit(1);
      }
      break;
    }

    case 'show': {
      if (!fs.existsSync(activePolicy)) {
        console.log('  No policy configured. Run: navbuddy init');
        return;
      }

      try {
        const policy = PolicyParser.parseFile(activePolicy);
        console.log('');
        console.log('  Current navbuddy Policy');
        console.log(`  ${activePolicy}`);
        console.log('  ───────────────────────');
        console.log('');
        console.log(yamlStringify(PolicyParser.describe(policy)).split('\n').map(l => '  ' + l).join('\n'));
      } catch (err) {
        exitWithError(err);
      }
      break;
    }

    default:
      console.error(`  ❌ Unknown policy command: ${action}`);
      process.exit(1);
  }
}
