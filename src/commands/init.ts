/**
 * navbuddy init: write config.yml and policy.yml
 *
 * Creates NAVBUDDY_HOME (default ~/.navbuddy) with a default config and a
 * policy whose allowed roots are the given directories (or the home
 * directory). Existing files are kept unless --force is given.
 */

import fs from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import { stringify as yamlStringify } from 'yaml';
import { CHANNEL_TYPES, configFilePath, defaultConfigFile, navbuddyHome } from '../config/config.js';
import { getDefaultPolicy } from '../policy/defaults.js';
import { PolicyParser, expandHome } from '../policy/parser.js';

interface InitOptions {
  root?: string[];
  model?: string;
  channel: string;
  force?: boolean;
}

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function initCommand(options: InitOptions): Promise<void> {
  console.log('');
  console.log('  🧭 navbuddy: natural-language file navigator');
  console.log('  ──────────────────────────────────────────────');
  console.log('');

  const home = navbuddyHome();
  const configPath = configFilePath(home);
  fs.mkdirSync(home, { recursive: true });

  const channel = options.channel;
  if (!CHANNEL_TYPES.some(t => t === channel)) {
    console.error(`  ❌ Unknown channel "${channel}". Use one of: ${CHANNEL_TYPES.join(', ')}`);
    process.exit(1);
  }

  const config = defaultConfigFile(home);
  if (options.model && config.oracle) config.oracle.model = options.model;
  config.confirmation = { ...config.confirmation, channel };

  if (channel === 'webhook') {
    const url = await prompt('  Webhook URL: ');
    const secret = await prompt('  Webhook Secret (optional): ');
    if (!url) {
      console.error('  ❌ A webhook URL is required for the webhook channel.');
      process.exit(1);
    }
    config.confirmation.webhook = secret ? { url, secret } : { url };
    console.log('  ✅ Webhook configured');
  } else if (channel === 'deny') {
    console.log('  🚫 Operations that need confirmation will be refused.');
  } else {
    console.log('  📟 Using terminal prompts for confirmations.');
  }
  console.log('');

  const roots = (options.root && options.root.length > 0 ? options.root : undefined)
    ?.map(r => path.resolve(expandHome(r)));
  const policy = getDefaultPolicy(roots);
  const problems = PolicyParser.validate(policy, home);
  if (problems.length > 0) {
    console.error('  ❌ The default policy would be invalid:');
    for (const problem of problems) console.error(`     - ${problem}`);
    process.exit(1);
  }

  const policyPath = config.policy ?? path.join(home, 'policy.yml');
  writeUnlessPresent(configPath, yamlStringify(config), options.force, 'Config');
  writeUnlessPresent(policyPath, yamlStringify(policy), options.force, 'Policy');

  console.log('');
  console.log('  🎉 navbuddy initialized! Try:');
  console.log('');
  console.log('    navbuddy status');
  console.log('    navbuddy ask "list my documents"');
  console.log('    navbuddy chat');
  console.log('');
}

function writeUnlessPresent(file: string, content: string, force: boolean | undefined, label: string): void {
  if (fs.existsSync(file) && !force) {
    console.log(`  ⏭️  ${label} already exists at ${file} (use --force to overwrite)`);
    return;
  }
  fs.writeFileSync(file, content, 'utf-8');
  console.log(`  ✅ ${label} saved to ${file}`);
}
