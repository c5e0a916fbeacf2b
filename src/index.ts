#!/usr/bin/env node

/**
 * navbuddy: natural-language file navigator on a local model
 *
 * Every request goes through the same pipeline: the model proposes one
 * operation, the sandbox policy validates every path, risky kinds wait for
 * confirmation, and each attempt lands in a hash-chained audit log.
 *
 * Usage:
 *   navbuddy init [--root <dir>...] [--model <name>] [--channel prompt|webhook|deny]
 *   navbuddy ask <request...> [--cwd <dir>] [--yes]
 *   navbuddy chat [--cwd <dir>]
 *   navbuddy models
 *   navbuddy status
 *   navbuddy policy check [file]
 *   navbuddy policy show
 *   navbuddy resolve <path> [--cwd <dir>] [--destination]
 *   navbuddy history [--limit <n>] [--verify]
 *   navbuddy serve [--port <port>] [--host <host>]
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';
import { modelsCommand } from './commands/models.js';
import { statusCommand } from './commands/status.js';
import { policyCommand } from './commands/policy.js';
import { resolveCommand } from './commands/resolve.js';
import { historyCommand } from './commands/history.js';
import { serveCommand } from './commands/serve.js';

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();

program
  .name('navbuddy')
  .description('Natural-language file navigator with a sandboxed, audited execution pipeline')
  .version('0.1.0');

// navbuddy init
program
  .command('init')
  .description('Write default config.yml and policy.yml')
  .option('--root <dir>', 'Allowed root directory (repeatable)', collect, [])
  .option('--model <name>', 'Ollama model to use')
  .option('--channel <type>', 'Confirmation channel: prompt, webhook, deny', 'prompt')
  .option('--force', 'Overwrite existing files', false)
  .action(initCommand);

// navbuddy ask <request...>
program
  .command('ask')
  .description('Run one natural-language request')
  .argument('<request...>', 'What you want done')
  .option('--cwd <dir>', 'Directory relative paths start from (default: first allowed root)')
  .option('-y, --yes', 'Approve confirmations without asking', false)
  .action(askCommand);

// navbuddy chat
program
  .command('chat')
  .description('Interactive session that remembers where you are')
  .option('--cwd <dir>', 'Starting directory (default: first allowed root)')
  .action(chatCommand);

// navbuddy models
program
  .command('models')
  .description('List models installed in Ollama')
  .action(modelsCommand);

// navbuddy status
program
  .command('status')
  .description('Show configuration, policy, model and audit status')
  .action(statusCommand);

// navbuddy policy
const policy = program
  .command('policy')
  .description('Inspect sandbox policies');

policy
  .command('check [file]')
  .description('Validate a policy file (default: the active one)')
  .action((file?: string) => policyCommand('check', file));

policy
  .command('show')
  .description('Show the active policy')
  .action(() => policyCommand('show'));

// navbuddy resolve <path>
program
  .command('resolve <path>')
  .description('Check a path against the policy and print its canonical form')
  .option('--cwd <dir>', 'Directory relative paths start from')
  .option('--destination', 'Treat the path as a destination that may not exist yet', false)
  .action(resolveCommand);

// navbuddy history
program
  .command('history')
  .description('Show recent audit entries')
  .option('--limit <n>', 'Number of entries', '20')
  .option('--verify', 'Verify the hash chain', false)
  .action(historyCommand);

// navbuddy serve
program
  .command('serve')
  .description('Start the HTTP gateway')
  .option('--port <port>', 'Port (default: server.port from config)')
  .option('--host <host>', 'Host to bind (default: server.host from config)')
  .action(serveCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`  ❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
