/**
 * navbuddy ask: one request through the gatekeeper
 */

import path from 'node:path';
import { createChannel } from '../channels/terminal.js';
import { loadConfig } from '../config/config.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { exitWithError, printResult } from './output.js';
import { expandHome } from '../policy/parser.js';

interface AskOptions {
  cwd?: string;
  yes?: boolean;
}

export async function askCommand(words: string[], options: AskOptions): Promise<void> {
  const text = words.join(' ').trim();
  if (!text) {
    console.error('  ❌ Usage: navbuddy ask <request...>');
    process.exit(1);
  }

  let runtime: Runtime;
  try {
    const config = loadConfig();
    runtime = createRuntime(config, createChannel(config.confirmation, { yes: options.yes }));
  } catch (err) {
    exitWithError(err);
  }

  const cwd = options.cwd ? path.resolve(expandHome(options.cwd)) : runtime.policyStore.current().roots[0];
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const result = await runtime.gatekeeper.submit(text, {
      context: { cwd, recentListings: [] },
      signal: controller.signal,
    });
    printResult(result);
    if (result.status !== 'success') process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
