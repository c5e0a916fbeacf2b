/**
 * navbuddy chat: interactive session
 *
 * Each line is one request. The session remembers where you are: a
 * successful listing moves the current directory and is offered to the
 * model as context for the next request.
 *
 *   :cd <dir>   change directory without asking the model
 *   :where      print the current directory
 *   :quit       leave (Ctrl-D works too)
 */

import path from 'node:path';
import readline from 'node:readline';
import { createChannel } from '../channels/terminal.js';
import { loadConfig } from '../config/config.js';
import { resolvePath } from '../core/resolver.js';
import { NavigationSession } from '../core/session.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { expandHome } from '../policy/parser.js';
import { exitWithError, printResult } from './output.js';

interface ChatOptions {
  cwd?: string;
}

/** One line from stdin, or null at end of input. */
function prompt(question: string): Promise<string | null> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve(null);
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  let runtime: Runtime;
  try {
    const config = loadConfig();
    runtime = createRuntime(config, createChannel(config.confirmation));
  } catch (err) {
    exitWithError(err);
  }

  const start = options.cwd ? path.resolve(expandHome(options.cwd)) : runtime.policyStore.current().roots[0];
  const session = new NavigationSession(start);

  console.log('');
  console.log('  🧭 navbuddy chat');
  console.log(`  Model:   ${runtime.config.oracle.model} @ ${runtime.config.oracle.url}`);
  console.log(`  Start:   ${session.currentDirectory}`);
  console.log('  Type a request, :cd <dir>, :where, or :quit');
  console.log('');

  for (;;) {
    const line = await prompt(`  ${path.basename(session.currentDirectory) || '/'} › `);
    if (line === null) break;
    const text = line.trim();
    if (text === '') continue;
    if (text === ':quit' || text === ':q' || text === 'exit') break;

    if (text === ':where') {
      console.log(`  ${session.currentDirectory}`);
      continue;
    }

    if (text.startsWith(':cd')) {
      const target = text.slice(3).trim() || runtime.policyStore.current().roots[0];
      try {
        const resolved = await resolvePath(target, runtime.policyStore.current(), { cwd: session.currentDirectory });
        if (!resolved.isDirectory) {
          console.log(`  ❌ Not a directory: ${resolved.canonical}`);
          continue;
        }
        session.moveTo(resolved.canonical);
        console.log(`  📁 ${resolved.canonical}`);
      } catch (err) {
        console.log(`  🚫 ${(err as Error).message}`);
      }
      continue;
    }

    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);
    try {
      const result = await runtime.gatekeeper.submit(text, { context: session.snapshot(), signal: controller.signal });
      session.observe(result);
      printResult(result);
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  }

  console.log('  👋 Bye');
}
