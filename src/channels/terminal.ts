/**
 * Terminal Channel
 *
 * Shows the confirmation request in the terminal and waits for y/N.
 * Anything but an explicit yes is a denial; the prompt is withdrawn
 * when the confirmation window closes.
 */

import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import {
  StaticChannel,
  WebhookChannel,
  formatConfirmation,
  type ConfirmationChannel,
  type ConfirmationDecision,
  type ConfirmationRequest,
} from '../core/channel.js';
import type { NavigatorConfig } from '../config/config.js';

const TIER_ICONS: Record<string, string> = {
  read_only: '🟢 READ ONLY',
  modify: '🟡 MODIFY',
  destructive: '🔴 DESTRUCTIVE',
  system: '⛔ SYSTEM',
};

export class TerminalChannel implements ConfirmationChannel {
  readonly name = 'terminal';
  private input: Readable;
  private output: Writable;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.input = input;
    this.output = output;
  }

  async confirm(request: ConfirmationRequest, signal: AbortSignal): Promise<ConfirmationDecision> {
    const write = (line: string) => this.output.write(`${line}\n`);

    write('');
    write('  ════════════════════════════════════════════════════');
    write(`    🧭 CONFIRM ${TIER_ICONS[request.tier] ?? request.tier}`);
    write('  ════════════════════════════════════════════════════');
    for (const line of formatConfirmation(request)) {
      write(`    ${line}`);
    }
    write(`    Expires:  ${request.expiresAt}`);
    write('  ════════════════════════════════════════════════════');

    const answer = await this.prompt('  Proceed? [y/N] ', signal);
    if (answer === null) {
      write('');
      write('  ⏱️  No answer in time');
      return { approved: false, reason: 'No answer before the confirmation window closed' };
    }

    const choice = answer.toLowerCase().trim();
    if (choice === 'y' || choice === 'yes') {
      write('  ✅ Approved');
      return { approved: true };
    }

    write('  ❌ Denied');
    return { approved: false, reason: choice === '' ? 'No response (default deny)' : `User answered: ${answer.trim()}` };
  }

  private prompt(question: string, signal: AbortSignal): Promise<string | null> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    return new Promise((resolve) => {
      const onAbort = () => {
        rl.close();
        resolve(null);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      rl.question(question, (answer) => {
        signal.removeEventListener('abort', onAbort);
        rl.close();
        resolve(answer);
      });
    });
  }
}

/**
 * Create the confirmation channel named in config. `yes` pre-approves
 * everything (ask --yes).
 */
export function createChannel(config: NavigatorConfig['confirmation'], options: { yes?: boolean } = {}): ConfirmationChannel {
  if (options.yes) return new StaticChannel(true);
  switch (config.channel) {
    case 'webhook':
      return new WebhookChannel(config.webhook?.url ?? '', config.webhook?.secret);
    case 'deny':
      return new StaticChannel(false);
    case 'prompt':
      return new TerminalChannel();
  }
}
