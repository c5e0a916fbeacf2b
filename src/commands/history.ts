/**
 * navbuddy history: recent audit entries
 */

import { loadConfig, type NavigatorConfig } from '../config/config.js';
import { readAuditEntries, verifyAuditFile } from '../audit/logger.js';
import { exitWithError } from './output.js';

interface HistoryOptions {
  limit: string;
  verify?: boolean;
}

const STATUS_ICONS = { success: '✅', denied: '🚫', failed: '❌' } as const;

export async function historyCommand(options: HistoryOptions): Promise<void> {
  let config: NavigatorConfig;
  try {
    config = loadConfig();
  } catch (err) {
    exitWithError(err);
  }

  const limit = Number.parseInt(options.limit, 10);
  if (!Number.isInteger(limit) || limit < 1) {
    console.error(`  ❌ Invalid limit: ${options.limit}`);
    process.exit(1);
  }

  const entries = readAuditEntries(config.audit.path).slice(-limit);
  console.log('');
  if (entries.length === 0) {
    console.log('  No audit entries yet');
  }
  for (const entry of entries) {
    const { result } = entry;
    const confirmed = entry.confirmed ? ' (confirmed)' : '';
    console.log(`  ${STATUS_ICONS[result.status]} ${entry.timestamp}  ${entry.proposal.kind}${confirmed}  "${entry.userText}"`);
    if (result.error) {
      console.log(`     ${result.error.code}: ${result.error.message}`);
    } else if (result.affected.length > 0) {
      console.log(`     ${result.affected.slice(0, 3).join(', ')}${result.affected.length > 3 ? ', ...' : ''}`);
    }
  }

  if (options.verify) {
    const chain = verifyAuditFile(config.audit.path);
    console.log('');
    console.log(chain.valid
      ? `  🔗 Hash chain intact (${chain.eventCount} entries)`
      : `  ❌ Hash chain broken: ${chain.error}`);
    if (!chain.valid) process.exitCode = 1;
  }
  console.log('');
}
