/**
 * navbuddy status: configuration, policy, model and audit health
 */

import fs from 'node:fs';
import { configFilePath, loadConfig, type NavigatorConfig } from '../config/config.js';
import { verifyAuditFile } from '../audit/logger.js';
import { OllamaOracle } from '../oracle/ollama.js';
import { PolicyParser } from '../policy/parser.js';
import { exitWithError } from './output.js';

export async function statusCommand(): Promise<void> {
  console.log('');
  console.log('  🧭 navbuddy Status');
  console.log('  ──────────────────');

  let config: NavigatorConfig;
  try {
    config = loadConfig();
  } catch (err) {
    exitWithError(err);
  }

  const configPath = configFilePath(config.home);
  console.log(`  Config:   ${fs.existsSync(configPath) ? configPath : '(defaults, run: navbuddy init)'}`);
  console.log(`  Channel:  ${config.confirmation.channel} (${config.confirmation.timeoutSeconds}s window)`);

  // Policy
  if (!fs.existsSync(config.policyPath)) {
    console.log(`  Policy:   ❌ Missing (${config.policyPath})`);
  } else {
    try {
      const policy = PolicyParser.parseFile(config.policyPath);
      console.log(`  Policy:   ✅ ${policy.roots.length} root(s), max_depth ${policy.maxDepth}`);
    } catch (err) {
      console.log(`  Policy:   ❌ Invalid (${(err as Error).message.split('\n')[0]})`);
    }
  }

  // Oracle
  const oracle = new OllamaOracle({ url: config.oracle.url, model: config.oracle.model });
  if (await oracle.isAvailable()) {
    const models = await oracle.listModels().catch(() => []);
    const installed = models.some(m => m === config.oracle.model || m.startsWith(`${config.oracle.model}:`));
    console.log(`  Ollama:   ✅ ${config.oracle.url}`);
    console.log(`  Model:    ${installed ? '✅' : '⚠️ '} ${config.oracle.model}${installed ? '' : ' (not installed; run: ollama pull ' + config.oracle.model + ')'}`);
  } else {
    console.log(`  Ollama:   ❌ Not reachable at ${config.oracle.url}`);
    console.log(`  Model:    ${config.oracle.model}`);
  }

  // Audit log
  if (fs.existsSync(config.audit.path)) {
    const chain = verifyAuditFile(config.audit.path);
    console.log(`  Audit:    ${chain.valid ? '✅' : '❌'} ${chain.eventCount} entr${chain.eventCount === 1 ? 'y' : 'ies'}${chain.error ? ` (${chain.error})` : ''}`);
  } else {
    console.log('  Audit:    No entries yet');
  }

  console.log('');
}
