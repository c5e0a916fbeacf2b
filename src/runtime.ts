/**
 * Wire the pipeline together from configuration.
 */

import { FileAuditLog } from './audit/logger.js';
import { ExecutionGatekeeper } from './core/gatekeeper.js';
import { IntentTranslator } from './core/translator.js';
import { OllamaOracle } from './oracle/ollama.js';
import { PolicyStore } from './policy/store.js';
import type { ConfirmationChannel } from './core/channel.js';
import type { NavigatorConfig } from './config/config.js';

export interface Runtime {
  config: NavigatorConfig;
  policyStore: PolicyStore;
  audit: FileAuditLog;
  oracle: OllamaOracle;
  gatekeeper: ExecutionGatekeeper;
}

/** Throws ConfigurationError when the policy file is missing or invalid. */
export function createRuntime(config: NavigatorConfig, channel: ConfirmationChannel): Runtime {
  const policyStore = PolicyStore.fromFile(config.policyPath);
  const audit = new FileAuditLog(config.audit.path);
  const oracle = new OllamaOracle({
    url: config.oracle.url,
    model: config.oracle.model,
    temperature: config.oracle.temperature,
    topP: config.oracle.topP,
  });
  const translator = new IntentTranslator({
    oracle,
    timeoutMs: config.oracle.timeoutSeconds * 1000,
    maxAttempts: config.oracle.maxAttempts,
    confidenceThreshold: config.oracle.confidenceThreshold,
  });
  const gatekeeper = new ExecutionGatekeeper({
    policyStore,
    translator,
    channel,
    audit,
    confirmationTimeoutMs: config.confirmation.timeoutSeconds * 1000,
  });

  return { config, policyStore, audit, oracle, gatekeeper };
}
