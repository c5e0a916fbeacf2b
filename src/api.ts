/**
 * Library entry point: the pipeline without the CLI.
 */

export { PolicyParser, type Policy, type PolicyFile } from './policy/parser.js';
export { PolicyStore } from './policy/store.js';
export { compileGlob, globMatch, type GlobMatcher } from './policy/glob.js';
export { resolvePath, type ResolveOptions } from './core/resolver.js';
export { IntentTranslator, interpretPlan, type TranslatorOptions } from './core/translator.js';
export { ExecutionGatekeeper, validateProposal, type GatekeeperOptions, type StateChange } from './core/gatekeeper.js';
export { FileOperations, type OperationLimits } from './core/operations.js';
export { PathLockTable } from './core/locks.js';
export { NavigationSession } from './core/session.js';
export { StaticChannel, WebhookChannel, type ConfirmationChannel, type ConfirmationRequest } from './core/channel.js';
export { PendingConfirmations } from './channels/pending.js';
export { TerminalChannel, createChannel } from './channels/terminal.js';
export { FileAuditLog, readAuditEntries, verifyAuditFile, type AuditLog } from './audit/logger.js';
export { OllamaOracle } from './oracle/ollama.js';
export type { Oracle, OracleRequest } from './oracle/types.js';
export { createGatewayServer, type GatewayConfig } from './server/server.js';
export { loadConfig, resolveConfig, type NavigatorConfig } from './config/config.js';
export { createRuntime, type Runtime } from './runtime.js';
export * from './core/errors.js';
export * from './core/types.js';
