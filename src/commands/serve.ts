/**
 * navbuddy serve: HTTP gateway
 *
 * Confirmations wait in memory until an approver answers them through
 * POST /api/v1/confirmations/:id or the confirmation window closes.
 */

import { PendingConfirmations } from '../channels/pending.js';
import { loadConfig } from '../config/config.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { createGatewayServer } from '../server/server.js';
import { exitWithError } from './output.js';

interface ServeOptions {
  port?: string;
  host?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  const pending = new PendingConfirmations();
  let runtime: Runtime;
  try {
    runtime = createRuntime(loadConfig(), pending);
  } catch (err) {
    exitWithError(err);
  }

  const { config } = runtime;
  const port = options.port ? Number.parseInt(options.port, 10) : config.server.port;
  const host = options.host ?? config.server.host;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    console.error(`  ❌ Invalid port: ${options.port}`);
    process.exit(1);
  }

  pending.onRequest((request) => {
    console.log(`  [server] Confirmation ${request.id} pending: ${request.summary}`);
  });

  const { app } = createGatewayServer({
    gatekeeper: runtime.gatekeeper,
    pending,
    policyStore: runtime.policyStore,
    audit: runtime.audit,
    apiKey: config.server.apiKey,
  });

  const server = app.listen(port, host, () => {
    console.log('');
    console.log('  🧭 navbuddy gateway');
    console.log(`  Listening: http://${host}:${port}`);
    console.log(`  Model:     ${config.oracle.model} @ ${config.oracle.url}`);
    console.log(`  Auth:      ${config.server.apiKey ? 'API key required' : 'none (bind to localhost only)'}`);
    console.log(`  Audit:     ${runtime.audit.path}`);
    console.log('');
  });

  process.once('SIGINT', () => {
    console.log('\n  Shutting down...');
    server.close(() => process.exit(0));
  });
}
