/**
 * navbuddy Gateway: REST API Server
 *
 * Express-based REST API in front of the execution gatekeeper.
 * Requests are held open while their confirmation is pending; an approver
 * settles it through the confirmations endpoints.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { ConfigurationError } from '../core/errors.js';
import { PolicyParser } from '../policy/parser.js';
import { isRecord } from '../oracle/extract.js';
import type { ExecutionGatekeeper } from '../core/gatekeeper.js';
import type { PendingConfirmations } from '../channels/pending.js';
import type { FileAuditLog } from '../audit/logger.js';
import type { PolicyStore } from '../policy/store.js';

export const GATEWAY_VERSION = '0.1.0';

export interface GatewayConfig {
  gatekeeper: ExecutionGatekeeper;
  /** Channel the gatekeeper confirms through; settled by POST /api/v1/confirmations/:id. */
  pending: PendingConfirmations;
  policyStore: PolicyStore;
  audit: FileAuditLog;
  /** API key for authentication (if set, all /api requests must include it) */
  apiKey?: string;
}

const DEFAULT_AUDIT_LIMIT = 20;
const MAX_AUDIT_LIMIT = 500;

export function createGatewayServer(config: GatewayConfig) {
  const { gatekeeper, pending, policyStore, audit } = config;
  const app = express();
  app.use(cors());
  app.use(express.json());

  // ─── Auth Middleware ────────────────────────────────────────────
  const authenticate = (req: Request, res: Response, next: NextFunction): void => {
    if (!config.apiKey) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || authHeader !== `Bearer ${config.apiKey}`) {
      res.status(401).json({ error: 'Unauthorized', message: 'Invalid or missing API key' });
      return;
    }
    next();
  };

  // ─── Health Check ──────────────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: GATEWAY_VERSION,
      uptime: process.uptime(),
      policy_version: policyStore.version,
      pending_confirmations: pending.list().length,
    });
  });

  // ─── Requests ──────────────────────────────────────────────────

  /**
   * POST /api/v1/requests
   * Run one natural-language request through the gatekeeper.
   */
  app.post('/api/v1/requests', authenticate, (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.text !== 'string' || body.text.trim() === '') {
      res.status(400).json({ error: 'Bad Request', message: 'Missing required field: text' });
      return;
    }
    if (body.cwd !== undefined && typeof body.cwd !== 'string') {
      res.status(400).json({ error: 'Bad Request', message: 'cwd must be a string' });
      return;
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const cwd = typeof body.cwd === 'string' ? body.cwd : policyStore.current().roots[0];
    gatekeeper
      .submit(body.text, { context: { cwd, recentListings: [] }, signal: controller.signal })
      .then(result => {
        if (!res.destroyed) res.json(result);
      })
      .catch(next);
  });

  // ─── Confirmations ─────────────────────────────────────────────

  /**
   * GET /api/v1/confirmations
   * Requests waiting for a human decision.
   */
  app.get('/api/v1/confirmations', authenticate, (_req: Request, res: Response): void => {
    res.json({ confirmations: pending.list() });
  });

  /**
   * POST /api/v1/confirmations/:id
   * Approve or decline a pending request.
   */
  app.post('/api/v1/confirmations/:id', authenticate, (req: Request, res: Response): void => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.approved !== 'boolean') {
      res.status(400).json({ error: 'Bad Request', message: 'Missing required field: approved (boolean)' });
      return;
    }
    const reason = typeof body.reason === 'string' ? body.reason : undefined;
    const decision = reason === undefined ? { approved: body.approved } : { approved: body.approved, reason };

    if (!pending.respond(req.params.id, decision)) {
      res.status(404).json({
        error: 'Not Found',
        message: `No pending confirmation ${req.params.id} (unknown, expired or already decided)`,
      });
      return;
    }
    res.json({ id: req.params.id, approved: body.approved });
  });

  // ─── Audit ─────────────────────────────────────────────────────

  /**
   * GET /api/v1/audit
   * Most recent audit entries and the state of the hash chain.
   */
  app.get('/api/v1/audit', authenticate, (req: Request, res: Response): void => {
    let limit = DEFAULT_AUDIT_LIMIT;
    if (req.query.limit !== undefined) {
      const parsed = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : Number.NaN;
      if (!Number.isInteger(parsed) || parsed < 1) {
        res.status(400).json({ error: 'Bad Request', message: 'limit must be a positive integer' });
        return;
      }
      limit = Math.min(parsed, MAX_AUDIT_LIMIT);
    }

    const chain = audit.verifyChain();
    res.json({
      entries: audit.tail(limit),
      chain_valid: chain.valid,
      chain_length: chain.eventCount,
      ...(chain.error ? { chain_error: chain.error } : {}),
    });
  });

  // ─── Policy ────────────────────────────────────────────────────

  /**
   * GET /api/v1/policy
   * The policy snapshot in effect.
   */
  app.get('/api/v1/policy', authenticate, (_req: Request, res: Response): void => {
    res.json({ version: policyStore.version, policy: PolicyParser.describe(policyStore.current()) });
  });

  /**
   * POST /api/v1/policy/reload
   * Re-read the policy file. On failure the current snapshot stays in effect.
   */
  app.post('/api/v1/policy/reload', authenticate, (_req: Request, res: Response): void => {
    try {
      const policy = policyStore.reload();
      res.json({ status: 'reloaded', version: policyStore.version, policy: PolicyParser.describe(policy) });
    } catch (err) {
      if (err instanceof ConfigurationError) {
        res.status(422).json({ error: 'Unprocessable Entity', message: err.message, problems: err.problems });
        return;
      }
      res.status(400).json({ error: 'Bad Request', message: (err as Error).message });
    }
  });

  // ─── Error Handler ─────────────────────────────────────────────

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('  [server] Unhandled error:', err);
    res.status(500).json({
      error: 'Internal Server Error',
      message: err.message,
    });
  });

  return { app };
}
