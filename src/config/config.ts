/**
 * navbuddy configuration
 *
 * Files live in NAVBUDDY_HOME (default ~/.navbuddy):
 *   config.yml   oracle, confirmation, audit and server settings
 *   policy.yml   sandbox policy (see policy/parser.ts)
 *
 * Environment overrides:
 *   NAVBUDDY_OLLAMA_URL   oracle.url
 *   NAVBUDDY_MODEL        oracle.model
 *   NAVBUDDY_API_KEY      server.api_key
 *   NAVBUDDY_PORT         server.port
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { ConfigurationError } from '../core/errors.js';
import { expandHome } from '../policy/parser.js';

export const CHANNEL_TYPES = ['prompt', 'webhook', 'deny'] as const;
export type ChannelType = typeof CHANNEL_TYPES[number];

export interface NavigatorConfig {
  home: string;
  policyPath: string;
  oracle: {
    url: string;
    model: string;
    timeoutSeconds: number;
    temperature: number;
    topP: number;
    maxAttempts: number;
    confidenceThreshold: number;
  };
  confirmation: {
    channel: ChannelType;
    timeoutSeconds: number;
    webhook?: { url: string; secret?: string };
  };
  audit: { path: string };
  server: { host: string; port: number; apiKey?: string };
}

/** config.yml as written on disk. */
export interface ConfigFile {
  policy?: string;
  oracle?: {
    url?: string;
    model?: string;
    timeout_seconds?: number;
    temperature?: number;
    top_p?: number;
    max_attempts?: number;
    confidence_threshold?: number;
  };
  confirmation?: {
    channel?: string;
    timeout_seconds?: number;
    webhook?: { url?: string; secret?: string };
  };
  audit?: { path?: string };
  server?: { host?: string; port?: number; api_key?: string };
}

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';
export const DEFAULT_MODEL = 'llama3.2';

export function navbuddyHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.NAVBUDDY_HOME ? path.resolve(expandHome(env.NAVBUDDY_HOME)) : path.join(os.homedir(), '.navbuddy');
}

export function configFilePath(home: string): string {
  return path.join(home, 'config.yml');
}

export function defaultConfigFile(home: string): ConfigFile {
  return {
    policy: path.join(home, 'policy.yml'),
    oracle: {
      url: DEFAULT_OLLAMA_URL,
      model: DEFAULT_MODEL,
      timeout_seconds: 60,
      temperature: 0.2,
      top_p: 0.9,
      max_attempts: 3,
      confidence_threshold: 0.7,
    },
    confirmation: {
      channel: 'prompt',
      timeout_seconds: 120,
    },
    audit: { path: path.join(home, 'audit.jsonl') },
    server: { host: '127.0.0.1', port: 7341 },
  };
}

/**
 * Load config.yml from `home`. A missing file means defaults; an invalid
 * one throws ConfigurationError listing every problem.
 */
export function loadConfig(options: { home?: string; env?: NodeJS.ProcessEnv } = {}): NavigatorConfig {
  const env = options.env ?? process.env;
  const home = options.home ?? navbuddyHome(env);
  const file = configFilePath(home);

  let raw: unknown = {};
  if (fs.existsSync(file)) {
    try {
      raw = yamlParse(fs.readFileSync(file, 'utf-8')) ?? {};
    } catch (err) {
      throw new ConfigurationError([`YAML syntax error: ${(err as Error).message}`], file);
    }
  }
  return resolveConfig(raw, home, env, file);
}

export function resolveConfig(raw: unknown, home: string, env: NodeJS.ProcessEnv = {}, source?: string): NavigatorConfig {
  const problems: string[] = [];
  const root = section(raw, '', problems);

  const oracle = section(root.oracle, 'oracle', problems);
  const confirmation = section(root.confirmation, 'confirmation', problems);
  const audit = section(root.audit, 'audit', problems);
  const server = section(root.server, 'server', problems);

  const channel = str(confirmation.channel, 'confirmation.channel', problems) ?? 'prompt';
  if (!isChannelType(channel)) {
    problems.push(`confirmation.channel: must be one of ${CHANNEL_TYPES.join(', ')}`);
  }

  let webhook: NavigatorConfig['confirmation']['webhook'];
  if (confirmation.webhook !== undefined) {
    const hook = section(confirmation.webhook, 'confirmation.webhook', problems);
    const url = str(hook.url, 'confirmation.webhook.url', problems);
    const secret = str(hook.secret, 'confirmation.webhook.secret', problems);
    if (url) webhook = secret ? { url, secret } : { url };
  }
  if (channel === 'webhook' && !webhook) {
    problems.push('confirmation.webhook.url is required when confirmation.channel is webhook');
  }

  const portOverride = env.NAVBUDDY_PORT ? Number(env.NAVBUDDY_PORT) : undefined;
  if (portOverride !== undefined && !isPort(portOverride)) {
    problems.push(`NAVBUDDY_PORT: "${env.NAVBUDDY_PORT}" is not a valid port`);
  }
  const port = portOverride ?? num(server.port, 'server.port', problems) ?? 7341;
  if (!isPort(port)) {
    problems.push(`server.port: ${port} is not a valid port`);
  }

  const config: NavigatorConfig = {
    home,
    policyPath: path.resolve(home, expandHome(str(root.policy, 'policy', problems) ?? path.join(home, 'policy.yml'))),
    oracle: {
      url: env.NAVBUDDY_OLLAMA_URL || (str(oracle.url, 'oracle.url', problems) ?? DEFAULT_OLLAMA_URL),
      model: env.NAVBUDDY_MODEL || (str(oracle.model, 'oracle.model', problems) ?? DEFAULT_MODEL),
      timeoutSeconds: positive(oracle.timeout_seconds, 'oracle.timeout_seconds', problems, 60),
      temperature: ranged(oracle.temperature, 'oracle.temperature', problems, 0, 2, 0.2),
      topP: ranged(oracle.top_p, 'oracle.top_p', problems, 0, 1, 0.9),
      maxAttempts: positive(oracle.max_attempts, 'oracle.max_attempts', problems, 3),
      confidenceThreshold: ranged(oracle.confidence_threshold, 'oracle.confidence_threshold', problems, 0, 1, 0.7),
    },
    confirmation: {
      channel: isChannelType(channel) ? channel : 'prompt',
      timeoutSeconds: positive(confirmation.timeout_seconds, 'confirmation.timeout_seconds', problems, 120),
      ...(webhook ? { webhook } : {}),
    },
    audit: {
      path: path.resolve(home, expandHome(str(audit.path, 'audit.path', problems) ?? 'audit.jsonl')),
    },
    server: {
      host: str(server.host, 'server.host', problems) ?? '127.0.0.1',
      port,
    },
  };

  const apiKey = env.NAVBUDDY_API_KEY || str(server.api_key, 'server.api_key', problems);
  if (apiKey) config.server.apiKey = apiKey;

  if (problems.length > 0) {
    throw new ConfigurationError(problems, source);
  }
  return config;
}

function isChannelType(value: string): value is ChannelType {
  return CHANNEL_TYPES.some(t => t === value);
}

function isPort(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= 65535;
}

function section(value: unknown, name: string, problems: string[]): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  problems.push(`${name || 'config'}: must be a mapping`);
  return {};
}

function str(value: unknown, name: string, problems: string[]): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  problems.push(`${name}: must be a non-empty string`);
  return undefined;
}

function num(value: unknown, name: string, problems: string[]): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  problems.push(`${name}: must be a number`);
  return undefined;
}

function positive(value: unknown, name: string, problems: string[], fallback: number): number {
  const n = num(value, name, problems);
  if (n === undefined) return fallback;
  if (!Number.isInteger(n) || n <= 0) {
    problems.push(`${name}: must be a positive integer`);
    return fallback;
  }
  return n;
}

function ranged(value: unknown, name: string, problems: string[], min: number, max: number, fallback: number): number {
  const n = num(value, name, problems);
  if (n === undefined) return fallback;
  if (n < min || n > max) {
    problems.push(`${name}: must be between ${min} and ${max}`);
    return fallback;
  }
  return n;
}
