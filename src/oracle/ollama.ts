/**
 * Ollama client
 *
 * Talks to a local Ollama server over its HTTP API using the built-in fetch.
 *   GET  /api/tags       installed models
 *   POST /api/generate   one non-streaming completion, constrained by `format`
 */

import { OracleError } from '../core/errors.js';
import { isRecord } from './extract.js';
import type { Oracle, OracleRequest } from './types.js';

export interface OllamaOptions {
  url: string;
  model: string;
  temperature?: number;
  topP?: number;
}

export class OllamaOracle implements Oracle {
  readonly name = 'ollama';
  private baseUrl: string;
  private model: string;
  private temperature: number;
  private topP: number;

  constructor(options: OllamaOptions) {
    this.baseUrl = options.url.replace(/\/$/, '');
    this.model = options.model;
    this.temperature = options.temperature ?? 0.2;
    this.topP = options.topP ?? 0.9;
  }

  get modelName(): string {
    return this.model;
  }

  async generate(request: OracleRequest, signal: AbortSignal): Promise<string> {
    console.log(`  [oracle] ${this.model}: generating (${request.prompt.length} chars of prompt)`);
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          system: request.system,
          prompt: request.prompt,
          stream: false,
          format: request.schema,
          options: {
            temperature: this.temperature,
            top_p: this.topP,
          },
        }),
        signal,
      });
    } catch (err) {
      throw new OracleError(`Could not reach Ollama at ${this.baseUrl}: ${(err as Error).message}`, err);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new OracleError(`Ollama error (${res.status}): ${text.slice(0, 200)}`);
    }

    const body: unknown = await res.json();
    if (!isRecord(body)) return '';
    if (typeof body.error === 'string') {
      throw new OracleError(`Ollama error: ${body.error}`);
    }
    return typeof body.response === 'string' ? body.response : '';
  }

  async listModels(timeoutMs = 5000): Promise<string[]> {
    const res = await this.get('/api/tags', timeoutMs);
    const body: unknown = await res.json();
    const models: unknown[] = isRecord(body) && Array.isArray(body.models) ? body.models : [];
    return models
      .map(m => (isRecord(m) ? m.name : undefined))
      .filter((name): name is string => typeof name === 'string');
  }

  async isAvailable(timeoutMs = 2000): Promise<boolean> {
    try {
      await this.get('/api/tags', timeoutMs);
      return true;
    } catch {
      return false;
    }
  }

  private async get(pathname: string, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(`${this.baseUrl}${pathname}`, { signal: controller.signal });
      if (!res.ok) {
        throw new OracleError(`Ollama error (${res.status}) on ${pathname}`);
      }
      return res;
    } catch (err) {
      if (err instanceof OracleError) throw err;
      throw new OracleError(`Could not reach Ollama at ${this.baseUrl}: ${(err as Error).message}`, err);
    } finally {
      clearTimeout(timer);
    }
  }
}
