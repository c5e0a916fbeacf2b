import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import http from 'node:http';
import { OllamaOracle } from '../oracle/ollama.js';
import { OracleError } from '../core/errors.js';

describe('OllamaOracle', () => {
  let server: http.Server;
  let url: string;
  let received: { path: string; body: string }[];
  let reply: { status: number; body: unknown };

  beforeEach(async () => {
    received = [];
    reply = { status: 200, body: {} };
    server = http.createServer((req, res) => {
      let body = '';
      req.on('data', (chunk) => { body += chunk; });
      req.on('end', () => {
        received.push({ path: req.url ?? '', body });
        res.writeHead(reply.status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(reply.body));
      });
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const addr = server.address();
    url = `http://127.0.0.1:${typeof addr === 'object' && addr !== null ? addr.port : 0}/`;
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('posts a non-streaming generate request', async () => {
    reply = { status: 200, body: { response: '{"confidence": 1}' } };
    const oracle = new OllamaOracle({ url, model: 'llama3.2', temperature: 0.1 });

    const text = await oracle.generate(
      { system: 'sys', prompt: 'User request: list', schema: { type: 'object' } },
      new AbortController().signal,
    );

    assert.equal(text, '{"confidence": 1}');
    assert.equal(received[0].path, '/api/generate');
    const sent = JSON.parse(received[0].body);
    assert.equal(sent.model, 'llama3.2');
    assert.equal(sent.stream, false);
    assert.equal(sent.system, 'sys');
    assert.deepEqual(sent.format, { type: 'object' });
    assert.deepEqual(sent.options, { temperature: 0.1, top_p: 0.9 });
  });

  it('surfaces an error reply', async () => {
    reply = { status: 404, body: { error: 'model "nope" not found' } };
    const oracle = new OllamaOracle({ url, model: 'nope' });
    await assert.rejects(
      oracle.generate({ system: '', prompt: '', schema: {} }, new AbortController().signal),
      (err: unknown) => err instanceof OracleError && err.message === 'Ollama error (404): {"error":"model \\"nope\\" not found"}',
    );
  });

  it('lists installed models', async () => {
    reply = { status: 200, body: { models: [{ name: 'llama3.2:latest' }, { name: 'mistral:7b' }, {}] } };
    const oracle = new OllamaOracle({ url, model: 'llama3.2' });
    assert.deepEqual(await oracle.listModels(), ['llama3.2:latest', 'mistral:7b']);
    assert.equal(received[0].path, '/api/tags');
    assert.equal(await oracle.isAvailable(), true);
  });

  it('reports an unreachable server', async () => {
    const oracle = new OllamaOracle({ url: 'http://127.0.0.1:1', model: 'llama3.2' });
    assert.equal(await oracle.isAvailable(500), false);
    await assert.rejects(
      oracle.generate({ system: '', prompt: '', schema: {} }, new AbortController().signal),
      /Could not reach Ollama at http:\/\/127\.0\.0\.1:1/,
    );
  });
});
