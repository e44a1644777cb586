import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigError, loadConfig } from '../src/config/env.js';

describe('loadConfig', () => {
  it('applies defaults and falls back to local embeddings without an OpenAI key', () => {
    const cfg = loadConfig({});
    assert.strictEqual(cfg.port, 5000);
    assert.deepStrictEqual(cfg.polygon, { apiKey: '', baseUrl: 'https://api.polygon.io', rateLimitRpm: 5, timeoutMs: 10000 });
    assert.deepStrictEqual(cfg.rag, { embeddings: 'local', embedDim: 512 });
    assert.deepStrictEqual(cfg.agent, { maxIterations: 5, historyTurns: 40 });
    assert.strictEqual(cfg.conversations.ttlMs, 24 * 60 * 60 * 1000);
  });

  it('treats empty values as unset and trims the base url', () => {
    const cfg = loadConfig({ PORT: '', OPENAI_API_KEY: 'test-secret', POLYGON_BASE_URL: 'http://localhost:9999/' });
    assert.strictEqual(cfg.port, 5000);
    assert.strictEqual(cfg.rag.embeddings, 'openai');
    assert.strictEqual(cfg.polygon.baseUrl, 'http://localhost:9999');
  });

  it('lets RAG_EMBEDDINGS override the default', () => {
    assert.strictEqual(loadConfig({ OPENAI_API_KEY: 'test-secret', RAG_EMBEDDINGS: 'local' }).rag.embeddings, 'local');
  });

  it('reports every invalid variable', () => {
    assert.throws(
      () => loadConfig({ PORT: 'abc', AGENT_MAX_ITERATIONS: '0' }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.strictEqual(err.issues.length, 2);
        assert.match(err.issues[0] ?? '', /^PORT: /);
        assert.match(err.issues[1] ?? '', /^AGENT_MAX_ITERATIONS: /);
        return true;
      }
    );
  });
});
