import { afterEach, beforeEach, describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { logger } from '../src/utils/logger.js';

describe('logger', () => {
  const saved = process.env.LOG_LEVEL;
  let lines: string[] = [];

  beforeEach(() => {
    lines = [];
    for (const method of ['log', 'warn', 'error'] as const) {
      mock.method(console, method, (line: string) => {
        lines.push(line);
      });
    }
  });

  afterEach(() => {
    mock.restoreAll();
    if (saved === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = saved;
  });

  it('drops lines below the configured level', () => {
    process.env.LOG_LEVEL = 'error';
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error({ code: 'X' }, 'd');
    assert.strictEqual(lines.length, 1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    assert.ok(typeof entry === 'object' && entry !== null);
    assert.strictEqual(Reflect.get(entry, 'level'), 'error');
    assert.strictEqual(Reflect.get(entry, 'msg'), 'd');
    assert.strictEqual(Reflect.get(entry, 'code'), 'X');
  });

  it('logs info and above by default', () => {
    delete process.env.LOG_LEVEL;
    logger.debug('hidden');
    logger.info('shown');
    logger.warn('shown too');
    assert.strictEqual(lines.length, 2);
  });

  it('passes debug lines when asked for them', () => {
    process.env.LOG_LEVEL = 'DEBUG';
    logger.child({ requestId: 'r1' }).debug('details');
    assert.strictEqual(lines.length, 1);
    assert.match(lines[0] ?? '', /"requestId":"r1"/);
  });
});
