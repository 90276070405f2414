import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { stopWithTimeout } from '../../src/runtime/stopWithTimeout';

type LogEntry = {
  level: 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
};

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function createTestLogger() {
  const entries: LogEntry[] = [];
  const log = {
    info: (message: string, data?: Record<string, unknown>) => {
      entries.push({ level: 'info', message, data });
    },
    warn: (message: string, data?: Record<string, unknown>) => {
      entries.push({ level: 'warn', message, data });
    },
    error: (message: string, data?: Record<string, unknown>) => {
      entries.push({ level: 'error', message, data });
    },
  };
  return { log, entries };
}

test('stopWithTimeout logs stopped on clean shutdown', async () => {
  const { log, entries } = createTestLogger();
  const result = await stopWithTimeout('monitor', async () => {
    await delay(5);
  }, 50, log);

  assert.equal(result.kind, 'stopped');
  assert.ok(entries.some((entry) => entry.level === 'info' && entry.message === 'service monitor stopped'));
  assert.equal(entries.some((entry) => entry.level === 'warn'), false);
  assert.equal(entries.some((entry) => entry.level === 'error'), false);
});

test('stopWithTimeout logs timeout without clean stop', async () => {
  const { log, entries } = createTestLogger();
  const result = await stopWithTimeout('monitor', async () => {
    await delay(30);
  }, 5, log);

  assert.equal(result.kind, 'timeout');
  await delay(40);

  const warn = entries.find((entry) => entry.level === 'warn');
  assert.ok(warn);
  assert.equal(warn?.message, 'service monitor stop timed out');
  assert.deepEqual(warn?.data, { timeoutMs: 5 });
  assert.equal(entries.some((entry) => entry.level === 'info'), false);
});

test('stopWithTimeout logs errors on failure', async () => {
  const { log, entries } = createTestLogger();
  const result = await stopWithTimeout('monitor', async () => {
    throw new Error('device unreachable');
  }, 50, log);

  assert.equal(result.kind, 'error');
  const error = entries.find((entry) => entry.level === 'error');
  assert.ok(error);
  assert.equal(error?.message, 'failed to stop monitor');
  assert.deepEqual(error?.data, { message: 'device unreachable' });
  assert.equal(entries.some((entry) => entry.level === 'info'), false);
  assert.equal(entries.some((entry) => entry.level === 'warn'), false);
});
