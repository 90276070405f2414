import assert from 'node:assert/strict';
import { Writable } from 'node:stream';
import { test } from '../testHarness';
import { createLogger, logManager } from '../../src/shared/logging/logger';

function captureStream(lines: string[]): Writable {
  return new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
}

async function withCapturedLogs(
  options: { level: 'debug' | 'info'; json: boolean },
  fn: (out: string[], err: string[]) => void,
): Promise<void> {
  const previous = logManager.level;
  const out: string[] = [];
  const err: string[] = [];
  logManager.configure({ ...options, stdout: captureStream(out), stderr: captureStream(err) });
  try {
    fn(out, err);
  } finally {
    logManager.configure({ level: previous, json: false, stdout: process.stdout, stderr: process.stderr });
  }
}

test('log lines carry scopes and sorted context', async () => {
  await withCapturedLogs({ level: 'info', json: false }, (out, err) => {
    const log = createLogger('Test', 'Unit').child('Sub');
    log.debug('hidden');
    log.info('hello', { b: 'x y', a: 1, skip: undefined });
    log.error('broken', { cause: new Error('bad thing') });

    assert.equal(out.length, 1);
    assert.match(out[0] ?? '', /^\[[^\]]+\]\[INFO\]\[Test\|Unit\|Sub\] \[a=1 b="x y"\] hello\n$/);
    assert.match(err[0] ?? '', /\[ERROR\]\[Test\|Unit\|Sub\] \[cause="bad thing"\] broken\n$/);
  });
});

test('json log lines are machine readable', async () => {
  await withCapturedLogs({ level: 'debug', json: true }, (out) => {
    createLogger('Test').debug('careful', { n: 2 });

    const parsed: unknown = JSON.parse(out[0] ?? '');
    assert.ok(typeof parsed === 'object' && parsed !== null);
    assert.deepEqual({ ...parsed, timestamp: 'ts' }, {
      timestamp: 'ts',
      level: 'debug',
      scopes: ['Test'],
      message: 'careful',
      context: { n: 2 },
    });
  });
});
