import test from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, parseLogThreshold, type LogThreshold } from '../src/core/log';

function capture(level: LogThreshold) {
  const lines: Array<Record<string, unknown>> = [];
  const log = createLogger({ component: 'test' }, {
    level,
    sink: (line) => {
      const parsed: unknown = JSON.parse(line);
      assert.ok(typeof parsed === 'object' && parsed !== null);
      lines.push({ ...parsed });
    },
  });
  return { log, lines };
}

test('thresholds are read leniently', () => {
  assert.equal(parseLogThreshold('WARN'), 'warn');
  assert.equal(parseLogThreshold(' off '), 'silent');
  assert.equal(parseLogThreshold('0'), 'silent');
  assert.equal(parseLogThreshold('verbose'), 'info');
  assert.equal(parseLogThreshold(undefined), 'info');
});

test('records below the threshold are dropped', () => {
  const { log, lines } = capture('warn');
  log.info('ignored');
  log.warn('kept', { file: 'A.v' });
  assert.equal(lines.length, 1);
  assert.equal(lines[0].level, 'warn');
  assert.equal(lines[0].msg, 'kept');
  assert.equal(lines[0].component, 'test');
  assert.equal(lines[0].file, 'A.v');
});

test('silent drops everything', () => {
  const { log, lines } = capture('silent');
  log.error('nothing');
  assert.equal(lines.length, 0);
});

test('children add fields and keep the sink', () => {
  const { log, lines } = capture('debug');
  log.child({ cmd: 'analyze' }).debug('step');
  assert.equal(lines.length, 1);
  assert.equal(lines[0].component, 'test');
  assert.equal(lines[0].cmd, 'analyze');
});

test('spans log duration and summarized results', async () => {
  const { log, lines } = capture('info');
  const out = await log.span('scan', { files: 2 }, async () => [1, 2, 3], (xs) => ({ count: xs.length }));
  assert.deepEqual(out, [1, 2, 3]);
  assert.equal(lines[0].msg, 'scan');
  assert.equal(lines[0].ok, true);
  assert.equal(lines[0].files, 2);
  assert.equal(lines[0].count, 3);
  assert.equal(typeof lines[0].duration_ms, 'number');
});

test('failed spans log at error and rethrow', async () => {
  const { log, lines } = capture('info');
  await assert.rejects(
    log.span('scan', {}, async () => {
      throw new Error('boom');
    }),
    /boom/,
  );
  assert.equal(lines[0].level, 'error');
  assert.equal(lines[0].ok, false);
  const err = lines[0].err;
  assert.ok(typeof err === 'object' && err !== null);
  assert.deepEqual(Object.keys(err).sort(), ['message', 'name', 'stack']);
});
