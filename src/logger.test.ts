import test, { mock } from 'node:test';
import assert from 'node:assert/strict';
import chalk from 'chalk';
import { DelegateLogger, formatEntry } from './logger.js';
import type { LogEntry } from './types.js';

chalk.level = 0;

test('DelegateLogger: disabled until console output or a subscriber is present', () => {
  const log = new DelegateLogger();
  log.setConsoleOutputEnabled(false);
  assert.equal(log.enabled, false);

  const stop = log.subscribe(() => {});
  assert.equal(log.enabled, true);
  stop();
  assert.equal(log.enabled, false);

  log.setConsoleOutputEnabled(true);
  assert.equal(log.enabled, true);
});

test('DelegateLogger: log materializes id and timestamp and fans out to subscribers', () => {
  const log = new DelegateLogger();
  log.setConsoleOutputEnabled(false);
  const seen: LogEntry[] = [];
  log.subscribe((entry) => seen.push(entry));

  const entry = log.log({ type: 'ADD', delegate: 'd', content: 'hello' });

  assert.equal(seen.length, 1);
  assert.equal(seen[0], entry);
  assert.match(entry.id, /^[0-9a-f-]{36}$/);
  assert.ok(!Number.isNaN(Date.parse(entry.timestamp)));
});

test('DelegateLogger: a throwing subscriber does not stop the others', () => {
  const log = new DelegateLogger();
  log.setConsoleOutputEnabled(false);
  const seen: string[] = [];
  log.subscribe(() => {
    throw new Error('sink failed');
  });
  log.subscribe((entry) => seen.push(entry.content));

  assert.doesNotThrow(() => log.log({ type: 'SYSTEM', content: 'still delivered' }));
  assert.deepEqual(seen, ['still delivered']);
});

test('DelegateLogger: console output honours the type filter', () => {
  const log = new DelegateLogger();
  log.setConsoleOutputEnabled(true);
  log.setConsoleTypes(['EVICT']);
  const printed = mock.method(console, 'log', () => {});
  try {
    log.log({ type: 'ADD', content: 'skipped' });
    log.log({ type: 'EVICT', delegate: 'd', content: 'printed' });
  } finally {
    printed.mock.restore();
  }

  assert.equal(printed.mock.callCount(), 1);
  const line = printed.mock.calls[0]?.arguments[0];
  assert.equal(typeof line, 'string');
  assert.match(String(line), /^\[\d{2}:\d{2}:\d{2}\] \[EVICT\] <d>: printed$/);
});

test('formatEntry: renders time, type, delegate label and content', () => {
  const base = { id: 'x', timestamp: '2026-01-02T03:04:05.678Z', content: 'hello' };

  assert.equal(formatEntry({ ...base, type: 'ADD', delegate: 'ticks' }), '[03:04:05] [ADD] <ticks>: hello');
  assert.equal(formatEntry({ ...base, type: 'SYSTEM' }), '[03:04:05] [SYSTEM]: hello');
});
