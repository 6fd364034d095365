/**
 * Logger Tests
 *
 * Tests:
 * - Respects the level threshold (silent, errors, warnings, info, debug)
 * - Context is appended as JSON
 * - FileLogger writes timestamped lines
 * - MultiLogger fans out to every logger
 * - createLogger() factory
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { existsSync, readFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  formatMessage,
  type Logger,
} from '@rewright/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface Captured {
  method: string;
  line: string;
}

/**
 * Replaces console methods and records what they receive.
 */
function captureConsole(): { logs: Captured[]; restore: () => void } {
  const logs: Captured[] = [];
  const original = {
    error: console.error,
    warn: console.warn,
    info: console.info,
    debug: console.debug,
  };
  console.error = (line: string) => { logs.push({ method: 'error', line }); };
  console.warn = (line: string) => { logs.push({ method: 'warn', line }); };
  console.info = (line: string) => { logs.push({ method: 'info', line }); };
  console.debug = (line: string) => { logs.push({ method: 'debug', line }); };
  return {
    logs,
    restore() {
      console.error = original.error;
      console.warn = original.warn;
      console.info = original.info;
      console.debug = original.debug;
    },
  };
}

function emitAll(logger: Logger): void {
  logger.error('e');
  logger.warn('w');
  logger.info('i');
  logger.debug('d');
  logger.trace('t');
}

// =============================================================================
// TESTS: formatMessage
// =============================================================================

describe('formatMessage', () => {
  it('should return the message alone without context', () => {
    assert.strictEqual(formatMessage('Unit processed'), 'Unit processed');
    assert.strictEqual(formatMessage('Unit processed', {}), 'Unit processed');
  });

  it('should append context as JSON', () => {
    assert.strictEqual(
      formatMessage('Unit processed', { file: 'a.ts', changed: true }),
      'Unit processed {"file":"a.ts","changed":true}'
    );
  });

  it('should replace circular references', () => {
    const context: Record<string, unknown> = { name: 'x' };
    context.self = context;
    assert.strictEqual(formatMessage('m', context), 'm {"name":"x","self":"[Circular]"}');
  });
});

// =============================================================================
// TESTS: ConsoleLogger
// =============================================================================

describe('ConsoleLogger', () => {
  let capture: ReturnType<typeof captureConsole>;

  beforeEach(() => {
    capture = captureConsole();
  });

  afterEach(() => {
    capture.restore();
  });

  it('should print nothing at silent', () => {
    emitAll(new ConsoleLogger('silent'));
    assert.deepStrictEqual(capture.logs, []);
  });

  it('should print only errors at errors', () => {
    emitAll(new ConsoleLogger('errors'));
    assert.deepStrictEqual(capture.logs, [{ method: 'error', line: '[ERROR] e' }]);
  });

  it('should print errors and warnings at warnings', () => {
    emitAll(new ConsoleLogger('warnings'));
    assert.deepStrictEqual(capture.logs.map(l => l.line), ['[ERROR] e', '[WARN] w']);
  });

  it('should default to info', () => {
    emitAll(new ConsoleLogger());
    assert.deepStrictEqual(capture.logs.map(l => l.line), ['[ERROR] e', '[WARN] w', '[INFO] i']);
  });

  it('should route debug and trace to console.debug at debug', () => {
    emitAll(new ConsoleLogger('debug'));
    assert.deepStrictEqual(capture.logs.slice(3), [
      { method: 'debug', line: '[DEBUG] d' },
      { method: 'debug', line: '[TRACE] t' },
    ]);
  });

  it('should include context', () => {
    new ConsoleLogger('info').warn('Unit skipped', { file: 'broken.ts' });
    assert.deepStrictEqual(capture.logs, [{ method: 'warn', line: '[WARN] Unit skipped {"file":"broken.ts"}' }]);
  });
});

// =============================================================================
// TESTS: FileLogger and MultiLogger
// =============================================================================

describe('FileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `rewright-logger-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write timestamped lines at or above the threshold', async () => {
    const file = join(dir, 'nested', 'run.log');
    const logger = new FileLogger('warnings', file);
    emitAll(logger);
    await logger.close();

    const lines = readFileSync(file, 'utf-8').trim().split('\n');
    assert.strictEqual(lines.length, 2);
    assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T.* \[ERROR\] e$/);
    assert.match(lines[1], /^\d{4}-\d{2}-\d{2}T.* \[WARN\] w$/);
  });

  it('should refuse a directory as log file', () => {
    assert.throws(() => new FileLogger('info', dir), /is a directory/);
  });
});

describe('MultiLogger and createLogger', () => {
  it('should forward every call to every logger', () => {
    const seen: string[] = [];
    const recorder = (name: string): Logger => ({
      error: (m) => { seen.push(`${name}:${m}`); },
      warn: (m) => { seen.push(`${name}:${m}`); },
      info: (m) => { seen.push(`${name}:${m}`); },
      debug: (m) => { seen.push(`${name}:${m}`); },
      trace: (m) => { seen.push(`${name}:${m}`); },
    });
    const logger = new MultiLogger([recorder('a'), recorder('b')]);
    logger.info('x');
    logger.trace('y');
    assert.deepStrictEqual(seen, ['a:x', 'b:x', 'a:y', 'b:y']);
  });

  it('should return a ConsoleLogger without a log file', () => {
    assert.ok(createLogger('info') instanceof ConsoleLogger);
  });

  it('should return a MultiLogger with a log file', async () => {
    const dir = join(tmpdir(), `rewright-factory-${Date.now()}`);
    const logger = createLogger('silent', { logFile: join(dir, 'debug.log') });
    assert.ok(logger instanceof MultiLogger);
    logger.debug('captured');
    if (logger instanceof MultiLogger) await logger.close();
    assert.ok(existsSync(join(dir, 'debug.log')));
    assert.match(readFileSync(join(dir, 'debug.log'), 'utf-8'), /\[DEBUG\] captured/);
    rmSync(dir, { recursive: true, force: true });
  });
});
