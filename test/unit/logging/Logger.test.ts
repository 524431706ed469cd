/**
 * Logger Tests
 *
 * Tests:
 * - Respects level threshold (silent, errors, warnings, info, debug)
 * - Context is appended as JSON
 * - FileLogger writes timestamped lines
 * - createLogger() / closeLogger()
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';

import { readFileSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  isLogLevel,
  type LogLevel,
} from '@roster/core';

// =============================================================================
// Test Helpers
// =============================================================================

type ConsoleMethod = 'error' | 'warn' | 'info' | 'debug';

interface ConsoleCapture {
  calls: Array<{ method: ConsoleMethod; line: string }>;
  restore: () => void;
}

/**
 * Replaces console methods and records the line each received
 */
function captureConsole(): ConsoleCapture {
  const calls: ConsoleCapture['calls'] = [];
  const methods: ConsoleMethod[] = ['error', 'warn', 'info', 'debug'];
  const mocks = methods.map((method) =>
    mock.method(console, method, (line: string) => {
      calls.push({ method, line });
    })
  );
  return {
    calls,
    restore: () => {
      for (const m of mocks) m.mock.restore();
    },
  };
}

function logAll(logger: ConsoleLogger): void {
  logger.error('e');
  logger.warn('w');
  logger.info('i');
  logger.debug('d');
  logger.trace('t');
}

// =============================================================================
// TESTS: ConsoleLogger
// =============================================================================

describe('ConsoleLogger', () => {
  let output: ConsoleCapture;

  beforeEach(() => {
    output = captureConsole();
  });

  afterEach(() => {
    output.restore();
  });

  const expectedCounts: Record<LogLevel, number> = {
    silent: 0,
    errors: 1,
    warnings: 2,
    info: 3,
    debug: 5,
  };

  for (const [level, expected] of Object.entries(expectedCounts)) {
    it(`should write ${expected} lines at level ${level}`, () => {
      assert.ok(isLogLevel(level));
      logAll(new ConsoleLogger(level));
      assert.strictEqual(output.calls.length, expected);
    });
  }

  it('should route each method to its console method', () => {
    logAll(new ConsoleLogger('debug'));

    assert.deepStrictEqual(output.calls, [
      { method: 'error', line: '[ERROR] e' },
      { method: 'warn', line: '[WARN] w' },
      { method: 'info', line: '[INFO] i' },
      { method: 'debug', line: '[DEBUG] d' },
      { method: 'debug', line: '[TRACE] t' },
    ]);
  });

  it('should append context as JSON', () => {
    new ConsoleLogger('info').info('Server listening', { port: 4000 });

    assert.strictEqual(output.calls[0]?.line, '[INFO] Server listening {"port":4000}');
  });

  it('should not append an empty context', () => {
    new ConsoleLogger('info').info('Ready', {});

    assert.strictEqual(output.calls[0]?.line, '[INFO] Ready');
  });

  it('should serialize errors and circular references', () => {
    const context: Record<string, unknown> = { error: new Error('boom') };
    context.self = context;

    new ConsoleLogger('errors').error('Failed', context);

    const line = output.calls[0]?.line ?? '';
    const json: unknown = JSON.parse(line.slice('[ERROR] Failed '.length));
    assert.ok(typeof json === 'object' && json !== null);
    assert.ok('self' in json);
    assert.strictEqual(json.self, '[Circular]');
    assert.ok('error' in json && typeof json.error === 'object' && json.error !== null);
    assert.ok('name' in json.error && 'message' in json.error);
    assert.strictEqual(json.error.name, 'Error');
    assert.strictEqual(json.error.message, 'boom');
  });

  it('should default to info', () => {
    const logger = new ConsoleLogger();
    logger.debug('hidden');
    logger.info('shown');

    assert.deepStrictEqual(output.calls, [{ method: 'info', line: '[INFO] shown' }]);
  });
});

// =============================================================================
// TESTS: FileLogger / createLogger
// =============================================================================

describe('FileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'roster-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write timestamped lines and create parent directories', async () => {
    const filePath = join(dir, 'nested', 'server.log');
    const logger = new FileLogger('info', filePath);
    logger.info('hello', { n: 1 });
    logger.debug('dropped');
    await logger.close();

    const lines = readFileSync(filePath, 'utf-8').trimEnd().split('\n');
    assert.strictEqual(lines.length, 1);
    assert.match(lines[0] ?? '', /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] hello \{"n":1\}$/);
  });

  it('createLogger should add a debug-level file output', async () => {
    const output = captureConsole();
    const filePath = join(dir, 'server.log');
    try {
      const logger = createLogger('errors', { logFile: filePath });
      assert.ok(logger instanceof MultiLogger);

      logger.debug('only in file');
      await closeLogger(logger);

      assert.strictEqual(output.calls.length, 0);
      assert.match(readFileSync(filePath, 'utf-8'), /\[DEBUG\] only in file\n$/);
    } finally {
      output.restore();
    }
  });

  it('createLogger without a file should return a ConsoleLogger', () => {
    assert.ok(createLogger('info') instanceof ConsoleLogger);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    assert.strictEqual(isLogLevel('debug'), true);
    assert.strictEqual(isLogLevel('verbose'), false);
    assert.strictEqual(isLogLevel(3), false);
  });
});
