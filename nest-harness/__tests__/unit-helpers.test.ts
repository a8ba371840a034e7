/**
 * Unit tests for option parsing, text rendering, runtime config and process helpers.
 */
import { createServer } from 'node:net';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { OutputTail, allocatePort, errorCode } from '../src/harness';
import { ArgumentValidationError, parseMilliseconds, parseReadyPath, parseRepositoryName } from '../src/utils/args';
import { DEFAULT_READY_TIMEOUT_MS, getConfig, resetConfig, setConfig } from '../src/utils/config';
import { failure, formatText, success } from '../src/utils/output';

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfig();
});

describe('parseMilliseconds', () => {
  test('accepts positive integers', () => {
    expect(parseMilliseconds('250', '--timeout')).toBe(250);
    expect(parseMilliseconds(' 1000 ', '--timeout')).toBe(1000);
  });

  test.each(['0', '-5', '1.5', '1e3', 'abc', ''])('rejects %j', (raw) => {
    expect(() => parseMilliseconds(raw, '--timeout')).toThrow(ArgumentValidationError);
  });
});

describe('parseReadyPath', () => {
  test('accepts absolute paths', () => {
    expect(parseReadyPath('/health')).toBe('/health');
    expect(parseReadyPath('/api/ready?full=1')).toBe('/api/ready?full=1');
  });

  test.each(['health', '', '/he alth', 'http://127.0.0.1/health'])('rejects %j', (raw) => {
    expect(() => parseReadyPath(raw)).toThrow(ArgumentValidationError);
  });
});

describe('parseRepositoryName', () => {
  test('accepts lowercase names with digits, dashes and underscores', () => {
    expect(parseRepositoryName('stable')).toBe('stable');
    expect(parseRepositoryName('nightly_2-x')).toBe('nightly_2-x');
  });

  test.each(['Stable', '-stable', 'has space', ''])('rejects %j', (raw) => {
    expect(() => parseRepositoryName(raw)).toThrow(ArgumentValidationError);
  });
});

describe('formatText', () => {
  test('renders nested records, lists and empty arrays', () => {
    const text = formatText({
      outcome: 'Passed',
      exitCode: 0,
      error: undefined,
      states: ['Init', 'Torndown'],
      warnings: [],
      server: { url: 'http://127.0.0.1:4321' },
    });

    expect(text).toBe(
      'outcome: Passed\n' +
        'exitCode: 0\n' +
        'states:\n' +
        '  - Init\n' +
        '  - Torndown\n' +
        'warnings: (empty)\n' +
        'server:\n' +
        '  url: http://127.0.0.1:4321'
    );
  });

  test('renders nothing for undefined', () => {
    expect(formatText(undefined)).toBe('');
  });
});

describe('envelopes', () => {
  test('success carries data and duration', () => {
    expect(success({ ok: true }, 12)).toMatchObject({ success: true, data: { ok: true }, metadata: { durationMs: 12 } });
  });

  test('failure omits details when none are given', () => {
    expect(failure('CONFIG_FAILED', 'bad mirror').error).toEqual({ code: 'CONFIG_FAILED', message: 'bad mirror' });
  });
});

describe('runtime config', () => {
  test('reads timeouts and binaries from the environment', () => {
    vi.stubEnv('NEST_BIN', '/opt/nest/bin/nest');
    vi.stubEnv('NEST_HARNESS_READY_TIMEOUT_MS', '2500');
    resetConfig();

    expect(getConfig()).toMatchObject({ nestBin: '/opt/nest/bin/nest', readyTimeoutMs: 2500 });
  });

  test('ignores an invalid timeout and falls back to the default', () => {
    vi.stubEnv('NEST_HARNESS_READY_TIMEOUT_MS', 'soon');
    resetConfig();

    expect(getConfig().readyTimeoutMs).toBe(DEFAULT_READY_TIMEOUT_MS);
  });

  test('setConfig merges overrides', () => {
    setConfig({ output: 'text' });

    expect(getConfig().output).toBe('text');
    expect(getConfig().readyTimeoutMs).toBe(DEFAULT_READY_TIMEOUT_MS);
  });
});

describe('process helpers', () => {
  test('OutputTail keeps the last characters and flags what it dropped', () => {
    const tail = new OutputTail(5);
    tail.push('wor');
    expect(tail.truncated).toBe(false);
    tail.push('ld');
    expect(tail.truncated).toBe(false);

    tail.push('!');

    expect(tail.toString()).toBe('orld!');
    expect(tail.truncated).toBe(true);
  });

  test('allocatePort returns a port that can be bound', async () => {
    const port = await allocatePort('127.0.0.1');
    const server = createServer();

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, '127.0.0.1', () => resolve());
    });
    await new Promise<void>((resolve) => server.close(() => resolve()));

    expect(port).toBeGreaterThan(0);
  });

  test('errorCode maps non-harness errors to UNEXPECTED', () => {
    expect(errorCode(new Error('x'))).toBe('UNEXPECTED');
    expect(errorCode(new ArgumentValidationError('x'))).toBe('UNEXPECTED');
  });
});
