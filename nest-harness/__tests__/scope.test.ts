/**
 * Scope tests: release order, failure collection and error precedence.
 */
import { describe, expect, test, vi } from 'vitest';
import { Scope, TeardownError, withScope } from '../src/harness';

describe('Scope', () => {
  test('releases run in reverse order of registration', async () => {
    const order: string[] = [];
    const scope = new Scope();
    scope.defer('server', () => {
      order.push('server');
    });
    scope.defer('config', async () => {
      order.push('config');
    });

    await scope.close();

    expect(order).toEqual(['config', 'server']);
    expect(scope.size).toBe(0);
  });

  test('a failing release does not stop later ones and surfaces as TeardownError', async () => {
    const order: string[] = [];
    const scope = new Scope();
    scope.defer('server', () => {
      order.push('server');
    });
    scope.defer('config', () => {
      throw new Error('disk busy');
    });

    const err = await scope.close().catch((e: unknown) => e);

    expect(order).toEqual(['server']);
    expect(err).toBeInstanceOf(TeardownError);
    expect(err).toMatchObject({ code: 'TEARDOWN_FAILED', message: 'teardown failed: config: disk busy' });
  });

  test('nested teardown failures are flattened under the outer label', async () => {
    const scope = new Scope();
    scope.defer('server', () => {
      throw new TeardownError([{ label: 'dataDir', error: new Error('EBUSY') }]);
    });

    await expect(scope.close()).rejects.toThrow('teardown failed: server/dataDir: EBUSY');
  });

  test('with a primary error, teardown failures become a warning', async () => {
    const onWarning = vi.fn();
    const scope = new Scope({ onWarning });
    scope.defer('server', () => {
      throw new Error('stop refused');
    });

    await scope.close({ error: new Error('boom') });

    expect(onWarning).toHaveBeenCalledWith('teardown failed: server: stop refused (after: boom)');
  });

  test('close is idempotent and the closed scope refuses new releases', async () => {
    const release = vi.fn();
    const scope = new Scope();
    scope.defer('server', release);

    await scope.close();
    await scope.close();

    expect(release).toHaveBeenCalledTimes(1);
    expect(() => scope.defer('late', release)).toThrow("cannot register 'late' on a closed scope");
  });
});

describe('withScope', () => {
  test('returns the callback result after releasing', async () => {
    const released: string[] = [];
    const value = await withScope(async (scope) => {
      scope.defer('a', () => {
        released.push('a');
      });
      return 42;
    });

    expect(value).toBe(42);
    expect(released).toEqual(['a']);
  });

  test('the original error wins over a teardown failure', async () => {
    const onWarning = vi.fn();
    const run = withScope(
      async (scope) => {
        scope.defer('server', () => {
          throw new Error('stop refused');
        });
        throw new Error('assertion failed');
      },
      { onWarning }
    );

    await expect(run).rejects.toThrow('assertion failed');
    expect(onWarning).toHaveBeenCalledWith('teardown failed: server: stop refused (after: assertion failed)');
  });

  test('a teardown failure after a successful body rejects with TeardownError', async () => {
    const run = withScope(async (scope) => {
      scope.defer('config', () => Promise.reject(new Error('EACCES')));
      return 'ok';
    });

    await expect(run).rejects.toBeInstanceOf(TeardownError);
  });
});
