import { logWarning } from '../utils/log';
import { TeardownError, errorMessage, type TeardownFailure } from './errors';

export type Release = () => Promise<void> | void;

export interface ScopeOptions {
  /** Receives teardown failures that are reported instead of thrown. */
  onWarning?: (message: string) => void;
}

/**
 * Release stack for resources acquired within one test case. Releases run in
 * reverse order of registration, each one even if an earlier one failed.
 */
export class Scope {
  private readonly releases: Array<{ label: string; release: Release }> = [];
  private closed = false;
  private readonly onWarning: (message: string) => void;

  constructor(options: ScopeOptions = {}) {
    this.onWarning = options.onWarning ?? logWarning;
  }

  defer(label: string, release: Release): void {
    if (this.closed) {
      throw new Error(`cannot register '${label}' on a closed scope`);
    }
    this.releases.push({ label, release });
  }

  get size(): number {
    return this.releases.length;
  }

  /**
   * Run every release. When the scope is closing because of an earlier error,
   * teardown failures are reported as warnings and the caller rethrows the
   * original; otherwise they surface as a TeardownError.
   */
  async close(primary?: { error: unknown }): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const failures: TeardownFailure[] = [];
    while (this.releases.length > 0) {
      const { label, release } = this.releases[this.releases.length - 1];
      this.releases.pop();
      try {
        await release();
      } catch (err) {
        if (err instanceof TeardownError) {
          failures.push(...err.failures.map((f) => ({ label: `${label}/${f.label}`, error: f.error })));
        } else {
          failures.push({ label, error: err });
        }
      }
    }

    if (failures.length === 0) return;
    const teardown = new TeardownError(failures);
    if (primary) {
      this.onWarning(`${teardown.message} (after: ${errorMessage(primary.error)})`);
      return;
    }
    throw teardown;
  }
}

/**
 * Run `fn` with a fresh scope and close it on every exit path.
 */
export async function withScope<T>(
  fn: (scope: Scope) => Promise<T>,
  options: ScopeOptions = {}
): Promise<T> {
  const scope = new Scope(options);
  let result: T;
  try {
    result = await fn(scope);
  } catch (err) {
    await scope.close({ error: err });
    throw err;
  }
  await scope.close();
  return result;
}
