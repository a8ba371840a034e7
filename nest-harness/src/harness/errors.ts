/**
 * Error taxonomy for a harness run. Every failure a test case can end in maps to
 * one of these, and the CLI maps their `code` onto its failure envelope.
 */
export class HarnessError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HarnessError';
  }
}

export type FixtureKind = 'server' | 'config';

/**
 * A fixture could not produce its resource. Anything it allocated on the way has
 * already been released by the time this is thrown.
 */
export class FixtureSetupError extends HarnessError {
  constructor(
    public readonly fixture: FixtureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('FIXTURE_SETUP', `${fixture} fixture setup failed: ${message}`, options);
    this.name = 'FixtureSetupError';
  }
}

/** What the subprocess ended with, when it was not a clean exit 0. */
export type ObservedStatus = number | NodeJS.Signals | 'timeout' | 'spawn-error' | 'unknown';

export const SUCCESS_EXIT_CODE = 0;

export function describeStatus(status: ObservedStatus): string {
  if (typeof status === 'number') return `exit code ${status}`;
  if (status.startsWith('SIG')) return `signal ${status}`;
  return status;
}

export class InvocationFailure extends HarnessError {
  readonly expected = SUCCESS_EXIT_CODE;

  constructor(
    public readonly observed: ObservedStatus,
    detail?: string,
    options?: { cause?: unknown }
  ) {
    const head = `expected exit code ${SUCCESS_EXIT_CODE}, observed ${describeStatus(observed)}`;
    super('INVOCATION_FAILED', detail ? `${head}\n${detail}` : head, options);
    this.name = 'InvocationFailure';
  }
}

export interface TeardownFailure {
  label: string;
  error: unknown;
}

/**
 * One or more release steps failed. Individual failures are kept so none is lost
 * when several resources fail to clean up.
 */
export class TeardownError extends HarnessError {
  constructor(public readonly failures: TeardownFailure[]) {
    super(
      'TEARDOWN_FAILED',
      `teardown failed: ${failures.map((f) => `${f.label}: ${errorMessage(f.error)}`).join('; ')}`
    );
    this.name = 'TeardownError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string {
  if (err instanceof HarnessError) return err.code;
  return 'UNEXPECTED';
}
