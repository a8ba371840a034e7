/**
 * Normalized validation error used by option parsers so callers can consistently
 * map bad user input to CLI exit code 1 with structured output.
 */
export class ArgumentValidationError extends Error {
  readonly code = 'INVALID_ARGUMENT';

  constructor(message: string) {
    super(message);
    this.name = 'ArgumentValidationError';
  }
}

const STRICT_INT_RE = /^\d+$/;

/**
 * Parse a millisecond duration. Rejects loose numeric formats such as "1.5" or "1e3".
 */
export function parseMilliseconds(raw: string, optionName: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!STRICT_INT_RE.test(trimmed) || !Number.isSafeInteger(value) || value < 1) {
    throw new ArgumentValidationError(`${optionName} must be a positive number of milliseconds, got '${raw}'`);
  }
  return value;
}

const REPOSITORY_NAME_RE = /^[a-z0-9][a-z0-9_-]*$/;

export function parseRepositoryName(raw: string): string {
  if (!REPOSITORY_NAME_RE.test(raw)) {
    throw new ArgumentValidationError(
      `--repository must be lowercase letters, digits, '-' or '_', got '${raw}'`
    );
  }
  return raw;
}

/** Readiness path appended to the server URL: absolute, no whitespace. */
export function parseReadyPath(raw: string): string {
  if (!raw.startsWith('/') || /\s/.test(raw)) {
    throw new ArgumentValidationError(`--ready-path must start with '/' and contain no spaces, got '${raw}'`);
  }
  return raw;
}
