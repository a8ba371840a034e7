import { getConfig } from './config';

/**
 * Fixture lifecycle trace, written to stderr so it never mixes with the
 * structured output on stdout. Silent unless verbose.
 */
export function logVerbose(scope: string, message: string): void {
  if (!getConfig().verbose) return;
  process.stderr.write(`[${scope}] ${message}\n`);
}

/**
 * Non-fatal problems (failed cleanup after an earlier failure) are always shown.
 */
export function logWarning(message: string): void {
  process.stderr.write(`warning: ${message}\n`);
}
