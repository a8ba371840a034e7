export const DEFAULT_READY_TIMEOUT_MS = 10_000;
export const DEFAULT_READY_INTERVAL_MS = 100;
export const DEFAULT_INVOCATION_TIMEOUT_MS = 60_000;
export const DEFAULT_STOP_GRACE_MS = 5_000;

/**
 * Process-wide runtime settings shared by the fixtures and command handlers.
 */
export interface Config {
  /** Path to the `nest` executable under test. */
  nestBin?: string;
  /** Command that starts the backing repository server. */
  serverCommand?: string;
  readyTimeoutMs: number;
  invocationTimeoutMs: number;
  stopGraceMs: number;
  verbose: boolean;
  output: 'json' | 'text';
}

function envMs(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isSafeInteger(value) && value > 0 ? value : fallback;
}

function defaults(): Config {
  return {
    nestBin: process.env['NEST_BIN'] || undefined,
    serverCommand: process.env['NEST_SERVER_CMD'] || undefined,
    readyTimeoutMs: envMs('NEST_HARNESS_READY_TIMEOUT_MS', DEFAULT_READY_TIMEOUT_MS),
    invocationTimeoutMs: envMs('NEST_HARNESS_TIMEOUT_MS', DEFAULT_INVOCATION_TIMEOUT_MS),
    stopGraceMs: DEFAULT_STOP_GRACE_MS,
    verbose: process.env['NEST_HARNESS_VERBOSE'] === '1',
    output: 'json',
  };
}

let _config: Config = defaults();

/**
 * Merge overrides (usually global CLI options) into the current runtime config.
 */
export function setConfig(overrides: Partial<Config>): void {
  _config = { ..._config, ...overrides };
}

/**
 * Re-read the environment and drop every override.
 */
export function resetConfig(): void {
  _config = defaults();
}

export function getConfig(): Readonly<Config> {
  return _config;
}
