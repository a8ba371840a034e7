/**
 * Runs the `nest` CLI under test as a black box: one spawn, one wait, and the
 * exit status as the only contract.
 */
import { getConfig } from '../utils/config';
import { logVerbose } from '../utils/log';
import { InvocationFailure, SUCCESS_EXIT_CODE, type ObservedStatus } from './errors';
import { OutputTail, signalGroup, spawnGroup } from './process';

/** How to start the tool: a binary, or an interpreter plus script. */
export interface NestCommand {
  command: string;
  /** Arguments placed before `--config`. */
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface NestOptions extends NestCommand {
  /** Path to the config artifact. */
  config: string;
  /** Kill the process and everything it started (SIGKILL) after this long. */
  timeoutMs?: number;
}

export interface NestResult {
  /** Null when the process was terminated by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Each stream keeps its last MiB; set when either lost earlier output. */
  outputTruncated: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
}

const OUTPUT_LIMIT = 1024 * 1024;

export interface NestInvoker {
  pull(): Promise<NestResult>;
  run(...subcommand: string[]): Promise<NestResult>;
}

function invoke(options: NestOptions, subcommand: string[]): Promise<NestResult> {
  const args = [...(options.args ?? []), '--config', options.config, ...subcommand];
  const timeoutMs = options.timeoutMs ?? getConfig().invocationTimeoutMs;
  const started = Date.now();
  logVerbose('nest', `${options.command} ${args.join(' ')}`);

  return new Promise<NestResult>((resolvePromise, reject) => {
    const child = spawnGroup(options.command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
    });

    const stdout = new OutputTail(OUTPUT_LIMIT);
    const stderr = new OutputTail(OUTPUT_LIMIT);
    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      // The group, not just the child: a forked helper holding the pipes would
      // otherwise keep 'close' from firing.
      signalGroup(child, 'SIGKILL');
    }, timeoutMs);

    child.stdout.on('data', (data: string) => stdout.push(data));
    child.stderr.on('data', (data: string) => stderr.push(data));

    child.once('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new InvocationFailure('spawn-error', `unable to run ${options.command}: ${err.message}`, { cause: err }));
    });

    child.once('close', (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      logVerbose('nest', `${subcommand.join(' ')} finished: ${signal ?? `exit ${code}`}${timedOut ? ' (timed out)' : ''}`);
      resolvePromise({
        exitCode: code,
        signal,
        timedOut,
        outputTruncated: stdout.truncated || stderr.truncated,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        durationMs: Date.now() - started,
      });
    });
  });
}

/**
 * Bind the tool and a config artifact.
 *
 * @example
 *   const result = await nest({ command: 'nest', config: artifact.path }).pull();
 *   assertExitSuccess(result);
 */
export function nest(options: NestOptions): NestInvoker {
  return {
    pull: () => invoke(options, ['pull']),
    run: (...subcommand) => invoke(options, subcommand),
  };
}

export function observedStatus(result: NestResult): ObservedStatus {
  if (result.timedOut) return 'timeout';
  if (result.signal !== null) return result.signal;
  if (result.exitCode !== null) return result.exitCode;
  return 'unknown';
}

/**
 * Throw an InvocationFailure naming expected and observed status unless the
 * process exited with the success code.
 */
export function assertExitSuccess(result: NestResult, context?: string): void {
  if (!result.timedOut && result.exitCode === SUCCESS_EXIT_CODE) return;

  const lines: string[] = [];
  if (context) lines.push(`context: ${context}`);
  const stderr = result.stderr.trim();
  if (stderr.length > 0) lines.push(`stderr: ${stderr.slice(-500)}`);
  throw new InvocationFailure(observedStatus(result), lines.length > 0 ? lines.join('\n') : undefined);
}
