import { spawn, type ChildProcess, type ChildProcessByStdio } from 'node:child_process';
import { createServer } from 'node:net';
import type { Readable } from 'node:stream';

/**
 * Off Windows every spawned process leads its own process group, so a signal
 * reaches whatever it started too (shell wrappers, npm scripts, forked workers).
 */
const PROCESS_GROUPS = process.platform !== 'win32';

const live = new Set<ChildProcess>();

const GROUP_POLL_MS = 50;

export interface SpawnGroupOptions {
  cwd?: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Spawn `command` as a process group leader with piped, utf-8 decoded output.
 * The group is tracked until its pipes close, for `killLiveGroups`.
 */
export function spawnGroup(
  command: string,
  args: string[],
  options: SpawnGroupOptions
): ChildProcessByStdio<null, Readable, Readable> {
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: PROCESS_GROUPS,
  });
  child.stdout.setEncoding('utf-8');
  child.stderr.setEncoding('utf-8');
  if (child.pid !== undefined) {
    live.add(child);
    child.once('close', () => live.delete(child));
  }
  return child;
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

/** Signal the child's whole process group; a group that is already gone is ignored. */
export function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  if (!PROCESS_GROUPS) {
    child.kill(signal);
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    if (!isNoSuchProcess(err)) throw err;
  }
}

/** Whether any member of the child's process group is still running. */
export function groupAlive(child: ChildProcess): boolean {
  if (!PROCESS_GROUPS || child.pid === undefined) return false;
  try {
    process.kill(-child.pid, 0);
    return true;
  } catch (err) {
    return !isNoSuchProcess(err);
  }
}

/**
 * SIGKILL every group spawned by this process that still holds its pipes. Used
 * when the harness itself is interrupted, since detached groups no longer get
 * the terminal's signals.
 */
export function killLiveGroups(): void {
  for (const child of live) {
    signalGroup(child, 'SIGKILL');
  }
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned at all. */
  error?: Error;
}

/**
 * Resolve once the child has exited or failed to spawn. Never rejects, so it is
 * safe to hold on to without a handler.
 */
export function watchExit(child: ChildProcess): Promise<ExitStatus> {
  return new Promise((resolve) => {
    if (child.exitCode !== null || child.signalCode !== null) {
      resolve({ code: child.exitCode, signal: child.signalCode });
      return;
    }
    child.once('error', (error) => resolve({ code: null, signal: null, error }));
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });
}

/**
 * Ask the child's process group to stop with SIGTERM; escalate to SIGKILL once
 * `graceMs` has passed. Members that outlive the leader get the rest of the
 * grace period, then SIGKILL as well.
 */
export async function terminate(
  child: ChildProcess,
  exited: Promise<ExitStatus>,
  graceMs: number
): Promise<ExitStatus> {
  if (child.pid === undefined) return exited;
  const deadline = Date.now() + graceMs;

  signalGroup(child, 'SIGTERM');
  let timer: NodeJS.Timeout | undefined;
  const graceExpired = new Promise<'grace-expired'>((resolve) => {
    timer = setTimeout(() => resolve('grace-expired'), graceMs);
  });
  const first = await Promise.race([exited, graceExpired]);
  clearTimeout(timer);

  if (first === 'grace-expired') {
    signalGroup(child, 'SIGKILL');
    return exited;
  }

  while (groupAlive(child) && Date.now() < deadline) {
    await sleep(GROUP_POLL_MS);
  }
  if (groupAlive(child)) signalGroup(child, 'SIGKILL');
  return first;
}

/**
 * Keeps the last `limit` characters of decoded stream output. Anything older is
 * dropped, and `truncated` says so.
 */
export class OutputTail {
  private text = '';
  private dropped = false;

  constructor(private readonly limit = 4_000) {}

  push(chunk: string): void {
    this.text += chunk;
    if (this.text.length > this.limit) {
      this.text = this.text.slice(this.text.length - this.limit);
      this.dropped = true;
    }
  }

  get truncated(): boolean {
    return this.dropped;
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Ask the OS for a free TCP port on `host`. The scratch listener is closed before the
 * port is returned, so the server under test can bind it.
 */
export function allocatePort(host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const scratch = createServer();
    scratch.unref();
    scratch.once('error', reject);
    scratch.listen(0, host, () => {
      const address = scratch.address();
      if (address === null || typeof address === 'string') {
        scratch.close();
        reject(new Error(`unable to allocate a port on ${host}`));
        return;
      }
      const { port } = address;
      scratch.close(() => resolve(port));
    });
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
