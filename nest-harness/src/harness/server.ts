/**
 * Ephemeral repository server fixture.
 *
 * Starts a fresh server for one scope: its own data directory, its own port,
 * and a readiness gate. Nothing is handed to the caller until the server answers
 * its readiness check; anything allocated on a failed start is released before
 * the error propagates.
 */
import { randomUUID } from 'node:crypto';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DEFAULT_READY_INTERVAL_MS, getConfig } from '../utils/config';
import { logVerbose, logWarning } from '../utils/log';
import { FixtureSetupError, TeardownError, errorMessage, type TeardownFailure } from './errors';
import { OutputTail, allocatePort, sleep, spawnGroup, terminate, watchExit, type ExitStatus } from './process';
import { withScope } from './scope';

export type ServerState = 'starting' | 'ready' | 'stopped';

export interface LaunchSpec {
  host: string;
  port: number;
  dataDir: string;
}

/**
 * A started (not necessarily ready) server, as seen by the fixture.
 */
export interface LaunchedServer {
  readonly pid?: number;
  /** Resolves when the server goes away on its own or after `stop`. */
  readonly exited: Promise<ExitStatus>;
  /** Recent server output, for diagnostics. */
  output(): string;
  stop(graceMs: number): Promise<void>;
}

export interface ServerLauncher {
  readonly name: string;
  launch(spec: LaunchSpec): Promise<LaunchedServer>;
}

export interface ServerHandle {
  readonly id: string;
  readonly host: string;
  readonly port: number;
  /** Base URL, e.g. `http://127.0.0.1:40123`. */
  readonly url: string;
  readonly pid?: number;
  readonly dataDir: string;
  /** `'stopped'` after `stop()`, or as soon as the process exits on its own. */
  readonly state: ServerState;
  /** Idempotent. */
  stop(): Promise<void>;
}

export interface ServerOptions {
  launcher: ServerLauncher;
  host?: string;
  /** Fixed port; an ephemeral one is allocated when omitted. */
  port?: number;
  readyPath?: string;
  readyTimeoutMs?: number;
  readyIntervalMs?: number;
  stopGraceMs?: number;
  /** Parent of the server's data directory. Defaults to the OS temp dir. */
  tmpRoot?: string;
}

export interface ProcessLauncherOptions {
  command: string;
  /** `{host}`, `{port}` and `{dataDir}` are substituted. */
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_READY_PATH = '/health';

function substitute(arg: string, spec: LaunchSpec): string {
  return arg
    .replace(/\{host\}/g, spec.host)
    .replace(/\{port\}/g, String(spec.port))
    .replace(/\{dataDir\}/g, spec.dataDir);
}

/**
 * Launch the server as a child process. The address and data directory are also
 * exported as NEST_SERVER_HOST, NEST_SERVER_PORT and NEST_SERVER_DATA_DIR.
 * Stopping signals the whole process group, so a server started through a
 * wrapper (`sh -c`, an npm script) goes down with it.
 */
export function processLauncher(options: ProcessLauncherOptions): ServerLauncher {
  return {
    name: options.command,
    async launch(spec) {
      const args = (options.args ?? []).map((arg) => substitute(arg, spec));
      logVerbose('server', `spawn ${options.command} ${args.join(' ')}`);

      const child = spawnGroup(options.command, args, {
        cwd: options.cwd,
        env: {
          ...process.env,
          ...options.env,
          NEST_SERVER_HOST: spec.host,
          NEST_SERVER_PORT: String(spec.port),
          NEST_SERVER_DATA_DIR: spec.dataDir,
        },
      });
      const tail = new OutputTail();
      child.stdout.on('data', (data: string) => tail.push(data));
      child.stderr.on('data', (data: string) => tail.push(data));
      const exited = watchExit(child);

      return {
        pid: child.pid,
        exited,
        output: () => tail.toString(),
        stop: async (graceMs) => {
          const status = await terminate(child, exited, graceMs);
          logVerbose('server', `pid ${child.pid ?? '?'} stopped (${status.signal ?? status.code})`);
        },
      };
    },
  };
}

function describeExit(status: ExitStatus): string {
  if (status.error) return `could not be started: ${status.error.message}`;
  if (status.signal) return `was killed by ${status.signal}`;
  return `exited with code ${status.code}`;
}

function withOutput(message: string, output: string): string {
  const trimmed = output.trim();
  return trimmed.length > 0 ? `${message}\n--- server output ---\n${trimmed}` : message;
}

/**
 * Poll the readiness URL until it answers 2xx, the process exits, or the
 * deadline passes.
 */
async function waitUntilReady(
  url: string,
  launched: LaunchedServer,
  timeoutMs: number,
  intervalMs: number
): Promise<void> {
  const seen: { exit?: ExitStatus } = {};
  void launched.exited.then((status) => {
    seen.exit = status;
  });

  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (seen.exit) {
      throw new FixtureSetupError('server', withOutput(`server ${describeExit(seen.exit)} before becoming ready`, launched.output()));
    }
    try {
      const res = await fetch(url, {
        signal: AbortSignal.timeout(Math.max(1, Math.min(1_000, deadline - Date.now()))),
      });
      await res.arrayBuffer().catch(() => undefined);
      if (res.ok) return;
    } catch {
      // Not listening yet
    }
    await sleep(intervalMs);
  }

  if (seen.exit) {
    throw new FixtureSetupError('server', withOutput(`server ${describeExit(seen.exit)} before becoming ready`, launched.output()));
  }
  throw new FixtureSetupError(
    'server',
    withOutput(`server not ready at ${url} within ${timeoutMs}ms`, launched.output())
  );
}

class EphemeralServer implements ServerHandle {
  readonly id = randomUUID();
  readonly url: string;
  private current: ServerState = 'ready';
  private stopping?: Promise<void>;

  constructor(
    readonly host: string,
    readonly port: number,
    readonly dataDir: string,
    private readonly launched: LaunchedServer,
    private readonly graceMs: number
  ) {
    this.url = `http://${host}:${port}`;
    void launched.exited.then((status) => {
      if (this.current !== 'ready' || this.stopping) return;
      this.current = 'stopped';
      logVerbose('server', `${this.url} went away (${status.signal ?? `exit ${status.code}`})`);
    });
  }

  get pid(): number | undefined {
    return this.launched.pid;
  }

  get state(): ServerState {
    return this.current;
  }

  stop(): Promise<void> {
    this.stopping ??= this.teardown();
    return this.stopping;
  }

  private async teardown(): Promise<void> {
    const failures = await releaseServer(this.launched, this.dataDir, this.graceMs);
    this.current = 'stopped';
    logVerbose('server', `${this.url} torn down`);
    if (failures.length > 0) throw new TeardownError(failures);
  }
}

async function releaseServer(
  launched: LaunchedServer | undefined,
  dataDir: string,
  graceMs: number
): Promise<TeardownFailure[]> {
  const failures: TeardownFailure[] = [];
  if (launched) {
    try {
      await launched.stop(graceMs);
    } catch (err) {
      failures.push({ label: 'process', error: err });
    }
  }
  try {
    await rm(dataDir, { recursive: true, force: true });
  } catch (err) {
    failures.push({ label: 'dataDir', error: err });
  }
  return failures;
}

/**
 * Start a server and wait until it is ready.
 *
 * @throws FixtureSetupError when the data directory, port or process cannot be
 *   set up, or the server is not ready within `readyTimeoutMs`.
 */
export async function startServer(options: ServerOptions): Promise<ServerHandle> {
  const config = getConfig();
  const host = options.host ?? DEFAULT_HOST;
  const readyTimeoutMs = options.readyTimeoutMs ?? config.readyTimeoutMs;
  const graceMs = options.stopGraceMs ?? config.stopGraceMs;

  let dataDir: string;
  try {
    dataDir = await mkdtemp(join(options.tmpRoot ?? tmpdir(), 'nest-server-'));
  } catch (err) {
    throw new FixtureSetupError('server', `unable to create data directory: ${errorMessage(err)}`, { cause: err });
  }

  let launched: LaunchedServer | undefined;
  try {
    const port = options.port ?? (await allocatePort(host));
    const url = `http://${host}:${port}`;
    logVerbose('server', `starting ${options.launcher.name} at ${url}`);

    launched = await options.launcher.launch({ host, port, dataDir });
    await waitUntilReady(
      `${url}${options.readyPath ?? DEFAULT_READY_PATH}`,
      launched,
      readyTimeoutMs,
      options.readyIntervalMs ?? DEFAULT_READY_INTERVAL_MS
    );

    logVerbose('server', `ready at ${url}`);
    return new EphemeralServer(host, port, dataDir, launched, graceMs);
  } catch (err) {
    for (const failure of await releaseServer(launched, dataDir, graceMs)) {
      logWarning(`server cleanup after failed start: ${failure.label}: ${errorMessage(failure.error)}`);
    }
    if (err instanceof FixtureSetupError) throw err;
    throw new FixtureSetupError('server', errorMessage(err), { cause: err });
  }
}

/**
 * Scoped server: `fn` runs against a ready server, which is stopped on every exit path.
 */
export function withServer<T>(options: ServerOptions, fn: (server: ServerHandle) => Promise<T>): Promise<T> {
  return withScope(async (scope) => {
    const server = await startServer(options);
    scope.defer('server', () => server.stop());
    return fn(server);
  });
}
