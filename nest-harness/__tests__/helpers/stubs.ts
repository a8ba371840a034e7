/**
 * Stand-ins for the real `nest` binary and repository server, run through tsx.
 */
import { resolve } from 'node:path';
import { processLauncher, type NestCommand, type ServerLauncher } from '../../src/harness';

export const STUB_DIR = resolve(__dirname, '..', 'stubs');

/** node --import tsx <script> */
const TSX_ARGS = ['--import', 'tsx'];

export type StubServerMode = 'ok' | 'never-ready' | 'crash' | 'hang' | 'stubborn';
export type StubNestMode = 'ok' | 'echo' | 'abort' | 'hang' | `exit:${number}`;

export const STUB_SERVER_SCRIPT = resolve(STUB_DIR, 'repository-server.ts');
export const STUB_NEST_SCRIPT = resolve(STUB_DIR, 'nest.ts');

export function stubServer(mode: StubServerMode = 'ok'): ServerLauncher {
  return processLauncher({
    command: process.execPath,
    args: [...TSX_ARGS, STUB_SERVER_SCRIPT],
    env: { STUB_SERVER_MODE: mode },
  });
}

/**
 * The stub server behind `sh -c '... & wait'`: the pid the harness sees is the
 * shell, and the server is its child.
 */
export function shellWrappedServer(mode: StubServerMode = 'ok'): ServerLauncher {
  return processLauncher({
    command: '/bin/sh',
    args: ['-c', `"${process.execPath}" ${TSX_ARGS.join(' ')} "${STUB_SERVER_SCRIPT}" & wait`],
    env: { STUB_SERVER_MODE: mode },
  });
}

/** Whether nothing accepts connections at `url` any more. */
export async function refusesConnections(url: string): Promise<boolean> {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(1_000) });
    await res.arrayBuffer();
    return false;
  } catch {
    return true;
  }
}

export function stubNest(mode: StubNestMode = 'ok'): NestCommand {
  return {
    command: process.execPath,
    args: [...TSX_ARGS, STUB_NEST_SCRIPT],
    env: { STUB_NEST_MODE: mode },
  };
}

/** Signal 0 checks for existence without touching the process. */
export function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
