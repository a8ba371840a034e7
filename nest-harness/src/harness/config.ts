/**
 * Config fixture: a Nest configuration file pointing at a ready server.
 */
import { mkdir, mkdtemp, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import * as TOML from '@iarna/toml';

import { validateNestConfig, type NestConfig } from '../schemas/registry';
import { logVerbose, logWarning } from '../utils/log';
import { FixtureSetupError, errorMessage } from './errors';
import { withScope } from './scope';
import type { ServerHandle } from './server';

export const CONFIG_FILE_NAME = 'config.toml';
export const DEFAULT_REPOSITORIES = ['stable'];

export interface ConfigOptions {
  /** Repository names, each mirrored by the server. Default: `['stable']`. */
  repositories?: string[];
  /** Parent of the config directory. Defaults to the OS temp dir. */
  tmpRoot?: string;
}

export interface ConfigArtifact {
  /** Absolute path to the config file; pass it as `--config`. */
  readonly path: string;
  /** Directory owning the file and every path the config names. */
  readonly dir: string;
  readonly contents: string;
  readonly config: NestConfig;
  /** Idempotent. */
  release(): Promise<void>;
}

/**
 * Mirror URL for a server base URL. Nest resolves its API routes relative to
 * the mirror, so it must end with a slash.
 */
export function mirrorUrl(serverUrl: string): string {
  const url = new URL(serverUrl);
  if (!url.pathname.endsWith('/')) url.pathname = `${url.pathname}/`;
  return url.href;
}

/**
 * Build the config object. Every path lives under `dir`, so removing `dir`
 * removes whatever the tool wrote through this config.
 */
export function buildNestConfig(mirror: string, dir: string, repositories: string[] = DEFAULT_REPOSITORIES): NestConfig {
  const root = resolve(dir);
  return {
    paths: {
      root: join(root, 'root'),
      available: join(root, 'cache', 'available'),
      downloaded: join(root, 'cache', 'downloaded'),
      installed: join(root, 'installed'),
    },
    repositories: Object.fromEntries(repositories.map((name) => [name, { mirrors: [mirror] }])),
  };
}

/**
 * Validate, serialize and write `<dir>/config.toml`. The file appears through a
 * rename, so the final path is either absent or complete.
 */
export async function writeNestConfig(config: NestConfig, dir: string): Promise<{ path: string; contents: string }> {
  const validation = validateNestConfig(config);
  if (!validation.valid) {
    const details = validation.errors.map((e) => `${e.path} ${e.message}`).join('; ');
    throw new Error(`generated config is invalid: ${details}`);
  }

  const contents = TOML.stringify(config);
  const path = join(dir, CONFIG_FILE_NAME);
  const staging = join(dir, `.${CONFIG_FILE_NAME}.partial`);
  await mkdir(dir, { recursive: true });
  try {
    await writeFile(staging, contents, { encoding: 'utf-8', flag: 'wx' });
    await rename(staging, path);
  } catch (err) {
    await rm(staging, { force: true });
    throw err;
  }
  return { path, contents };
}

class GeneratedConfig implements ConfigArtifact {
  private released?: Promise<void>;

  constructor(
    readonly path: string,
    readonly dir: string,
    readonly contents: string,
    readonly config: NestConfig
  ) {}

  release(): Promise<void> {
    this.released ??= rm(this.dir, { recursive: true, force: true }).then(() => {
      logVerbose('config', `removed ${this.dir}`);
    });
    return this.released;
  }
}

/**
 * Generate a config for `server`, which must be ready.
 *
 * @throws FixtureSetupError when the server is not ready, or the artifact cannot
 *   be generated; nothing is left on disk in that case.
 */
export async function createConfig(server: ServerHandle, options: ConfigOptions = {}): Promise<ConfigArtifact> {
  if (server.state !== 'ready') {
    throw new FixtureSetupError('config', `server ${server.url} is ${server.state}, not ready`);
  }

  let dir: string;
  try {
    dir = await mkdtemp(join(options.tmpRoot ?? tmpdir(), 'nest-config-'));
  } catch (err) {
    throw new FixtureSetupError('config', `unable to create config directory: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const config = buildNestConfig(mirrorUrl(server.url), dir, options.repositories);
    const { path, contents } = await writeNestConfig(config, dir);
    logVerbose('config', `wrote ${path} for ${server.url}`);
    return new GeneratedConfig(path, dir, contents, config);
  } catch (err) {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (cleanupErr) {
      logWarning(`config cleanup after failed generation: ${errorMessage(cleanupErr)}`);
    }
    throw new FixtureSetupError('config', errorMessage(err), { cause: err });
  }
}

/**
 * Scoped config, nested inside the server's scope: released before the server is.
 */
export function withConfig<T>(
  server: ServerHandle,
  options: ConfigOptions,
  fn: (config: ConfigArtifact) => Promise<T>
): Promise<T> {
  return withScope(async (scope) => {
    const config = await createConfig(server, options);
    scope.defer('config', () => config.release());
    return fn(config);
  });
}
