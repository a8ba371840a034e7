import { resolve } from 'node:path';
import { Command } from 'commander';
import { buildNestConfig, mirrorUrl, writeNestConfig, DEFAULT_REPOSITORIES } from '../harness/config';
import { parseRepositoryName } from '../utils/args';
import { isCommanderError, repeatableOption } from '../utils/commander';
import { print, success, failure } from '../utils/output';

interface ConfigCommandOptions {
  mirror: string;
  dir: string;
  repository?: string[];
}

/**
 * Write a config for a server that is already running; no lifecycle management.
 */
export function configCommand(): Command {
  return new Command('config')
    .description(
      'Write a validated nest config.toml pointing at an already running repository server.\n\n' +
        'All cache and install paths in the file live under --dir.'
    )
    .requiredOption('--mirror <url>', 'repository server base URL')
    .option('--dir <dir>', 'directory to write config.toml into', '.')
    .addOption(
      repeatableOption('--repository <name>', 'repository served by the mirror (repeatable, default: stable)', parseRepositoryName)
    )
    .action(async (options: ConfigCommandOptions, cmd: Command) => {
      try {
        const dir = resolve(options.dir);
        const mirror = mirrorUrl(options.mirror);
        const config = buildNestConfig(mirror, dir, options.repository ?? DEFAULT_REPOSITORIES);
        const { path } = await writeNestConfig(config, dir);
        print(success({ path, mirror, repositories: Object.keys(config.repositories) }));
      } catch (err) {
        if (isCommanderError(err)) throw err;
        print(failure('CONFIG_FAILED', err instanceof Error ? err.message : String(err)));
        cmd.error('', { exitCode: 1 });
      }
    });
}
