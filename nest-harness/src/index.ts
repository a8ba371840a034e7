import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';
import { setConfig } from './utils/config';
import { helpOrUnknown } from './utils/commander';
import { pullCommand } from './commands/pull';
import { configCommand } from './commands/config';

export * from './harness/index';

// Read version from package.json so `--version` follows releases
function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Build the root Commander program with global options and all subcommands.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('nest-harness')
    .description(
      'End-to-end checks for the nest package manager.\n\n' +
        'Each run owns its fixtures: an ephemeral repository server and a generated\n' +
        'config file, both removed when the run ends, pass or fail.\n\n' +
        'TYPICAL WORKFLOW:\n' +
        '  nest-harness pull --nest ./nest --server ./nest-server   # full pull scenario\n' +
        '  nest-harness config --mirror http://127.0.0.1:8000 --dir /tmp/nest  # config only\n\n' +
        'OUTPUT: --output supports json and text. Exit code 1 on failure.\n' +
        'ENV: NEST_BIN, NEST_SERVER_CMD, NEST_HARNESS_READY_TIMEOUT_MS, NEST_HARNESS_TIMEOUT_MS.'
    )
    .version(packageVersion())
    .option('--output <format>', 'output format: json or text', 'json')
    .option('-v, --verbose', 'log fixture lifecycle to stderr')
    .hook('preAction', (_thisCommand: Command, actionCommand: Command) => {
      const opts = actionCommand.optsWithGlobals<{ output: string; verbose?: boolean }>();
      if (opts.output !== 'json' && opts.output !== 'text') {
        actionCommand.error(`Unknown output format '${opts.output}'. Valid formats: json, text`);
      }
      setConfig({ output: opts.output, verbose: opts.verbose ?? false });
    });

  helpOrUnknown(program);

  program.addCommand(pullCommand()).addCommand(configCommand());

  return program;
}
