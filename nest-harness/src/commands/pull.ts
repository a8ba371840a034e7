import { Command } from 'commander';
import { processLauncher } from '../harness/server';
import { runPullScenario } from '../harness/scenario';
import { ArgumentValidationError, parseMilliseconds, parseReadyPath, parseRepositoryName } from '../utils/args';
import { isCommanderError, repeatableOption } from '../utils/commander';
import { getConfig } from '../utils/config';
import { print, success, failure } from '../utils/output';

interface PullCommandOptions {
  nest?: string;
  nestArg?: string[];
  server?: string;
  serverArg?: string[];
  readyPath: string;
  readyTimeout?: string;
  timeout?: string;
  repository?: string[];
}

export function pullCommand(): Command {
  return new Command('pull')
    .description(
      'Start a repository server, generate a config pointing at it, run\n' +
        '`<nest> --config <path> pull` once and check that it exits 0.\n\n' +
        'The server and the config are torn down afterwards, whatever the outcome.\n' +
        'Server arguments may use {host}, {port} and {dataDir}; the same values are\n' +
        'exported as NEST_SERVER_HOST, NEST_SERVER_PORT and NEST_SERVER_DATA_DIR.\n\n' +
        'EXAMPLE:\n' +
        '  nest-harness pull --nest ./target/debug/nest \\\n' +
        '    --server nest-server --server-arg --port --server-arg {port}'
    )
    .option('--nest <command>', 'nest executable under test (default: $NEST_BIN)')
    .addOption(repeatableOption('--nest-arg <arg>', 'argument placed before --config (repeatable)'))
    .option('--server <command>', 'command that starts the repository server (default: $NEST_SERVER_CMD)')
    .addOption(repeatableOption('--server-arg <arg>', 'server argument (repeatable)'))
    .option('--ready-path <path>', 'path polled until it answers 2xx', '/health')
    .option('--ready-timeout <ms>', 'fail if the server is not ready within this long')
    .option('--timeout <ms>', 'kill `nest pull` after this long')
    .addOption(
      repeatableOption('--repository <name>', 'repository served by the server (repeatable, default: stable)', parseRepositoryName)
    )
    .action(async (options: PullCommandOptions, cmd: Command) => {
      try {
        const config = getConfig();
        const nestBin = options.nest ?? config.nestBin;
        if (!nestBin) throw new ArgumentValidationError('--nest is required (or set NEST_BIN)');
        const serverCommand = options.server ?? config.serverCommand;
        if (!serverCommand) throw new ArgumentValidationError('--server is required (or set NEST_SERVER_CMD)');

        const report = await runPullScenario({
          server: {
            launcher: processLauncher({ command: serverCommand, args: options.serverArg ?? [] }),
            readyPath: parseReadyPath(options.readyPath),
            readyTimeoutMs:
              options.readyTimeout !== undefined ? parseMilliseconds(options.readyTimeout, '--ready-timeout') : undefined,
          },
          nest: { command: nestBin, args: options.nestArg ?? [] },
          config: { repositories: options.repository },
          timeoutMs: options.timeout !== undefined ? parseMilliseconds(options.timeout, '--timeout') : undefined,
        });

        if (report.outcome === 'Passed') {
          print(success(report, report.durationMs));
          return;
        }
        print(failure(report.error?.code ?? 'PULL_FAILED', report.error?.message ?? 'pull scenario failed', report));
        cmd.error('', { exitCode: 1 });
      } catch (err) {
        if (isCommanderError(err)) throw err;
        if (err instanceof ArgumentValidationError) {
          print(failure(err.code, err.message));
        } else {
          print(failure('PULL_FAILED', String(err)));
        }
        cmd.error('', { exitCode: 1 });
      }
    });
}
