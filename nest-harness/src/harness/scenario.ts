import { logWarning } from '../utils/log';
import { createConfig, type ConfigOptions } from './config';
import { errorCode, errorMessage } from './errors';
import { assertExitSuccess, nest, type NestCommand } from './nest';
import { withScope } from './scope';
import { startServer, type ServerOptions } from './server';

export type ScenarioState =
  | 'Init'
  | 'ServerStarting'
  | 'ServerReady'
  | 'ConfigGenerated'
  | 'Invoked'
  | 'Asserted'
  | 'Torndown';

export type ScenarioOutcome = 'Passed' | 'Failed';

export interface PullScenarioOptions {
  server: ServerOptions;
  nest: NestCommand;
  config?: ConfigOptions;
  /** Invocation timeout for `nest pull`. */
  timeoutMs?: number;
}

export interface ScenarioReport {
  outcome: ScenarioOutcome;
  /** Every state the run went through, in order. */
  states: ScenarioState[];
  serverUrl?: string;
  configPath?: string;
  exitCode: number | null;
  signal: string | null;
  durationMs: number;
  error?: { code: string; message: string };
  /** Teardown failures that were reported behind an earlier error. */
  warnings: string[];
}

/**
 * Server → config → `nest pull` → assert exit 0, with teardown in reverse order
 * on every path. Failures end up in the report; this never rejects.
 */
export async function runPullScenario(options: PullScenarioOptions): Promise<ScenarioReport> {
  const started = Date.now();
  const report: ScenarioReport = {
    outcome: 'Failed',
    states: ['Init'],
    exitCode: null,
    signal: null,
    durationMs: 0,
    warnings: [],
  };
  const enter = (state: ScenarioState): void => {
    report.states.push(state);
  };

  try {
    await withScope(
      async (scope) => {
        enter('ServerStarting');
        const server = await startServer(options.server);
        scope.defer('server', () => server.stop());
        report.serverUrl = server.url;
        enter('ServerReady');

        const config = await createConfig(server, options.config);
        scope.defer('config', () => config.release());
        report.configPath = config.path;
        enter('ConfigGenerated');

        const result = await nest({ ...options.nest, config: config.path, timeoutMs: options.timeoutMs }).pull();
        report.exitCode = result.exitCode;
        report.signal = result.signal;
        enter('Invoked');

        assertExitSuccess(result, 'nest pull');
        enter('Asserted');
      },
      {
        onWarning: (message) => {
          report.warnings.push(message);
          logWarning(message);
        },
      }
    );
    report.outcome = 'Passed';
  } catch (err) {
    report.error = { code: errorCode(err), message: errorMessage(err) };
  }

  enter('Torndown');
  report.durationMs = Date.now() - started;
  return report;
}
