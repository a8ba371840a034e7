/**
 * Fixture helpers for end-to-end tests of `nest`.
 *
 * @example
 *   import { withServer, withConfig, nest, assertExitSuccess, processLauncher } from 'nest-harness';
 *
 *   await withServer({ launcher: processLauncher({ command: 'nest-server' }) }, (server) =>
 *     withConfig(server, {}, async (config) => {
 *       assertExitSuccess(await nest({ command: 'nest', config: config.path }).pull());
 *     })
 *   );
 */
export {
  HarnessError,
  FixtureSetupError,
  InvocationFailure,
  TeardownError,
  SUCCESS_EXIT_CODE,
  describeStatus,
  errorCode,
  errorMessage,
  type FixtureKind,
  type ObservedStatus,
  type TeardownFailure,
} from './errors';
export { Scope, withScope, type Release, type ScopeOptions } from './scope';
export {
  allocatePort,
  watchExit,
  terminate,
  spawnGroup,
  signalGroup,
  killLiveGroups,
  OutputTail,
  type ExitStatus,
  type SpawnGroupOptions,
} from './process';
export {
  startServer,
  withServer,
  processLauncher,
  type ServerHandle,
  type ServerLauncher,
  type ServerOptions,
  type ServerState,
  type LaunchSpec,
  type LaunchedServer,
  type ProcessLauncherOptions,
} from './server';
export {
  createConfig,
  withConfig,
  buildNestConfig,
  writeNestConfig,
  mirrorUrl,
  CONFIG_FILE_NAME,
  DEFAULT_REPOSITORIES,
  type ConfigArtifact,
  type ConfigOptions,
} from './config';
export {
  nest,
  assertExitSuccess,
  observedStatus,
  type NestCommand,
  type NestOptions,
  type NestResult,
  type NestInvoker,
} from './nest';
export {
  runPullScenario,
  type PullScenarioOptions,
  type ScenarioOutcome,
  type ScenarioReport,
  type ScenarioState,
} from './scenario';
