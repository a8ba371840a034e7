#!/usr/bin/env node
/**
 * Process entry: runs one command and turns its outcome into an exit code.
 * Commands print their own results; usage errors and crashes are printed here,
 * in the output format the command line asked for.
 */
import { CommanderError, type Command } from 'commander';
import { errorMessage } from './harness/errors';
import { killLiveGroups } from './harness/process';
import { createProgram } from './index';
import { setConfig } from './utils/config';
import { failure, print } from './utils/output';

type OutputFormat = 'json' | 'text';

const SILENT_EXITS = new Set(['commander.help', 'commander.helpDisplayed', 'commander.version']);

const INTERRUPTS: ReadonlyArray<readonly [NodeJS.Signals, number]> = [
  ['SIGINT', 130],
  ['SIGTERM', 143],
];

// Usage errors are raised before any preAction hook runs, so the format is read
// from the raw arguments.
function requestedOutput(args: readonly string[]): OutputFormat {
  const inline = args.find((arg) => arg.startsWith('--output='));
  const at = args.indexOf('--output');
  const value = inline?.slice('--output='.length) ?? (at >= 0 ? args[at + 1] : undefined);
  return value === 'text' ? 'text' : 'json';
}

/** Make every command throw instead of exiting, and keep Commander's own error text quiet. */
function throwInsteadOfExit(root: Command): void {
  const pending: Command[] = [root];
  for (let command = pending.pop(); command; command = pending.pop()) {
    command.exitOverride().configureOutput({ outputError: () => undefined });
    pending.push(...command.commands);
  }
}

function usageExit(err: CommanderError, output: OutputFormat): number {
  if (SILENT_EXITS.has(err.code)) return 0;
  const message = err.message.replace(/^error:\s*/i, '').trim();
  // Empty when a command already printed its failure and only sets the exit code.
  if (message.length > 0) {
    if (output === 'text') {
      process.stderr.write(`${message}\n`);
    } else {
      print(failure('CLI_USAGE_ERROR', message, { commanderCode: err.code }));
    }
  }
  return err.exitCode === 0 ? 1 : err.exitCode;
}

async function run(argv: readonly string[]): Promise<number> {
  const output = requestedOutput(argv.slice(2));
  setConfig({ output });

  const program = createProgram();
  throwInsteadOfExit(program);
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return usageExit(err, output);
    throw err;
  }
}

// Servers and tools run in their own process groups and miss the terminal's
// Ctrl-C, so an interrupted run takes them down explicitly.
for (const [signal, code] of INTERRUPTS) {
  process.once(signal, () => {
    killLiveGroups();
    process.exit(code);
  });
}

run(process.argv).then(
  (code) => process.exit(code),
  (err: unknown) => {
    print(failure('CLI_FATAL', errorMessage(err)));
    process.exit(1);
  }
);
