import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { ArgumentValidationError } from './args';

/**
 * Detect Commander-thrown usage/control-flow errors so command handlers can rethrow
 * them instead of reporting them as harness failures.
 */
export function isCommanderError(err: unknown): boolean {
  if (err instanceof CommanderError) return true;
  if (!err || typeof err !== 'object' || !('code' in err)) return false;
  return typeof err.code === 'string' && err.code.startsWith('commander.');
}

/**
 * Repeatable string option; every occurrence is kept in order. Values rejected by
 * `parse` become Commander usage errors.
 */
export function repeatableOption(
  flags: string,
  description: string,
  parse: (value: string) => string = (value) => value
): Option {
  return new Option(flags, description).argParser((value: string, previous: string[] | undefined) => {
    try {
      return [...(previous ?? []), parse(value)];
    } catch (err) {
      if (err instanceof ArgumentValidationError) throw new InvalidArgumentError(err.message);
      throw err;
    }
  });
}

/**
 * Show help when a command group is run without a subcommand; error on unknown ones.
 */
export function helpOrUnknown(program: Command): void {
  program.action(function (this: Command) {
    if (this.args.length > 0) {
      this.error(`unknown command '${this.args[0]}'`);
    }
    program.help();
  });
}
