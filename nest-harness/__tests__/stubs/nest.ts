/**
 * Stand-in for the `nest` binary: `nest --config <path> pull`.
 *
 * Reads the TOML config, fetches `<mirror>api/pull` for each repository and
 * stores the listing under `paths.available`. Exit codes: 0 pulled, 1 a
 * repository could not be pulled, 2 bad config, 64 usage.
 *
 * STUB_NEST_MODE:
 *   ok        behave as above (default)
 *   echo      print argv as JSON and exit 0
 *   exit:<n>  exit with <n> immediately
 *   abort     kill itself with SIGKILL
 *   hang      never exit
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import * as TOML from '@iarna/toml';
import { isNestConfig } from '../../src/schemas/registry';

function parseArgs(argv: string[]): { config?: string; command: string[] } {
  const command: string[] = [];
  let config: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--config') {
      config = argv[i + 1];
      i++;
    } else {
      command.push(argv[i]);
    }
  }
  return { config, command };
}

async function pull(configPath: string): Promise<number> {
  let parsed: unknown;
  try {
    parsed = TOML.parse(await readFile(configPath, 'utf-8'));
  } catch (err) {
    process.stderr.write(`nest: unable to load configuration ${configPath}: ${String(err)}\n`);
    return 2;
  }
  if (!isNestConfig(parsed)) {
    process.stderr.write(`nest: invalid configuration ${configPath}\n`);
    return 2;
  }

  for (const [name, repository] of Object.entries(parsed.repositories)) {
    let listing: string | undefined;
    for (const mirror of repository.mirrors) {
      try {
        const res = await fetch(new URL('api/pull', mirror), { signal: AbortSignal.timeout(5_000) });
        if (res.ok) {
          listing = await res.text();
          break;
        }
      } catch {
        // try the next mirror
      }
    }
    if (listing === undefined) {
      process.stderr.write(`nest: unable to pull repository '${name}'\n`);
      return 1;
    }
    await mkdir(parsed.paths.available, { recursive: true });
    await writeFile(join(parsed.paths.available, `${name}.json`), listing, 'utf-8');
    process.stdout.write(`Pulling ${name}... done\n`);
  }
  return 0;
}

async function main(): Promise<number> {
  const mode = process.env['STUB_NEST_MODE'] ?? 'ok';
  const argv = process.argv.slice(2);

  if (mode === 'echo') {
    process.stdout.write(`${JSON.stringify(argv)}\n`);
    return 0;
  }
  if (mode.startsWith('exit:')) return Number(mode.slice('exit:'.length));
  if (mode === 'abort') {
    process.kill(process.pid, 'SIGKILL');
  }
  if (mode === 'hang') {
    setInterval(() => undefined, 1_000);
    return new Promise<number>(() => undefined);
  }

  const { config, command } = parseArgs(argv);
  if (!config || command.length !== 1 || command[0] !== 'pull') {
    process.stderr.write('usage: nest --config <path> pull\n');
    return 64;
  }
  return pull(config);
}

main().then(
  (code) => process.exit(code),
  (err) => {
    process.stderr.write(`nest: ${String(err)}\n`);
    process.exit(1);
  }
);
