import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Fresh parent directory for fixture temp dirs, so a test can check that
 * nothing was left behind in it.
 */
export function createTmpRoot(label: string): string {
  return mkdtempSync(join(tmpdir(), `nest-harness-${label}-`));
}

export function listEntries(dir: string): string[] {
  return readdirSync(dir).sort();
}

export function removeTmpRoot(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
