import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { join, dirname } from 'path';
import { tmpdir } from 'os';

/** Fresh empty directory under the OS temp dir. */
export function createFixture(name: string): string {
  return mkdtempSync(join(tmpdir(), `projsnap-${name}-`));
}

/** Write `files` (relative path → content) below `root`, creating directories as needed. */
export function writeFiles(root: string, files: Record<string, string | Uint8Array>): void {
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}

export function removeFixture(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
