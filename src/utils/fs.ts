/**
 * Filesystem helpers for stage outputs.
 */

import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

/**
 * Write a file via a sibling temp file and a rename, creating parent
 * directories as needed. A reader never sees a half-written artifact.
 */
export function writeFileAtomic(path: string, content: string): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });

  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.tmp`);
  try {
    writeFileSync(tmpPath, content, 'utf-8');
    renameSync(tmpPath, path);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
}
