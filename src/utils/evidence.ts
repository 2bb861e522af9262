/**
 * Resolution of sample/evidence references to files on disk.
 */

import { existsSync, statSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';

/** Returns true when a reference points at existing evidence. */
export type EvidenceResolver = (ref: string) => boolean;

/**
 * Resolve references as file paths, relative ones against `root`.
 */
export function createFileEvidenceResolver(root: string): EvidenceResolver {
  return (ref: string): boolean => {
    const trimmed = ref.trim();
    if (trimmed === '') return false;

    const path = isAbsolute(trimmed) ? trimmed : resolve(root, trimmed);
    return existsSync(path) && statSync(path).isFile();
  };
}
