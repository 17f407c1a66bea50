import { readdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { minimatch } from 'minimatch';
import { isErrnoException } from '../errors.js';

/**
 * Entry names that never belong in a built package: VCS metadata,
 * editor project files, bytecode, debug markers and repository docs.
 */
export const DEFAULT_EXCLUSIONS: readonly string[] = [
  '.svn',
  '.cache',
  '.project',
  '.pydevproject',
  '*.pyc',
  '.DEBUG',
  '.git',
  'README.md',
];

export function isExcluded(entryName: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(entryName, pattern, { dot: true }));
}

/**
 * Recursively delete every entry under root whose base name matches one
 * of the patterns. The root itself is never matched. Entries that disappear
 * while the tree is being walked are skipped.
 *
 * @returns removed paths, in walk order
 */
export async function pruneExcluded(root: string, patterns: readonly string[]): Promise<string[]> {
  const removed: string[] = [];
  await pruneDirectory(root, patterns, removed);
  return removed;
}

async function pruneDirectory(dirPath: string, patterns: readonly string[], removed: string[]): Promise<void> {
  let entries;
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return;
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (isExcluded(entry.name, patterns)) {
      await rm(entryPath, { recursive: true, force: true });
      removed.push(entryPath);
      continue;
    }
    if (entry.isDirectory()) {
      await pruneDirectory(entryPath, patterns, removed);
    }
  }
}
