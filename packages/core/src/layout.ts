import path from 'node:path';
import type { BuildRoots } from './types.js';

export const CONTROL_FILE_RELATIVE = path.join('DEBIAN', 'control');
export const ARTIFACT_EXTENSION = '.deb';
export const WORKING_DIR_NAME = '.workingDir';
export const INDEX_FILE_NAME = 'Packages';
export const COMPRESSED_INDEX_SUFFIX = '.gz';

/**
 * Accepts "foo" or "foo.deb" and returns "foo"
 */
export function normalizePackageName(name: string): string {
  return name.endsWith(ARTIFACT_EXTENSION) ? name.slice(0, -ARTIFACT_EXTENSION.length) : name;
}

/**
 * Derives every path a build pass touches from the configured roots.
 */
export class BuildLayout {
  readonly codeSourceDir: string;

  readonly debsDir: string;

  constructor(roots: BuildRoots) {
    this.codeSourceDir = path.resolve(roots.codeSourceDir);
    this.debsDir = path.resolve(roots.debsDir);
  }

  sourceDir(packageName: string): string {
    return path.join(this.codeSourceDir, packageName);
  }

  controlFile(packageName: string): string {
    return path.join(this.sourceDir(packageName), CONTROL_FILE_RELATIVE);
  }

  buildTarget(packageName: string): string {
    return path.join(this.debsDir, `${packageName}${ARTIFACT_EXTENSION}`);
  }

  stagingDir(): string {
    return path.join(this.debsDir, WORKING_DIR_NAME);
  }

  indexFile(): string {
    return path.join(this.debsDir, INDEX_FILE_NAME);
  }

  compressedIndexFile(): string {
    return `${this.indexFile()}${COMPRESSED_INDEX_SUFFIX}`;
  }
}
