import { access, lstat, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { isErrnoException } from '../errors.js';
import type { FileSystem } from '../types.js';

function isMissing(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * FileSystem backed by node:fs.
 *
 * Text goes through latin1, one character per byte, so a file that is not
 * valid UTF-8 is written back exactly as it was read.
 *
 * findNewerFiles mirrors `find <dir> -type f -newer <ref>`: only regular
 * files count (directories and symlinks are never reported), compared at
 * nanosecond precision.
 */
export class NodeFileSystem implements FileSystem {
  async listDirectory(dirPath: string): Promise<string[]> {
    return readdir(dirPath);
  }

  async exists(targetPath: string): Promise<boolean> {
    try {
      await access(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(targetPath: string): Promise<boolean> {
    try {
      const stats = await stat(targetPath);
      return stats.isDirectory();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'latin1');
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await writeFile(filePath, content, 'latin1');
  }

  async remove(targetPath: string): Promise<void> {
    await rm(targetPath, { recursive: true, force: true });
  }

  async findNewerFiles(dirPath: string, referencePath: string): Promise<string[]> {
    const reference = await stat(referencePath, { bigint: true });
    const newer: string[] = [];
    await this.collectNewer(dirPath, reference.mtimeNs, newer);
    return newer.sort();
  }

  private async collectNewer(dirPath: string, threshold: bigint, newer: string[]): Promise<void> {
    let entries;
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        await this.collectNewer(entryPath, threshold, newer);
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }

      try {
        const stats = await lstat(entryPath, { bigint: true });
        if (stats.mtimeNs > threshold) {
          newer.push(entryPath);
        }
      } catch (error) {
        if (!isMissing(error)) {
          throw error;
        }
      }
    }
  }
}
