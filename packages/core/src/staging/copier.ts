import { cp } from 'node:fs/promises';
import type { CommandRunner, SyncTool, TreeCopier } from '../types.js';

function withTrailingSlash(dirPath: string): string {
  return dirPath.endsWith('/') ? dirPath : `${dirPath}/`;
}

/**
 * `rsync -a src/ dst/`: archive mode keeps permissions, ownership and
 * timestamps, which dpkg-deb relies on for maintainer scripts.
 */
export class RsyncTreeCopier implements TreeCopier {
  constructor(private readonly runner: CommandRunner) {}

  async copy(sourceDir: string, targetDir: string): Promise<void> {
    await this.runner.run('rsync', ['-a', withTrailingSlash(sourceDir), withTrailingSlash(targetDir)]);
  }
}

/**
 * In-process copy for hosts without rsync. Modes and timestamps are kept;
 * ownership is whatever the current user gets.
 */
export class NodeTreeCopier implements TreeCopier {
  async copy(sourceDir: string, targetDir: string): Promise<void> {
    await cp(sourceDir, targetDir, {
      recursive: true,
      preserveTimestamps: true,
      force: true,
    });
  }
}

export function createTreeCopier(tool: SyncTool, runner: CommandRunner): TreeCopier {
  return tool === 'builtin' ? new NodeTreeCopier() : new RsyncTreeCopier(runner);
}
