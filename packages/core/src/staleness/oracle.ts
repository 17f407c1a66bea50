import type { BuildLayout } from '../layout.js';
import type { FileSystem, OutputSink } from '../types.js';

/**
 * Decides which packages need a rebuild.
 *
 * A package is stale when it has no artifact yet, or when any regular file
 * in its source tree is newer than the artifact. Directory timestamps are
 * ignored: the sync tool that feeds the source root touches them at random.
 */
export class StalenessOracle {
  constructor(
    private readonly layout: BuildLayout,
    private readonly fs: FileSystem,
    private readonly output: OutputSink,
  ) {}

  async isStale(packageName: string): Promise<boolean> {
    const target = this.layout.buildTarget(packageName);
    if (!(await this.fs.exists(target))) {
      return true;
    }

    const changed = await this.fs.findNewerFiles(this.layout.sourceDir(packageName), target);
    if (changed.length > 0) {
      this.output.debug(`"${packageName}" has ${changed.length} file(s) newer than ${target}`);
    }
    return changed.length > 0;
  }

  /**
   * A package is a directory under the source root that holds a control file.
   */
  async isBuildable(packageName: string): Promise<boolean> {
    if (!(await this.fs.isDirectory(this.layout.sourceDir(packageName)))) {
      return false;
    }
    return this.fs.exists(this.layout.controlFile(packageName));
  }

  async selectCandidates(packageNames: readonly string[], forceAll: boolean): Promise<string[]> {
    const candidates: string[] = [];

    for (const packageName of [...packageNames].sort()) {
      if (!(await this.isBuildable(packageName))) {
        this.output.debug(`ignoring "${packageName}" - not a package directory`);
        continue;
      }

      if (forceAll || (await this.isStale(packageName))) {
        candidates.push(packageName);
      } else {
        this.output.info(`skipping package "${packageName}" - .deb file already current`);
      }
    }

    return candidates;
  }
}
