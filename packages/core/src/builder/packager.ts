import type { CommandRunner } from '../types.js';

export interface Packager {
  /** Build the archive at artifactPath from stagingPath and return the tool's output */
  pack(stagingPath: string, artifactPath: string): Promise<string>;
}

/**
 * `dpkg-deb --build <staging> <artifact>`, run from the output directory.
 */
export class DpkgDebPackager implements Packager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly workingDir: string,
  ) {}

  pack(stagingPath: string, artifactPath: string): Promise<string> {
    return this.runner.run('dpkg-deb', ['--build', stagingPath, artifactPath], {
      cwd: this.workingDir,
      filter: 'no-empty-lines',
    });
  }
}
