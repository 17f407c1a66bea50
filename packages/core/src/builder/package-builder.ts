import { MalformedVersionError, toError } from '../errors.js';
import type { BuildLayout } from '../layout.js';
import type { StagingArea } from '../staging/area.js';
import type {
  BuildResult,
  BuiltPackage,
  FileSystem,
  OutputSink,
  SkippedPackage,
  SkipReason,
  VersionBump,
} from '../types.js';
import { bumpVersion } from '../version/stamp.js';
import type { Packager } from './packager.js';

export interface PackageBuilderOptions {
  layout: BuildLayout;
  fs: FileSystem;
  staging: StagingArea;
  packager: Packager;
  output: OutputSink;
}

function skipped(packageName: string, reason: SkipReason, detail: string): SkippedPackage {
  return { status: 'skipped', package: packageName, reason, detail };
}

/**
 * Drives one package through bump → stage → package → release.
 *
 * A missing control file or an unreadable Version field skips the package.
 * Anything that goes wrong after the bump is reported as fatal; the bump
 * itself has already been written by then.
 */
export class PackageBuilder {
  private readonly layout: BuildLayout;

  private readonly fs: FileSystem;

  private readonly staging: StagingArea;

  private readonly packager: Packager;

  private readonly output: OutputSink;

  constructor(options: PackageBuilderOptions) {
    this.layout = options.layout;
    this.fs = options.fs;
    this.staging = options.staging;
    this.packager = options.packager;
    this.output = options.output;
  }

  async build(packageName: string): Promise<BuildResult> {
    let bump: VersionBump | SkippedPackage;
    try {
      bump = await this.incrementVersion(packageName);
    } catch (error) {
      return { status: 'fatal', package: packageName, error: toError(error) };
    }
    if ('status' in bump) {
      return bump;
    }

    const artifactPath = this.layout.buildTarget(packageName);
    try {
      this.output.info('creating working dir');
      await this.staging.withStaging(this.layout.sourceDir(packageName), async (stagingPath) => {
        try {
          await this.buildArtifact(stagingPath, artifactPath);
        } finally {
          this.output.info('cleaning up working directory');
        }
      });
    } catch (error) {
      return { status: 'fatal', package: packageName, error: toError(error) };
    }

    const built: BuiltPackage = {
      status: 'built',
      package: packageName,
      previousVersion: bump.previousVersion,
      nextVersion: bump.nextVersion,
      artifactPath,
    };
    return built;
  }

  private async incrementVersion(packageName: string): Promise<VersionBump | SkippedPackage> {
    const controlFile = this.layout.controlFile(packageName);
    if (!(await this.fs.exists(controlFile))) {
      this.output.error(`no control file found for ${packageName}`);
      return skipped(packageName, 'missing-control-file', `${controlFile} does not exist`);
    }

    const content = await this.fs.readText(controlFile);
    let bump: VersionBump;
    try {
      bump = bumpVersion(content);
    } catch (error) {
      if (error instanceof MalformedVersionError) {
        this.output.error(`${controlFile}: ${error.message}`);
        return skipped(packageName, 'malformed-version', error.message);
      }
      throw error;
    }

    this.output.info(`incremented package version from ${bump.previousVersion} to ${bump.nextVersion}`);
    await this.fs.writeText(controlFile, bump.content);
    return bump;
  }

  private async buildArtifact(stagingPath: string, artifactPath: string): Promise<void> {
    this.output.indent('building .deb file');
    try {
      await this.fs.remove(artifactPath);
      const toolOutput = await this.packager.pack(stagingPath, artifactPath);
      for (const line of toolOutput.split('\n')) {
        if (line.length > 0) {
          this.output.info(line);
        }
      }
    } finally {
      this.output.unindent();
    }
  }
}
