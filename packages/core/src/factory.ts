import { PackageBuilder } from './builder/package-builder.js';
import { DpkgDebPackager, type Packager } from './builder/packager.js';
import { NodeFileSystem } from './fs/node-fs.js';
import { RepositoryIndexer } from './indexer/repository-indexer.js';
import { BuildLayout } from './layout.js';
import { BuildOrchestrator } from './orchestrator/orchestrator.js';
import { ExecFileRunner } from './process/runner.js';
import { StalenessOracle } from './staleness/oracle.js';
import { StagingArea } from './staging/area.js';
import { createTreeCopier } from './staging/copier.js';
import { DEFAULT_EXCLUSIONS } from './staging/exclusions.js';
import type { BuildRoots, CommandRunner, FileSystem, OutputSink, SyncTool } from './types.js';

export interface CreateBuildOrchestratorOptions {
  roots: BuildRoots;
  output: OutputSink;
  runner?: CommandRunner;
  fs?: FileSystem;
  syncTool?: SyncTool;
  packager?: Packager;
  exclusions?: readonly string[];
}

/**
 * Wire the default collaborators into a ready-to-run orchestrator.
 */
export function createBuildOrchestrator(options: CreateBuildOrchestratorOptions): BuildOrchestrator {
  const layout = new BuildLayout(options.roots);
  const runner = options.runner ?? new ExecFileRunner();
  const fs = options.fs ?? new NodeFileSystem();
  const { output } = options;

  const staging = new StagingArea({
    stagingPath: layout.stagingDir(),
    copier: createTreeCopier(options.syncTool ?? 'rsync', runner),
    exclusions: options.exclusions ?? DEFAULT_EXCLUSIONS,
  });

  const builder = new PackageBuilder({
    layout,
    fs,
    staging,
    packager: options.packager ?? new DpkgDebPackager(runner, layout.debsDir),
    output,
  });

  return new BuildOrchestrator({
    layout,
    fs,
    oracle: new StalenessOracle(layout, fs, output),
    builder,
    indexer: new RepositoryIndexer({ layout, runner, fs, output }),
    output,
  });
}
