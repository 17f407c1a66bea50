import type { PackageBuilder } from '../builder/package-builder.js';
import type { RepositoryIndexer } from '../indexer/repository-indexer.js';
import { normalizePackageName, type BuildLayout } from '../layout.js';
import type { StalenessOracle } from '../staleness/oracle.js';
import type { BuiltPackage, FileSystem, OutputSink, RunReport, RunSelection, SkippedPackage } from '../types.js';

export interface BuildOrchestratorOptions {
  layout: BuildLayout;
  fs: FileSystem;
  oracle: StalenessOracle;
  builder: PackageBuilder;
  indexer: RepositoryIndexer;
  output: OutputSink;
}

/**
 * Top-level build pass: select → build each candidate in order → refresh
 * the repository index if anything was built.
 */
export class BuildOrchestrator {
  private readonly options: BuildOrchestratorOptions;

  constructor(options: BuildOrchestratorOptions) {
    this.options = options;
  }

  /**
   * Turn a selection into the sorted list of packages to build.
   * An explicit package is taken as-is, without checking staleness or
   * even existence; the builder reports a missing control file.
   */
  async resolveSelection(selection: RunSelection): Promise<string[]> {
    const { fs, layout, oracle } = this.options;

    switch (selection.kind) {
      case 'package':
        return [normalizePackageName(selection.name)];
      case 'all':
        return oracle.selectCandidates(await fs.listDirectory(layout.codeSourceDir), true);
      case 'changed':
        return oracle.selectCandidates(await fs.listDirectory(layout.codeSourceDir), false);
    }
  }

  async run(selection: RunSelection): Promise<RunReport> {
    const { builder, indexer, output } = this.options;
    const candidates = await this.resolveSelection(selection);
    const built: BuiltPackage[] = [];
    const skipped: SkippedPackage[] = [];

    for (const packageName of candidates) {
      output.indent(`Building package "${packageName}"`);
      let result;
      try {
        result = await builder.build(packageName);
      } finally {
        output.unindent();
      }

      if (result.status === 'fatal') {
        throw result.error;
      }
      if (result.status === 'built') {
        built.push(result);
        output.info(`done with "${packageName}"`);
      } else {
        skipped.push(result);
        output.warn(`skipping package "${packageName}"`);
      }
    }

    let indexRefreshed = false;
    if (built.length === 0) {
      output.info('Not rebuilding APT repository metadata (no packages updated)');
    } else {
      await indexer.refresh();
      indexRefreshed = true;
    }

    return { selection, candidates, built, skipped, indexRefreshed };
  }
}
