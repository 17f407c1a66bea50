/**
 * debsmith core - staleness detection and build orchestration
 *
 * @packageDocumentation
 */

export type * from './types.js';

export {
  BuildError,
  MalformedVersionError,
  CommandFailedError,
  StagingError,
  isErrnoException,
  toError,
} from './errors.js';
export type { CommandFailure } from './errors.js';

export {
  BuildLayout,
  normalizePackageName,
  CONTROL_FILE_RELATIVE,
  ARTIFACT_EXTENSION,
  WORKING_DIR_NAME,
  INDEX_FILE_NAME,
  COMPRESSED_INDEX_SUFFIX,
} from './layout.js';

export { bumpVersion, parseVersion } from './version/stamp.js';
export { ExecFileRunner, processOutput } from './process/runner.js';
export { NodeFileSystem } from './fs/node-fs.js';
export { StalenessOracle } from './staleness/oracle.js';

export { StagingArea } from './staging/area.js';
export type { StagingLease, StagingAreaOptions } from './staging/area.js';
export { DEFAULT_EXCLUSIONS, isExcluded, pruneExcluded } from './staging/exclusions.js';
export { RsyncTreeCopier, NodeTreeCopier, createTreeCopier } from './staging/copier.js';

export { DpkgDebPackager } from './builder/packager.js';
export type { Packager } from './builder/packager.js';
export { PackageBuilder } from './builder/package-builder.js';
export type { PackageBuilderOptions } from './builder/package-builder.js';

export { RepositoryIndexer, gzipInPlace } from './indexer/repository-indexer.js';
export type { RepositoryIndexerOptions } from './indexer/repository-indexer.js';

export { BuildOrchestrator } from './orchestrator/orchestrator.js';
export type { BuildOrchestratorOptions } from './orchestrator/orchestrator.js';

export { createBuildOrchestrator } from './factory.js';
export type { CreateBuildOrchestratorOptions } from './factory.js';
