/**
 * Shared types for the build pipeline
 */

/**
 * Which packages a build pass covers
 */
export type RunSelection =
  | { kind: 'changed' }
  | { kind: 'all' }
  | { kind: 'package'; name: string };

/**
 * The two roots every path in a build pass is derived from
 */
export interface BuildRoots {
  /** Directory holding one sub-directory per source package */
  codeSourceDir: string;
  /** Directory receiving .deb artifacts and the repository index */
  debsDir: string;
}

/**
 * Hierarchical progress log. Purely observational: nothing in the
 * pipeline reads it back.
 */
export interface OutputSink {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Print a heading and nest subsequent output under it */
  indent(message: string): void;
  unindent(): void;
}

export type OutputFilter = 'no-empty-lines';

export interface RunCommandOptions {
  cwd?: string;
  filter?: OutputFilter;
  /** 'discard' throws standard error away instead of keeping it for diagnostics */
  stderr?: 'capture' | 'discard';
  /** CRLF → LF and trailing newlines stripped. Defaults to true. */
  normalizeNewlines?: boolean;
  /** How stdout is decoded. 'latin1' maps each byte to one character. Defaults to 'utf8'. */
  encoding?: OutputEncoding;
}

export type OutputEncoding = 'utf8' | 'latin1';

export interface CommandRunner {
  /**
   * Run an external command to completion and return its standard output.
   * Rejects with CommandFailedError on a non-zero exit.
   */
  run(command: string, args: readonly string[], options?: RunCommandOptions): Promise<string>;
}

export interface FileSystem {
  listDirectory(dirPath: string): Promise<string[]>;
  exists(targetPath: string): Promise<boolean>;
  isDirectory(targetPath: string): Promise<boolean>;
  /** Read a file one character per byte; writeText restores the same bytes */
  readText(filePath: string): Promise<string>;
  writeText(filePath: string, content: string): Promise<void>;
  /** Remove a file or directory tree; a missing path is not an error */
  remove(targetPath: string): Promise<void>;
  /** Regular files under dirPath modified strictly after referencePath */
  findNewerFiles(dirPath: string, referencePath: string): Promise<string[]>;
}

export interface TreeCopier {
  /** Copy the contents of sourceDir into targetDir, preserving attributes */
  copy(sourceDir: string, targetDir: string): Promise<void>;
}

export type SyncTool = 'rsync' | 'builtin';

export interface VersionBump {
  previousVersion: string;
  nextVersion: string;
  /** Control file contents with only the version token rewritten */
  content: string;
}

export type SkipReason = 'missing-control-file' | 'malformed-version';

export interface BuiltPackage {
  status: 'built';
  package: string;
  previousVersion: string;
  nextVersion: string;
  artifactPath: string;
}

export interface SkippedPackage {
  status: 'skipped';
  package: string;
  reason: SkipReason;
  detail: string;
}

export interface FailedPackage {
  status: 'fatal';
  package: string;
  error: Error;
}

export type BuildResult = BuiltPackage | SkippedPackage | FailedPackage;

export interface RunReport {
  selection: RunSelection;
  candidates: string[];
  built: BuiltPackage[];
  skipped: SkippedPackage[];
  indexRefreshed: boolean;
}
