import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CommandRunner, OutputSink, RunCommandOptions } from '../src/types.js';

export type OutputLevel = 'debug' | 'info' | 'warn' | 'error';

export interface OutputLine {
  level: OutputLevel;
  depth: number;
  message: string;
}

export class RecordingOutput implements OutputSink {
  readonly lines: OutputLine[] = [];

  private depth = 0;

  debug(message: string): void {
    this.record('debug', message);
  }

  info(message: string): void {
    this.record('info', message);
  }

  warn(message: string): void {
    this.record('warn', message);
  }

  error(message: string): void {
    this.record('error', message);
  }

  indent(message: string): void {
    this.record('info', message);
    this.depth += 1;
  }

  unindent(): void {
    this.depth = Math.max(0, this.depth - 1);
  }

  get currentDepth(): number {
    return this.depth;
  }

  messages(level?: OutputLevel): string[] {
    return this.lines
      .filter((line) => level === undefined || line.level === level)
      .map((line) => line.message);
  }

  private record(level: OutputLevel, message: string): void {
    this.lines.push({ level, depth: this.depth, message });
  }
}

export interface RecordedCommand {
  command: string;
  args: string[];
  options: RunCommandOptions;
}

export type CommandHandler = (args: readonly string[], options: RunCommandOptions) => Promise<string> | string;

/**
 * In-process stand-in for external tools. Commands without a handler
 * succeed with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly handlers: Record<string, CommandHandler> = {}) {}

  async run(command: string, args: readonly string[], options: RunCommandOptions = {}): Promise<string> {
    this.calls.push({ command, args: [...args], options });
    const handler = this.handlers[command];
    if (!handler) {
      return '';
    }
    return handler(args, options);
  }

  commands(): string[] {
    return this.calls.map((call) => call.command);
  }
}

/**
 * Behaves like dpkg-deb --build: writes the artifact named by the last
 * argument and records what the staging directory held at that moment.
 */
export function createDpkgDebHandler(snapshots: Map<string, string[]> = new Map()): CommandHandler {
  return async (args) => {
    const stagingPath = args[1];
    const artifactPath = args[2];
    if (stagingPath === undefined || artifactPath === undefined) {
      throw new Error('dpkg-deb called without staging and artifact paths');
    }
    snapshots.set(path.basename(artifactPath), await listTree(stagingPath));
    await fs.writeFile(artifactPath, `deb:${path.basename(artifactPath)}`, 'utf8');
    return `dpkg-deb: building package in '${artifactPath}'.`;
  };
}

export async function createTempDir(prefix = 'debsmith-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface PackageFixture {
  version?: string;
  control?: string;
  files?: Record<string, string>;
}

export function controlFileFor(name: string, version: string): string {
  return [
    `Package: ${name}`,
    `Version: ${version}`,
    'Architecture: all',
    'Maintainer: Test Maintainer <maintainer@example.com>',
    `Description: ${name} test package`,
    '',
  ].join('\n');
}

/**
 * Create {sourceRoot}/{name} with a DEBIAN/control file and extra files.
 * Pass control: '' to omit the control file entirely.
 */
export async function writePackage(sourceRoot: string, name: string, fixture: PackageFixture = {}): Promise<string> {
  const packageDir = path.join(sourceRoot, name);
  await fs.mkdir(packageDir, { recursive: true });

  const control = fixture.control ?? controlFileFor(name, fixture.version ?? '1.0.0');
  if (control.length > 0) {
    await fs.mkdir(path.join(packageDir, 'DEBIAN'), { recursive: true });
    await fs.writeFile(path.join(packageDir, 'DEBIAN', 'control'), control, 'utf8');
  }

  for (const [relativePath, content] of Object.entries(fixture.files ?? {})) {
    const filePath = path.join(packageDir, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf8');
  }

  return packageDir;
}

/**
 * Set the mtime of every entry under root (root included).
 */
export async function setTreeMtime(root: string, time: Date): Promise<void> {
  const entries = await fs.readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      await setTreeMtime(entryPath, time);
    } else {
      await fs.utimes(entryPath, time, time);
    }
  }
  await fs.utimes(root, time, time);
}

/**
 * Relative paths of every file and directory under root, sorted.
 */
export async function listTree(root: string, prefix = ''): Promise<string[]> {
  const result: string[] = [];
  const entries = await fs.readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
    result.push(relativePath);
    if (entry.isDirectory()) {
      result.push(...(await listTree(path.join(root, entry.name), relativePath)));
    }
  }
  return result.sort();
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

export const OLD_TIME = new Date('2024-01-01T00:00:00.000Z');
export const BUILD_TIME = new Date('2024-06-01T00:00:00.000Z');
export const NEW_TIME = new Date('2024-09-01T00:00:00.000Z');
