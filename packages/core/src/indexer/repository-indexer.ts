import { readFile, rm, writeFile } from 'node:fs/promises';
import * as zlib from 'node:zlib';
import type { BuildLayout } from '../layout.js';
import type { CommandRunner, FileSystem, OutputSink } from '../types.js';

export interface RepositoryIndexerOptions {
  layout: BuildLayout;
  runner: CommandRunner;
  fs: FileSystem;
  output: OutputSink;
}

/**
 * Replace filePath with filePath.gz at the highest compression level,
 * overwriting an existing .gz. Same outcome as `gzip --best --force`.
 */
export async function gzipInPlace(filePath: string): Promise<string> {
  const compressedPath = `${filePath}.gz`;
  const source = await readFile(filePath);

  const compressed = await new Promise<Buffer>((resolve, reject) => {
    zlib.gzip(source, { level: zlib.constants.Z_BEST_COMPRESSION }, (err, result) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(result);
    });
  });

  await writeFile(compressedPath, compressed);
  await rm(filePath, { force: true });
  return compressedPath;
}

/**
 * Regenerates the APT `Packages` index from every .deb in the output
 * directory. There is no incremental path: each refresh rescans everything.
 */
export class RepositoryIndexer {
  private readonly layout: BuildLayout;

  private readonly runner: CommandRunner;

  private readonly fs: FileSystem;

  private readonly output: OutputSink;

  constructor(options: RepositoryIndexerOptions) {
    this.layout = options.layout;
    this.runner = options.runner;
    this.fs = options.fs;
    this.output = options.output;
  }

  async refresh(): Promise<string> {
    this.output.info('rebuilding APT repository metadata');

    // blank lines separate stanzas, so the listing is kept byte for byte
    const listing = await this.runner.run('dpkg-scanpackages', ['./', '/dev/null'], {
      cwd: this.layout.debsDir,
      stderr: 'discard',
      normalizeNewlines: false,
      encoding: 'latin1',
    });

    const indexFile = this.layout.indexFile();
    await this.fs.writeText(indexFile, listing);
    const compressed = await gzipInPlace(indexFile);
    this.output.debug(`wrote ${compressed}`);
    return compressed;
  }
}
