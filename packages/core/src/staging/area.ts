import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { BuildError, StagingError } from '../errors.js';
import type { TreeCopier } from '../types.js';
import { DEFAULT_EXCLUSIONS, pruneExcluded } from './exclusions.js';

export interface StagingLease {
  readonly path: string;
  /** Tear the staging directory down. Safe to call more than once. */
  release(): Promise<void>;
}

export interface StagingAreaOptions {
  stagingPath: string;
  copier: TreeCopier;
  exclusions?: readonly string[];
}

/**
 * The single working directory packages are staged into.
 *
 * Only one lease can be outstanding at a time. A directory left behind by
 * an interrupted run is removed before the next copy.
 */
export class StagingArea {
  readonly path: string;

  private readonly copier: TreeCopier;

  private readonly exclusions: readonly string[];

  private active: StagingLease | undefined;

  constructor(options: StagingAreaOptions) {
    this.path = path.resolve(options.stagingPath);
    this.copier = options.copier;
    this.exclusions = options.exclusions ?? DEFAULT_EXCLUSIONS;
  }

  get inUse(): boolean {
    return this.active !== undefined;
  }

  /**
   * Copy sourceDir into the staging path and strip excluded entries.
   */
  async prepare(sourceDir: string): Promise<string> {
    await this.teardown();
    await mkdir(path.dirname(this.path), { recursive: true });

    try {
      await this.copier.copy(sourceDir, this.path);
    } catch (error) {
      if (error instanceof BuildError) {
        throw error;
      }
      throw new StagingError(`failed to copy ${sourceDir} into ${this.path}`, { cause: error });
    }

    await pruneExcluded(this.path, this.exclusions);
    return this.path;
  }

  async teardown(): Promise<void> {
    await rm(this.path, { recursive: true, force: true });
  }

  async acquire(sourceDir: string): Promise<StagingLease> {
    if (this.active) {
      throw new StagingError(`staging area ${this.path} is already in use`);
    }

    let released = false;
    const lease: StagingLease = {
      path: this.path,
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        this.active = undefined;
        await this.teardown();
      },
    };
    this.active = lease;

    try {
      await this.prepare(sourceDir);
    } catch (error) {
      await lease.release();
      throw error;
    }

    return lease;
  }

  /**
   * Run fn against a freshly staged copy of sourceDir; the copy is removed
   * however fn exits.
   */
  async withStaging<T>(sourceDir: string, fn: (stagingPath: string) => Promise<T>): Promise<T> {
    const lease = await this.acquire(sourceDir);
    try {
      return await fn(lease.path);
    } finally {
      await lease.release();
    }
  }
}
