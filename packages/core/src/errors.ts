/**
 * Error types raised by the build pipeline
 *
 * MalformedVersionError is the only one a build pass recovers from;
 * everything else aborts the run.
 */

export class BuildError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BuildError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedVersionError extends BuildError {
  constructor(message: string) {
    super('MALFORMED_VERSION', message);
    this.name = 'MalformedVersionError';
  }
}

export interface CommandFailure {
  command: string;
  args: readonly string[];
  exitCode: number | null;
  stdout: string;
  stderr: string;
  cause?: unknown;
}

export class CommandFailedError extends BuildError {
  readonly command: string;

  readonly args: readonly string[];

  readonly exitCode: number | null;

  readonly stdout: string;

  readonly stderr: string;

  constructor(failure: CommandFailure) {
    super('TOOL_FAILED', describeFailure(failure), { cause: failure.cause });
    this.name = 'CommandFailedError';
    this.command = failure.command;
    this.args = failure.args;
    this.exitCode = failure.exitCode;
    this.stdout = failure.stdout;
    this.stderr = failure.stderr;
  }
}

export class StagingError extends BuildError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STAGING_ERROR', message, options);
    this.name = 'StagingError';
  }
}

function describeFailure(failure: CommandFailure): string {
  const status = failure.exitCode === null ? 'failed to run' : `exited with code ${failure.exitCode}`;
  const detail = failure.stderr.trim() || failure.stdout.trim() || readCauseMessage(failure.cause);
  const head = `${failure.command} ${status}`;
  return detail.length > 0 ? `${head}: ${detail}` : head;
}

function readCauseMessage(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return '';
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
