import { execFile } from 'node:child_process';
import { CommandFailedError } from '../errors.js';
import type { CommandRunner, OutputFilter, RunCommandOptions } from '../types.js';

const MAX_BUFFER = 64 * 1024 * 1024;

const LINE_FILTERS: Record<OutputFilter, RegExp> = {
  'no-empty-lines': /[^\s]/,
};

/**
 * Apply newline normalization and the optional line filter to raw output.
 */
export function processOutput(raw: string, options: RunCommandOptions = {}): string {
  let text = raw;
  if (options.normalizeNewlines ?? true) {
    text = text.replace(/\r\n/g, '\n').replace(/\n+$/, '');
  }

  if (options.filter) {
    const pattern = LINE_FILTERS[options.filter];
    text = text
      .split('\n')
      .filter((line) => pattern.test(line))
      .join('\n');
  }

  return text;
}

function readExitCode(code: unknown): number | null {
  return typeof code === 'number' ? code : null;
}

/**
 * Runs external tools through execFile. No shell, no timeout: the caller
 * waits for the tool to exit however long that takes.
 */
export class ExecFileRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunCommandOptions = {}): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        {
          cwd: options.cwd,
          encoding: options.encoding ?? 'utf8',
          maxBuffer: MAX_BUFFER,
        },
        (error, stdout, stderr) => {
          const capturedStderr = options.stderr === 'discard' ? '' : stderr;
          if (error) {
            reject(
              new CommandFailedError({
                command,
                args,
                exitCode: readExitCode(error.code),
                stdout,
                stderr: capturedStderr,
                cause: error,
              }),
            );
            return;
          }
          resolve(processOutput(stdout, options));
        },
      );
    });
  }
}
