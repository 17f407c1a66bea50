import { BuildError, CommandFailedError } from "@debsmith/core";
import { PromptCancelledError } from "./utils/prompt.js";

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  USER_INTERRUPT: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = "CliError";
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isCliError(value: unknown): value is CliError {
  if (!isObjectRecord(value)) {
    return false;
  }

  const code = value["code"];
  const exitCode = value["exitCode"];
  const name = value["name"];

  return typeof code === "string" && typeof exitCode === "number" && name === "CliError";
}

function toolFailure(error: CommandFailedError): CliError {
  return new CliError(
    {
      code: "TOOL_FAILED",
      message: error.message,
      exitCode: EXIT_CODES.GENERAL_ERROR,
      suggestion:
        error.exitCode === null ? `Check that ${error.command} is installed and on your PATH.` : undefined,
    },
    { cause: error }
  );
}

export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (error instanceof PromptCancelledError) {
    return new CliError({
      code: "USER_INTERRUPT",
      message: error.message,
      exitCode: EXIT_CODES.USER_INTERRUPT,
    });
  }

  if (error instanceof CommandFailedError) {
    return toolFailure(error);
  }

  if (error instanceof BuildError) {
    return new CliError(
      { code: error.code, message: error.message, exitCode: EXIT_CODES.GENERAL_ERROR },
      { cause: error }
    );
  }

  if (error instanceof Error) {
    return new CliError(
      {
        code: "INTERNAL_ERROR",
        message: error.message,
        exitCode: EXIT_CODES.GENERAL_ERROR,
        suggestion: "Re-run with --verbose for more detail.",
      },
      { cause: error }
    );
  }

  return new CliError({
    code: "UNKNOWN_ERROR",
    message: "An unknown error occurred.",
    exitCode: EXIT_CODES.GENERAL_ERROR,
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: "INVALID_ARGUMENT",
    message,
    exitCode: EXIT_CODES.INVALID_ARGUMENT,
    suggestion,
  });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: "CONFIG_ERROR",
    message,
    exitCode: EXIT_CODES.CONFIG_ERROR,
    suggestion,
  });
}
