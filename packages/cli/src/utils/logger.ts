/**
 * Logger utility for CLI output
 *
 * Respects --verbose, --quiet, --no-color, --json flags. The logger also
 * serves as the build pipeline's output sink: indent() opens a nested
 * section and every line inside it is shifted two spaces to the right.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { OutputSink } from "@debsmith/core";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger configuration options
 */
export interface LoggerOptions {
  /** Enable verbose output (shows debug level) */
  verbose?: boolean;
  /** Minimize output (only show errors and json output) */
  quiet?: boolean;
  /** Disable color output */
  noColor?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * JSON log entry structure
 */
export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  depth?: number;
}

export interface Logger extends OutputSink {
  /** Info line with a green checkmark */
  success(message: string): void;
  /** Log message at info level and nest everything after it one level deeper */
  indent(message: string): void;
  unindent(): void;
  /** Output JSON data directly */
  json(data: unknown): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const INDENT_WIDTH = 2;

const plainChalk = new Chalk({ level: 0 });

let globalOptions: LoggerOptions = {
  verbose: false,
  quiet: false,
  noColor: false,
  json: false,
};

let depth = 0;

/**
 * Chalk instance honoring --no-color
 */
export function getChalk(): ChalkInstance {
  return globalOptions.noColor ? plainChalk : chalk;
}

function shouldOutput(level: LogLevel): boolean {
  if (globalOptions.quiet) {
    return level === "error";
  }

  if (!globalOptions.verbose && level === "debug") {
    return false;
  }

  return true;
}

function writeStdout(message: string): void {
  process.stdout.write(message + "\n");
}

function writeStderr(message: string): void {
  process.stderr.write(message + "\n");
}

function formatTextMessage(level: LogLevel, message: string, prefix?: string): string {
  const c = getChalk();

  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return prefix ? `${prefix} ${message}` : message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function outputLog(level: LogLevel, message: string, prefix?: string): void {
  if (!shouldOutput(level)) {
    return;
  }

  if (globalOptions.json) {
    const entry: JsonLogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };
    if (depth > 0) {
      entry.depth = depth;
    }
    writeStdout(JSON.stringify(entry));
    return;
  }

  const padding = " ".repeat(depth * INDENT_WIDTH);
  const formattedMessage = padding + formatTextMessage(level, message, prefix);

  if (level === "error" || level === "warn") {
    writeStderr(formattedMessage);
  } else {
    writeStdout(formattedMessage);
  }
}

function createLoggerInstance(): Logger {
  return {
    debug(message: string): void {
      outputLog("debug", message);
    },

    info(message: string): void {
      outputLog("info", message);
    },

    warn(message: string): void {
      outputLog("warn", message);
    },

    error(message: string): void {
      outputLog("error", message);
    },

    success(message: string): void {
      outputLog("info", message, getChalk().green("✓"));
    },

    indent(message: string): void {
      outputLog("info", message);
      depth += 1;
    },

    unindent(): void {
      depth = Math.max(0, depth - 1);
    },

    json(data: unknown): void {
      // stdout regardless of quiet mode
      writeStdout(JSON.stringify(data, null, globalOptions.json ? 0 : 2));
    },

    configure(options: LoggerOptions): void {
      globalOptions = { ...globalOptions, ...options };
    },

    getOptions(): Readonly<LoggerOptions> {
      return { ...globalOptions };
    },
  };
}

/**
 * Default logger instance
 */
export const logger = createLoggerInstance();

export const debug = logger.debug.bind(logger);
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const error = logger.error.bind(logger);
export const success = logger.success.bind(logger);
export const json = logger.json.bind(logger);

/**
 * Configure the global logger and reset nesting
 */
export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
  depth = 0;
}

export function getLoggerOptions(): Readonly<LoggerOptions> {
  return logger.getOptions();
}
