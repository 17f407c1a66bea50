import type { CommandRunner } from "@debsmith/core";
import type { ConfigEnvironment } from "./utils/config.js";

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Configuration file path */
  config?: string;
  /** Package source root, overriding the configured one */
  sourceDir?: string;
  /** Output root, overriding the configured one */
  debsDir?: string;
  /** Disable color output (commander stores --no-color as color: false) */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Everything the CLI takes from its surroundings. Tests replace these to
 * run commands without touching the real home directory or tools.
 */
export interface CliDependencies {
  env: ConfigEnvironment;
  cwd: string;
  homeDir: string;
  /** Whether missing settings may be asked for */
  interactive: boolean;
  ask: (question: string) => Promise<string>;
  /** Runner for external tools; the core default when absent */
  runner?: CommandRunner;
}
