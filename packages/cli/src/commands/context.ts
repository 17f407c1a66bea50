import type { Command } from "commander";
import type { CliDependencies, GlobalOptions } from "../types.js";
import { loadConfig, type DebsmithConfig } from "../utils/config.js";
import { logger } from "../utils/logger.js";

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  globalOptions: GlobalOptions;
  /** Merged configuration, command-line overrides included */
  config: DebsmithConfig;
  deps: CliDependencies;
}

/**
 * Read global options and load configuration for a command about to run.
 * Logger flags are applied earlier, in the program's preAction hook; a
 * configured `color: false` (or NO_COLOR) is applied here.
 */
export async function setupGlobalOptions(
  command: Command,
  deps: CliDependencies
): Promise<CommandContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();

  const config = await loadConfig({
    configPath: opts.config,
    cli: { codeSourceDir: opts.sourceDir, debsDir: opts.debsDir },
    env: deps.env,
    cwd: deps.cwd,
    homeDir: deps.homeDir,
  });

  if (config.color === false) {
    logger.configure({ noColor: true });
  }

  return { globalOptions: opts, config, deps };
}
