/**
 * debsmith build command
 *
 * Rebuilds changed packages (or all, or one named package), bumping each
 * package's patch version, then refreshes the APT index when anything was built.
 */

import { mkdir, stat } from "node:fs/promises";
import { Command } from "commander";
import { createBuildOrchestrator, isErrnoException, type RunSelection } from "@debsmith/core";
import { configError, usageError } from "../errors.js";
import { formatBuildSummary, toReportJson } from "../formatter.js";
import type { CliDependencies } from "../types.js";
import { resolveBuildRoots } from "../utils/config.js";
import { logger, success } from "../utils/logger.js";
import { setupGlobalOptions, type CommandContext } from "./context.js";

export interface BuildCommandOptions {
  all?: boolean;
  package?: string;
}

/**
 * --all wins over --package; neither means "changed packages only".
 */
export function toSelection(options: BuildCommandOptions): RunSelection {
  if (options.all) {
    return { kind: "all" };
  }
  if (options.package !== undefined) {
    const name = options.package.trim();
    if (name.length === 0) {
      throw usageError("Package name must not be empty", "Pass a directory name from the source root, e.g. --package tools");
    }
    return { kind: "package", name };
  }
  return { kind: "changed" };
}

async function assertDirectory(dirPath: string, key: string): Promise<void> {
  try {
    const stats = await stat(dirPath);
    if (stats.isDirectory()) {
      return;
    }
  } catch (err) {
    if (!(isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR"))) {
      throw err;
    }
  }
  throw configError(`${key} ${dirPath} is not a directory`, `Run "debsmith config set ${key} <path>".`);
}

async function executeBuild(options: BuildCommandOptions, context: CommandContext): Promise<void> {
  const { config, deps, globalOptions } = context;
  const selection = toSelection(options);

  const roots = await resolveBuildRoots(config, {
    interactive: deps.interactive,
    ask: deps.ask,
    cwd: deps.cwd,
    homeDir: deps.homeDir,
  });
  await assertDirectory(roots.codeSourceDir, "codeSourceDir");
  await mkdir(roots.debsDir, { recursive: true });

  const orchestrator = createBuildOrchestrator({
    roots,
    output: logger,
    runner: deps.runner,
    syncTool: config.syncTool,
  });
  const report = await orchestrator.run(selection);

  if (globalOptions.json) {
    logger.json(toReportJson(report));
    return;
  }
  success(formatBuildSummary(report));
}

export function createBuildCommand(deps: CliDependencies): Command {
  return new Command("build")
    .description("Build .deb packages from the source root")
    .option("-a, --all", "Rebuild every package, current or not", false)
    .option("-p, --package <name>", "Build only this package, whether or not it changed")
    .action(async (options: BuildCommandOptions, cmd: Command) => {
      const context = await setupGlobalOptions(cmd, deps);
      await executeBuild(options, context);
    });
}
