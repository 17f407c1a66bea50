/**
 * debsmith config command
 *
 * Manage CLI configuration with get/set/list/delete/path subcommands.
 * Uses ~/.debsmithrc for storing configuration.
 */

import { resolve } from "node:path";
import { Command } from "commander";
import {
  loadConfigFile,
  getGlobalConfigPath,
  getProjectConfigPath,
  setConfigValue,
  deleteConfigValue,
  isSyncTool,
  expandPath,
  type DebsmithConfig,
} from "../utils/config.js";
import { getChalk, success, warn } from "../utils/logger.js";
import { usageError } from "../errors.js";
import type { CliDependencies } from "../types.js";
import { setupGlobalOptions } from "./context.js";

/**
 * Valid configuration keys
 */
export const CONFIG_KEYS = ["codeSourceDir", "debsDir", "syncTool", "color"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

function isValidConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

function requireConfigKey(key: string): ConfigKey {
  if (!isValidConfigKey(key)) {
    throw usageError(`Invalid config key: ${key}`, `Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

function formatValue(value: unknown): string {
  if (value === undefined) {
    return getChalk().gray("(not set)");
  }
  if (typeof value === "boolean") {
    return value ? getChalk().green("true") : getChalk().red("false");
  }
  if (typeof value === "string") {
    return getChalk().cyan(value);
  }
  return getChalk().cyan(JSON.stringify(value));
}

/**
 * Parse a config value from string input. Directory values are stored
 * absolute so the file means the same thing from any working directory.
 */
function parseValue(
  key: ConfigKey,
  valueStr: string,
  deps: CliDependencies
): DebsmithConfig[ConfigKey] {
  switch (key) {
    case "color":
      if (valueStr === "true" || valueStr === "1" || valueStr === "yes") {
        return true;
      }
      if (valueStr === "false" || valueStr === "0" || valueStr === "no") {
        return false;
      }
      throw usageError(`Invalid boolean value: ${valueStr}. Use true/false.`);

    case "syncTool":
      if (!isSyncTool(valueStr)) {
        throw usageError(`Invalid sync tool: ${valueStr}. Valid values: rsync, builtin`);
      }
      return valueStr;

    case "codeSourceDir":
    case "debsDir":
      if (valueStr.trim().length === 0) {
        throw usageError(`${key} must not be empty`);
      }
      return resolve(deps.cwd, expandPath(valueStr.trim(), deps.homeDir));
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value));
}

function createGetCommand(deps: CliDependencies): Command {
  return new Command("get")
    .description("Get a configuration value")
    .argument("<key>", `Config key (${CONFIG_KEYS.join(", ")})`)
    .action(async (key: string, _opts: unknown, cmd: Command) => {
      const configKey = requireConfigKey(key);
      const { config, globalOptions } = await setupGlobalOptions(cmd, deps);
      const value = config[configKey];

      if (globalOptions.json) {
        printJson({ key: configKey, value: value ?? null });
      } else if (value === undefined) {
        console.log(formatValue(value));
      } else {
        console.log(String(value));
      }
    });
}

function createSetCommand(deps: CliDependencies): Command {
  return new Command("set")
    .description("Set a configuration value in the global config")
    .argument("<key>", `Config key (${CONFIG_KEYS.join(", ")})`)
    .argument("<value>", "Config value")
    .action(async (key: string, value: string, _opts: unknown, cmd: Command) => {
      const configKey = requireConfigKey(key);
      const parsedValue = parseValue(configKey, value, deps);
      await setConfigValue(configKey, parsedValue, deps.homeDir);

      if (cmd.optsWithGlobals<{ json?: boolean }>().json) {
        printJson({ key: configKey, value: parsedValue, success: true });
      } else {
        success(`Set ${configKey} = ${formatValue(parsedValue)}`);
      }
    });
}

function createListConfigCommand(deps: CliDependencies): Command {
  return new Command("list")
    .description("List all configuration values")
    .action(async (_opts: unknown, cmd: Command) => {
      await executeConfigList(cmd, deps);
    });
}

async function executeConfigList(cmd: Command, deps: CliDependencies): Promise<void> {
  const { config, globalOptions } = await setupGlobalOptions(cmd, deps);
  const globalPath = getGlobalConfigPath(deps.homeDir);
  const globalConfig = await loadConfigFile(globalPath);
  const projectConfigPath = globalOptions.config
    ? resolve(deps.cwd, expandPath(globalOptions.config, deps.homeDir))
    : getProjectConfigPath(deps.cwd, deps.homeDir);
  const projectConfig = projectConfigPath ? await loadConfigFile(projectConfigPath) : undefined;

  if (globalOptions.json) {
    printJson({
      merged: config,
      global: globalConfig ?? {},
      project: projectConfig ?? {},
      globalPath,
      projectPath: projectConfigPath ?? null,
    });
    return;
  }

  console.log();
  console.log(getChalk().bold("Configuration:"));
  console.log();

  for (const key of CONFIG_KEYS) {
    const mergedValue = config[key];
    const globalValue = globalConfig?.[key];
    const projectValue = projectConfig?.[key];

    let source = "";
    if (projectValue !== undefined) {
      source = getChalk().gray(" (project)");
    } else if (globalValue !== undefined) {
      source = getChalk().gray(" (global)");
    } else if (mergedValue !== undefined) {
      source = getChalk().gray(" (default)");
    }

    console.log(`  ${getChalk().white(key)}: ${formatValue(mergedValue)}${source}`);
  }

  console.log();
  console.log(getChalk().bold("Config files:"));
  console.log(`  Global:  ${getChalk().cyan(globalPath)}`);
  if (projectConfigPath) {
    console.log(`  Project: ${getChalk().cyan(projectConfigPath)}`);
  }
  console.log();
}

function createDeleteCommand(deps: CliDependencies): Command {
  return new Command("delete")
    .description("Delete a configuration value from global config")
    .argument("<key>", `Config key (${CONFIG_KEYS.join(", ")})`)
    .action(async (key: string, _opts: unknown, cmd: Command) => {
      const configKey = requireConfigKey(key);
      const jsonOutput = cmd.optsWithGlobals<{ json?: boolean }>().json === true;
      const globalConfig = await loadConfigFile(getGlobalConfigPath(deps.homeDir));
      const currentValue = globalConfig?.[configKey];

      if (currentValue === undefined) {
        if (jsonOutput) {
          printJson({ key: configKey, deleted: false, reason: "not set" });
        } else {
          warn(`Config key '${configKey}' is not set in global config`);
        }
        return;
      }

      await deleteConfigValue(configKey, deps.homeDir);

      if (jsonOutput) {
        printJson({ key: configKey, deleted: true, previousValue: currentValue });
      } else {
        success(`Deleted ${configKey} (was: ${formatValue(currentValue)})`);
      }
    });
}

function createPathCommand(deps: CliDependencies): Command {
  return new Command("path")
    .description("Show configuration file path(s)")
    .argument("[type]", "Path type: global, project, or all", "all")
    .action((type: string, _opts: unknown, cmd: Command) => {
      const globalPath = getGlobalConfigPath(deps.homeDir);
      const projectPath = getProjectConfigPath(deps.cwd, deps.homeDir);

      if (cmd.optsWithGlobals<{ json?: boolean }>().json) {
        printJson({ global: globalPath, project: projectPath ?? null });
        return;
      }

      switch (type) {
        case "global":
          console.log(globalPath);
          break;
        case "project":
          if (projectPath) {
            console.log(projectPath);
          } else {
            warn("No project config file found");
          }
          break;
        default:
          console.log(`Global:  ${globalPath}`);
          if (projectPath) {
            console.log(`Project: ${projectPath}`);
          }
          break;
      }
    });
}

/**
 * Create the config command group; without a subcommand it lists.
 */
export function createConfigCommand(deps: CliDependencies): Command {
  const command = new Command("config").description("Manage CLI configuration");

  command.addCommand(createGetCommand(deps));
  command.addCommand(createSetCommand(deps));
  command.addCommand(createListConfigCommand(deps));
  command.addCommand(createDeleteCommand(deps));
  command.addCommand(createPathCommand(deps));

  command.action(async (_opts: unknown, cmd: Command) => {
    await executeConfigList(cmd, deps);
  });

  return command;
}
