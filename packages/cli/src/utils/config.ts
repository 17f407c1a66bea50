/**
 * Configuration management for CLI
 *
 * Loads and manages ~/.debsmithrc and project .debsmithrc files
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import YAML from "yaml";
import type { BuildRoots, SyncTool } from "@debsmith/core";
import { configError } from "../errors.js";

/**
 * debsmith CLI configuration
 */
export interface DebsmithConfig {
  /** Directory holding one subdirectory per package */
  codeSourceDir?: string;
  /** Directory receiving .deb files and the APT index */
  debsDir?: string;
  /** How package trees are copied into the staging directory */
  syncTool?: SyncTool;
  /** Enable color output */
  color?: boolean;
}

export const DEFAULT_CONFIG: Readonly<DebsmithConfig> = {
  syncTool: "rsync",
  color: true,
};

export const CONFIG_FILE_NAME = ".debsmithrc";

const SYNC_TOOLS: readonly SyncTool[] = ["rsync", "builtin"];

export function isSyncTool(value: unknown): value is SyncTool {
  return SYNC_TOOLS.some((tool) => tool === value);
}

export function getGlobalConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, CONFIG_FILE_NAME);
}

/**
 * Search from startDir upward for a .debsmithrc. The global file in the
 * home directory is not a project config and is passed over.
 */
export function getProjectConfigPath(
  startDir: string = process.cwd(),
  homeDir: string = homedir()
): string | undefined {
  const globalPath = getGlobalConfigPath(homeDir);
  let currentDir = resolve(startDir);

  for (;;) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (configPath !== globalPath && existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

function readStringField(
  record: Record<string, unknown>,
  key: keyof DebsmithConfig,
  filePath: string
): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw configError(`${filePath}: "${key}" must be a string`);
  }
  return value;
}

/**
 * Parse config file content (YAML, which also covers JSON)
 */
export function parseConfigContent(content: string, filePath: string): DebsmithConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw configError(`${filePath}: ${reason}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw configError(`${filePath}: configuration must be a mapping`);
  }

  const record: Record<string, unknown> = { ...parsed };
  const config: DebsmithConfig = {};

  const codeSourceDir = readStringField(record, "codeSourceDir", filePath);
  if (codeSourceDir !== undefined) config.codeSourceDir = codeSourceDir;

  const debsDir = readStringField(record, "debsDir", filePath);
  if (debsDir !== undefined) config.debsDir = debsDir;

  const syncTool = record["syncTool"];
  if (syncTool !== undefined && syncTool !== null) {
    if (!isSyncTool(syncTool)) {
      throw configError(
        `${filePath}: "syncTool" must be one of ${SYNC_TOOLS.join(", ")}`
      );
    }
    config.syncTool = syncTool;
  }

  const color = record["color"];
  if (color !== undefined && color !== null) {
    if (typeof color !== "boolean") {
      throw configError(`${filePath}: "color" must be true or false`);
    }
    config.color = color;
  }

  return config;
}

export async function loadConfigFile(
  filePath: string
): Promise<DebsmithConfig | undefined> {
  try {
    const content = await readFile(filePath, "utf-8");
    return parseConfigContent(content, filePath);
  } catch (err) {
    if (
      err !== null &&
      typeof err === "object" &&
      "code" in err &&
      err.code === "ENOENT"
    ) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandPath(inputPath: string, homeDir: string = homedir()): string {
  if (inputPath.startsWith("~/")) {
    return join(homeDir, inputPath.slice(2));
  }
  if (inputPath === "~") {
    return homeDir;
  }
  return inputPath;
}

/**
 * Merge multiple configs with priority (later configs override earlier)
 */
export function mergeConfigs(...configs: (DebsmithConfig | undefined)[]): DebsmithConfig {
  const result: DebsmithConfig = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }

    if (config.codeSourceDir !== undefined) result.codeSourceDir = config.codeSourceDir;
    if (config.debsDir !== undefined) result.debsDir = config.debsDir;
    if (config.syncTool !== undefined) result.syncTool = config.syncTool;
    if (config.color !== undefined) result.color = config.color;
  }

  return result;
}

export interface ConfigEnvironment {
  DEBSMITH_SOURCE_DIR?: string;
  DEBSMITH_DEBS_DIR?: string;
  DEBSMITH_SYNC_TOOL?: string;
  NO_COLOR?: string;
}

export interface LoadConfigOptions {
  /** Override config file path */
  configPath?: string;
  /** Values given as command-line flags */
  cli?: Pick<DebsmithConfig, "codeSourceDir" | "debsDir">;
  env?: ConfigEnvironment;
  cwd?: string;
  homeDir?: string;
}

function readEnvConfig(env: ConfigEnvironment): DebsmithConfig {
  const envConfig: DebsmithConfig = {};

  if (env.DEBSMITH_SOURCE_DIR) {
    envConfig.codeSourceDir = env.DEBSMITH_SOURCE_DIR;
  }
  if (env.DEBSMITH_DEBS_DIR) {
    envConfig.debsDir = env.DEBSMITH_DEBS_DIR;
  }
  if (env.DEBSMITH_SYNC_TOOL) {
    const tool = env.DEBSMITH_SYNC_TOOL.toLowerCase();
    if (!isSyncTool(tool)) {
      throw configError(
        `DEBSMITH_SYNC_TOOL must be one of ${SYNC_TOOLS.join(", ")}, got "${env.DEBSMITH_SYNC_TOOL}"`
      );
    }
    envConfig.syncTool = tool;
  }
  if (env.NO_COLOR) {
    envConfig.color = false;
  }

  return envConfig;
}

/**
 * Load and merge all configuration sources
 *
 * Priority (highest to lowest):
 * 1. CLI options
 * 2. Environment variables
 * 3. Project config (.debsmithrc in the project, or --config)
 * 4. Global config (~/.debsmithrc)
 * 5. Defaults
 *
 * Directory settings come back with ~ expanded and resolved against cwd.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<DebsmithConfig> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? homedir();

  const globalConfig = await loadConfigFile(getGlobalConfigPath(homeDir));

  const projectConfigPath = options.configPath
    ? resolve(cwd, expandPath(options.configPath, homeDir))
    : getProjectConfigPath(cwd, homeDir);
  const projectConfig = projectConfigPath
    ? await loadConfigFile(projectConfigPath)
    : undefined;
  if (options.configPath && projectConfig === undefined) {
    throw configError(`Config file not found: ${projectConfigPath}`);
  }

  const envConfig = readEnvConfig(options.env ?? process.env);

  const merged = mergeConfigs(
    DEFAULT_CONFIG,
    globalConfig,
    projectConfig,
    envConfig,
    options.cli
  );

  if (merged.codeSourceDir) {
    merged.codeSourceDir = resolve(cwd, expandPath(merged.codeSourceDir, homeDir));
  }
  if (merged.debsDir) {
    merged.debsDir = resolve(cwd, expandPath(merged.debsDir, homeDir));
  }

  return merged;
}

/**
 * Save configuration to the global config file
 */
export async function saveConfig(
  config: DebsmithConfig,
  homeDir: string = homedir()
): Promise<void> {
  const configPath = getGlobalConfigPath(homeDir);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    await mkdir(configDir, { recursive: true });
  }

  await writeFile(configPath, YAML.stringify(config), "utf-8");
}

/**
 * Set a specific config value in the global config
 */
export async function setConfigValue<K extends keyof DebsmithConfig>(
  key: K,
  value: DebsmithConfig[K],
  homeDir: string = homedir()
): Promise<void> {
  const globalConfig = (await loadConfigFile(getGlobalConfigPath(homeDir))) ?? {};
  globalConfig[key] = value;
  await saveConfig(globalConfig, homeDir);
}

/**
 * Delete a specific config value from the global config
 */
export async function deleteConfigValue<K extends keyof DebsmithConfig>(
  key: K,
  homeDir: string = homedir()
): Promise<void> {
  const globalConfig = (await loadConfigFile(getGlobalConfigPath(homeDir))) ?? {};
  delete globalConfig[key];
  await saveConfig(globalConfig, homeDir);
}

type RequiredSetting = "codeSourceDir" | "debsDir";

const REQUIRED_SETTINGS: ReadonlyArray<{
  key: RequiredSetting;
  question: string;
  envVar: string;
}> = [
  {
    key: "codeSourceDir",
    question: "Where do you keep your source code?",
    envVar: "DEBSMITH_SOURCE_DIR",
  },
  {
    key: "debsDir",
    question: "Where do you want to generate .deb files?",
    envVar: "DEBSMITH_DEBS_DIR",
  },
];

export interface ResolveRootsOptions {
  /** Whether the user can be asked for missing settings */
  interactive: boolean;
  ask: (question: string) => Promise<string>;
  cwd?: string;
  homeDir?: string;
}

/**
 * Return both build roots, asking for any that are missing and saving the
 * answers to the global config. Without a terminal a missing root is a
 * CONFIG_ERROR.
 */
export async function resolveBuildRoots(
  config: DebsmithConfig,
  options: ResolveRootsOptions
): Promise<BuildRoots> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? homedir();
  const resolved: Record<RequiredSetting, string | undefined> = {
    codeSourceDir: config.codeSourceDir,
    debsDir: config.debsDir,
  };

  for (const setting of REQUIRED_SETTINGS) {
    if (resolved[setting.key]) {
      continue;
    }

    if (!options.interactive) {
      throw configError(
        `${setting.key} is not configured`,
        `Run "debsmith config set ${setting.key} <path>" or set ${setting.envVar}.`
      );
    }

    const answer = (await options.ask(setting.question)).trim();
    if (answer.length === 0) {
      throw configError(`${setting.key} is required`);
    }

    const value = resolve(cwd, expandPath(answer, homeDir));
    await setConfigValue(setting.key, value, homeDir);
    resolved[setting.key] = value;
  }

  const { codeSourceDir, debsDir } = resolved;
  if (!codeSourceDir || !debsDir) {
    throw configError("codeSourceDir and debsDir must both be configured");
  }
  return { codeSourceDir, debsDir };
}
