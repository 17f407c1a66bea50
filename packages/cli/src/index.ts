export { createProgram, run, CLI_NAME, CLI_VERSION, EXIT_CODES } from "./cli.js";
export { CliError, toCliError, usageError, configError } from "./errors.js";
export type { ExitCode, StructuredError } from "./errors.js";
export { formatCliError, formatBuildSummary, toReportJson } from "./formatter.js";
export { createDefaultDependencies } from "./services/defaults.js";
export { toSelection } from "./commands/build.js";
export type { BuildCommandOptions } from "./commands/build.js";
export type * from "./types.js";
export * from "./utils/index.js";
