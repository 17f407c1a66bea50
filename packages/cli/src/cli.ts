/**
 * Main CLI setup using Commander.js
 *
 * Creates the main program with global options and registers all command modules
 */
import { Command, CommanderError, Option } from "commander";
import { EXIT_CODES, toCliError, type ExitCode } from "./errors.js";
import { formatCliError } from "./formatter.js";
import { createBuildCommand } from "./commands/build.js";
import { createConfigCommand } from "./commands/config.js";
import { createDefaultDependencies } from "./services/defaults.js";
import type { CliDependencies, GlobalOptions } from "./types.js";
import { configureLogger, getLoggerOptions } from "./utils/logger.js";

/**
 * CLI version - should match package.json
 */
export const CLI_VERSION = "0.1.0";

export const CLI_NAME = "debsmith";

export { EXIT_CODES };

/**
 * Create the main CLI program
 */
export function createProgram(deps: CliDependencies = createDefaultDependencies()): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Build Debian packages from source trees and keep an APT repository index current")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ debsmith build                  Build packages changed since their last .deb
  $ debsmith build --all            Rebuild every package
  $ debsmith build -p tools         Build one package regardless of changes
  $ debsmith config set debsDir ~/debs`
    );

  program
    .addOption(new Option("-v, --verbose", "Enable verbose output").default(false))
    .addOption(new Option("-q, --quiet", "Minimize output (only errors)").default(false))
    .addOption(new Option("-c, --config <path>", "Configuration file path"))
    .addOption(new Option("--source-dir <path>", "Package source root"))
    .addOption(new Option("--debs-dir <path>", "Output directory for .deb files"))
    .addOption(new Option("--no-color", "Disable color output"))
    .addOption(new Option("--json", "Output in JSON format").default(false));

  program.hook("preAction", (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    configureLogger({
      verbose: opts.verbose,
      quiet: opts.quiet,
      noColor: opts.color === false,
      json: opts.json,
    });
  });

  program.addCommand(createBuildCommand(deps));
  program.addCommand(createConfigCommand(deps));

  return program;
}

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const subcommand of command.commands) {
    applyExitOverride(subcommand);
  }
}

/**
 * Run the CLI program and return the process exit code
 */
export async function run(
  args: string[] = process.argv,
  deps?: CliDependencies
): Promise<ExitCode> {
  const program = createProgram(deps);
  applyExitOverride(program);

  try {
    await program.parseAsync(args);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    // commander has already printed help, version or its own usage message
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT;
    }

    const cliError = toCliError(err);
    console.error(formatCliError(cliError, getLoggerOptions().json === true));
    return cliError.exitCode;
  }
}
