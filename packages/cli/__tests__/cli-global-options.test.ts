/**
 * Global options wiring tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import { createProgram } from "../src/cli.js";
import { configureLogger, getLoggerOptions } from "../src/utils/logger.js";
import { captureOutput, createDeps, createSandbox, type CapturedOutput, type CliSandbox } from "./helpers.js";

describe("debsmith global options hook", () => {
  let sandbox: CliSandbox;
  let output: CapturedOutput;

  beforeEach(async () => {
    sandbox = await createSandbox();
    configureLogger({
      verbose: false,
      quiet: false,
      noColor: false,
      json: false,
    });
    output = captureOutput();
  });

  afterEach(() => {
    output.restore();
    fs.rmSync(sandbox.root, { recursive: true, force: true });
  });

  it("applies global options to top-level commands", async () => {
    const program = createProgram(createDeps(sandbox));

    await program.parseAsync([
      "node",
      "debsmith",
      "--quiet",
      "--source-dir",
      sandbox.sourceDir,
      "--debs-dir",
      sandbox.debsDir,
      "build",
    ]);

    expect(getLoggerOptions().quiet).toBe(true);
    expect(output.stdout()).toBe("");
  });

  it("applies global options to nested subcommands", async () => {
    const program = createProgram(createDeps(sandbox));

    await program.parseAsync(["node", "debsmith", "--verbose", "--no-color", "config", "path"]);

    const loggerOptions = getLoggerOptions();
    expect(loggerOptions.verbose).toBe(true);
    expect(loggerOptions.noColor).toBe(true);
  });

  it("applies --source-dir to config get", async () => {
    const program = createProgram(createDeps(sandbox));

    await program.parseAsync([
      "node",
      "debsmith",
      "--source-dir",
      sandbox.sourceDir,
      "config",
      "get",
      "codeSourceDir",
    ]);

    expect(output.logs()).toBe(sandbox.sourceDir);
  });

  it("turns color off when the config says so", async () => {
    fs.writeFileSync(`${sandbox.homeDir}/.debsmithrc`, "color: false\n", "utf8");
    const program = createProgram(createDeps(sandbox));

    await program.parseAsync(["node", "debsmith", "config", "get", "color"]);

    expect(getLoggerOptions().noColor).toBe(true);
    expect(output.logs()).toBe("false");
  });
});
