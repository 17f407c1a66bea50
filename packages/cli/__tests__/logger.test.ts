import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { configureLogger, logger } from "../src/utils/logger.js";
import { captureOutput, type CapturedOutput } from "./helpers.js";

describe("logger", () => {
  let output: CapturedOutput;

  beforeEach(() => {
    configureLogger({ verbose: false, quiet: false, noColor: true, json: false });
    output = captureOutput();
  });

  afterEach(() => {
    output.restore();
  });

  it("indents nested sections by two spaces per level", () => {
    logger.indent('Building package "tools"');
    logger.info("creating working dir");
    logger.indent("building .deb file");
    logger.info("dpkg-deb: building package");
    logger.unindent();
    logger.unindent();
    logger.info("done");

    expect(output.stdout()).toBe(
      [
        'Building package "tools"',
        "  creating working dir",
        "  building .deb file",
        "    dpkg-deb: building package",
        "done",
        "",
      ].join("\n")
    );
  });

  it("sends warnings and errors to stderr", () => {
    logger.warn('skipping package "tools"');
    logger.error("no control file found for tools");

    expect(output.stderr()).toBe('warning: skipping package "tools"\nerror: no control file found for tools\n');
    expect(output.stdout()).toBe("");
  });

  it("hides debug output unless verbose", () => {
    logger.debug("hidden");
    configureLogger({ verbose: true });
    logger.debug("shown");

    expect(output.stdout()).toBe("[debug] shown\n");
  });

  it("prints only errors when quiet", () => {
    configureLogger({ quiet: true });
    logger.info("progress");
    logger.warn("careful");
    logger.error("failed");

    expect(output.stdout()).toBe("");
    expect(output.stderr()).toBe("error: failed\n");
  });

  it("writes JSON lines carrying the nesting depth", () => {
    configureLogger({ json: true });
    logger.indent("outer");
    logger.info("inner");
    logger.unindent();

    const entries = output.stdoutLines().map((line): unknown => JSON.parse(line));
    expect(entries).toEqual([
      { level: "info", message: "outer", timestamp: expect.any(String) },
      { level: "info", message: "inner", timestamp: expect.any(String), depth: 1 },
    ]);
  });

  it("never lets nesting go below zero", () => {
    logger.unindent();
    logger.info("top");

    expect(output.stdout()).toBe("top\n");
  });

  it("prefixes success lines with a checkmark", () => {
    logger.success("Built 1 package (tools)");

    expect(output.stdout()).toBe("✓ Built 1 package (tools)\n");
  });

  it("writes JSON entries with level, message and timestamp only", () => {
    configureLogger({ json: true });
    logger.success("Nothing to build");

    const entries = output.stdoutLines().map((line): unknown => JSON.parse(line));
    expect(entries).toEqual([{ level: "info", message: "Nothing to build", timestamp: expect.any(String) }]);
  });
});
