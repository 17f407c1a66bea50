import { describe, it, expect } from "vitest";
import { CommandFailedError, MalformedVersionError, StagingError } from "@debsmith/core";
import { CliError, configError, toCliError, usageError } from "../src/errors.js";
import { formatBuildSummary, formatCliError } from "../src/formatter.js";
import { PromptCancelledError } from "../src/utils/prompt.js";

describe("toCliError", () => {
  it("passes CliError through unchanged", () => {
    const error = usageError("bad flag");

    expect(toCliError(error)).toBe(error);
  });

  it("maps a failed tool to TOOL_FAILED with exit code 1", () => {
    const error = toCliError(
      new CommandFailedError({
        command: "dpkg-scanpackages",
        args: ["./", "/dev/null"],
        exitCode: 255,
        stdout: "",
        stderr: "",
      })
    );

    expect(error.code).toBe("TOOL_FAILED");
    expect(error.exitCode).toBe(1);
    expect(error.message).toBe("dpkg-scanpackages exited with code 255");
    expect(error.suggestion).toBeUndefined();
  });

  it("suggests checking PATH when a tool never started", () => {
    const error = toCliError(
      new CommandFailedError({
        command: "rsync",
        args: [],
        exitCode: null,
        stdout: "",
        stderr: "",
        cause: new Error("spawn rsync ENOENT"),
      })
    );

    expect(error.suggestion).toBe("Check that rsync is installed and on your PATH.");
  });

  it("keeps the code of other build errors", () => {
    expect(toCliError(new StagingError("staging area in use")).code).toBe("STAGING_ERROR");
    expect(toCliError(new MalformedVersionError("no version")).code).toBe("MALFORMED_VERSION");
  });

  it("maps a cancelled prompt to exit code 130", () => {
    const error = toCliError(new PromptCancelledError());

    expect(error.code).toBe("USER_INTERRUPT");
    expect(error.exitCode).toBe(130);
  });

  it("treats anything else as an internal error", () => {
    expect(toCliError(new Error("boom"))).toMatchObject({ code: "INTERNAL_ERROR", exitCode: 1, message: "boom" });
    expect(toCliError("boom")).toMatchObject({ code: "UNKNOWN_ERROR", exitCode: 1 });
  });
});

describe("formatCliError", () => {
  it("renders code, message and suggestion as text", () => {
    const error = configError("debsDir is not configured", "Set DEBSMITH_DEBS_DIR.");

    expect(formatCliError(error, false)).toBe(
      "[CONFIG_ERROR] debsDir is not configured\nsuggestion: Set DEBSMITH_DEBS_DIR."
    );
  });

  it("renders JSON", () => {
    const error = new CliError({ code: "TOOL_FAILED", message: "dpkg-deb exited with code 2", exitCode: 1 });

    expect(JSON.parse(formatCliError(error, true))).toEqual({
      code: "TOOL_FAILED",
      message: "dpkg-deb exited with code 2",
      exitCode: 1,
    });
  });
});

describe("formatBuildSummary", () => {
  it("lists built and skipped packages", () => {
    const summary = formatBuildSummary({
      selection: { kind: "changed" },
      candidates: ["alpha", "bravo", "charlie"],
      built: [
        { status: "built", package: "alpha", previousVersion: "1.0.0", nextVersion: "1.0.1", artifactPath: "/d/alpha.deb" },
        { status: "built", package: "charlie", previousVersion: "2.0.0", nextVersion: "2.0.1", artifactPath: "/d/charlie.deb" },
      ],
      skipped: [{ status: "skipped", package: "bravo", reason: "malformed-version", detail: "no version" }],
      indexRefreshed: true,
    });

    expect(summary).toBe("Built 2 packages (alpha, charlie); skipped 1 (bravo)");
  });

  it("reports zero built packages", () => {
    const summary = formatBuildSummary({
      selection: { kind: "package", name: "ghost" },
      candidates: ["ghost"],
      built: [],
      skipped: [{ status: "skipped", package: "ghost", reason: "missing-control-file", detail: "missing" }],
      indexRefreshed: false,
    });

    expect(summary).toBe("Built 0 packages; skipped 1 (ghost)");
  });
});
