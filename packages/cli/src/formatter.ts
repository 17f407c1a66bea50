import type { RunReport } from "@debsmith/core";
import type { CliError } from "./errors.js";

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify(
      {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
        exitCode: error.exitCode,
      },
      null,
      2
    );
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join("\n");
}

/**
 * One-line outcome of a build run, e.g. "Built 2 packages (alpha, bravo); skipped 1 (charlie)"
 */
export function formatBuildSummary(report: RunReport): string {
  if (report.candidates.length === 0) {
    return "Nothing to build";
  }

  const builtNames = report.built.map((result) => result.package);
  const parts = [`Built ${countOf(builtNames.length, "package")}${listOf(builtNames)}`];
  if (report.skipped.length > 0) {
    parts.push(`skipped ${report.skipped.length}${listOf(report.skipped.map((result) => result.package))}`);
  }
  return parts.join("; ");
}

/**
 * Serializable view of a run report for --json output
 */
export function toReportJson(report: RunReport): Record<string, unknown> {
  return {
    selection: report.selection,
    candidates: report.candidates,
    built: report.built.map(({ package: name, previousVersion, nextVersion, artifactPath }) => ({
      package: name,
      previousVersion,
      nextVersion,
      artifactPath,
    })),
    skipped: report.skipped.map(({ package: name, reason, detail }) => ({ package: name, reason, detail })),
    indexRefreshed: report.indexRefreshed,
  };
}

function countOf(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function listOf(names: string[]): string {
  return names.length > 0 ? ` (${names.join(", ")})` : "";
}
