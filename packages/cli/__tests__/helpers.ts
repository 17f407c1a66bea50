import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import type { CommandRunner, RunCommandOptions } from "@debsmith/core";
import type { CliDependencies } from "../src/types.js";

export interface ToolCall {
  command: string;
  args: string[];
  options: RunCommandOptions;
}

type ToolHandler = (args: readonly string[]) => Promise<string>;

/**
 * Stands in for dpkg-deb and dpkg-scanpackages. dpkg-deb writes a small
 * placeholder file at the artifact path it is given.
 */
export class ToolStub implements CommandRunner {
  readonly calls: ToolCall[] = [];

  private readonly handlers: Record<string, ToolHandler>;

  constructor(overrides: Record<string, ToolHandler> = {}) {
    this.handlers = {
      "dpkg-deb": async (args) => {
        const artifactPath = args[2];
        if (artifactPath === undefined) {
          throw new Error("dpkg-deb called without an artifact path");
        }
        await fs.writeFile(artifactPath, "deb", "utf8");
        return `dpkg-deb: building package in '${artifactPath}'.`;
      },
      "dpkg-scanpackages": async () => "Package: placeholder\nVersion: 1.0.0\n\n",
      ...overrides,
    };
  }

  async run(command: string, args: readonly string[], options: RunCommandOptions = {}): Promise<string> {
    this.calls.push({ command, args: [...args], options });
    const handler = this.handlers[command];
    if (!handler) {
      throw new Error(`unexpected command: ${command}`);
    }
    return handler(args);
  }

  artifactsBuilt(): string[] {
    return this.calls
      .filter((call) => call.command === "dpkg-deb")
      .map((call) => path.basename(call.args[2] ?? ""));
  }
}

export interface CliSandbox {
  root: string;
  homeDir: string;
  cwd: string;
  sourceDir: string;
  debsDir: string;
}

export async function createSandbox(): Promise<CliSandbox> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "debsmith-cli-"));
  const sandbox: CliSandbox = {
    root,
    homeDir: path.join(root, "home"),
    cwd: path.join(root, "work"),
    sourceDir: path.join(root, "src"),
    debsDir: path.join(root, "debs"),
  };
  await fs.mkdir(sandbox.homeDir, { recursive: true });
  await fs.mkdir(sandbox.cwd, { recursive: true });
  await fs.mkdir(sandbox.sourceDir, { recursive: true });
  return sandbox;
}

export function createDeps(
  sandbox: CliSandbox,
  overrides: Partial<CliDependencies> = {}
): CliDependencies {
  return {
    env: { DEBSMITH_SYNC_TOOL: "builtin" },
    cwd: sandbox.cwd,
    homeDir: sandbox.homeDir,
    interactive: false,
    ask: async (question) => {
      throw new Error(`unexpected prompt: ${question}`);
    },
    runner: new ToolStub(),
    ...overrides,
  };
}

export async function writePackage(sourceDir: string, name: string, version: string): Promise<string> {
  const packageDir = path.join(sourceDir, name);
  await fs.mkdir(path.join(packageDir, "DEBIAN"), { recursive: true });
  await fs.writeFile(
    path.join(packageDir, "DEBIAN", "control"),
    `Package: ${name}\nVersion: ${version}\nArchitecture: all\n`,
    "utf8"
  );
  return packageDir;
}

export interface CapturedOutput {
  stdout(): string;
  stdoutLines(): string[];
  stderr(): string;
  errors(): string;
  logs(): string;
  restore(): void;
}

interface RecordedSpy {
  mock: { calls: ReadonlyArray<ReadonlyArray<unknown>> };
}

function joinWrites(spy: RecordedSpy): string {
  return spy.mock.calls.map((call) => String(call[0])).join("");
}

function joinConsole(spy: RecordedSpy): string {
  return spy.mock.calls.map((args) => args.map((arg) => String(arg)).join(" ")).join("\n");
}

/**
 * Silence and record everything the CLI prints.
 */
export function captureOutput(): CapturedOutput {
  const stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

  return {
    stdout: () => joinWrites(stdoutSpy),
    stdoutLines: () => joinWrites(stdoutSpy).split("\n").filter((line) => line.length > 0),
    stderr: () => joinWrites(stderrSpy),
    errors: () => joinConsole(errorSpy),
    logs: () => joinConsole(logSpy),
    restore: () => {
      stdoutSpy.mockRestore();
      stderrSpy.mockRestore();
      logSpy.mockRestore();
      errorSpy.mockRestore();
    },
  };
}
