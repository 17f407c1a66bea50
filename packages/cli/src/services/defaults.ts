import { homedir } from "node:os";
import type { CliDependencies } from "../types.js";
import { input } from "../utils/prompt.js";

export function createDefaultDependencies(): CliDependencies {
  return {
    env: process.env,
    cwd: process.cwd(),
    homeDir: homedir(),
    interactive: process.stdin.isTTY === true,
    ask: (question) => input(question),
  };
}
