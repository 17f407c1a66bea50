#!/usr/bin/env node

import { run } from "./cli.js";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv);
}

void main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
