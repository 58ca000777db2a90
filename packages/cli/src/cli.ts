#!/usr/bin/env node

/**
 * timekv CLI entry point
 */

import { runCli } from "./program.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
