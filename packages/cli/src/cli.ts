#!/usr/bin/env node

/**
 * orbitrag CLI entry point
 */

import { run } from "./program.js";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
