#!/usr/bin/env tsx
/**
 * GeoLayer CLI entry point
 *
 * @module geolayer-cli
 */

import { EXIT_CODES, runCli } from '../src/cli/program.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.SERVICE_ERROR);
});
