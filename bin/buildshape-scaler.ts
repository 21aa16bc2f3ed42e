#!/usr/bin/env node
/**
 * Build Shape Scaler CLI Entry Point
 *
 * @module buildshape-scaler-cli
 */

import { EXIT_CODES, runCli } from '../src/cli/run';

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const controller = new AbortController();
  // First Ctrl+C lets running folders finish; a second one ends the process
  process.once('SIGINT', () => {
    process.stderr.write('Cancelling: waiting for folders in progress to finish...\n');
    controller.abort();
    process.once('SIGINT', () => process.exit(EXIT_CODES.CANCELLED));
  });

  process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.FAILURES);
});
