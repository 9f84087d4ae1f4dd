#!/usr/bin/env node
/**
 * @fileoverview openapi-warden CLI
 *
 * Commands:
 *   openapi-warden check      - Report whether documents are up to date
 *   openapi-warden generate   - Write every fixable change, then check again
 *   openapi-warden list       - List managed APIs and their versions
 *   openapi-warden debug      - Show what each source contains, per API
 *
 * @packageDocumentation
 */

import { formatError } from './errors.js';
import { runCli } from './run.js';
import { EXIT_CODES } from '../resolve/status.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exitCode = EXIT_CODES.failure;
});
