/**
 * Shared Vitest setup for openapi-warden.
 *
 * Keeps the logger quiet unless a test raises the level itself, and makes
 * sure no test inherits a git binary or upstream override from the shell.
 */

import { afterEach, beforeEach } from 'vitest';
import { configureLogging } from './src/telemetry/logger.js';

beforeEach(() => {
  delete process.env.GIT;
  delete process.env.OPENAPI_WARDEN_UPSTREAM;
  configureLogging({ level: 'silent' });
});

afterEach(() => {
  configureLogging({ level: undefined });
});
