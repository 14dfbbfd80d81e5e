/**
 * Vitest Global Setup
 *
 * Runs before each test file. Keeps the shared logger quiet and resets the
 * config cache so that vi.stubEnv() calls are picked up by getConfig().
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// The logger is built at import time; this must be set before any test imports it.
process.env.LOG_LEVEL ??= "silent";

/**
 * Reset config cache before ALL tests in a file
 */
beforeAll(() => {
  _resetConfigCache();
});

/**
 * Reset config cache before each test
 *
 * Config changes in one test don't leak to others.
 */
beforeEach(() => {
  _resetConfigCache();
});
