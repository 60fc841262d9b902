/**
 * Vitest Global Setup
 *
 * Runs before each test file. Keeps logs quiet and resets the config cache
 * so environment changes made in a test are picked up by getConfig().
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Read by the shared pino logger when telemetry.ts is first imported
process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
