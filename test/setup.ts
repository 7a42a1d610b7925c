import { afterEach, beforeEach } from "vitest";

// =============================================================================
// HARNESS ENVIRONMENT ISOLATION
// =============================================================================

// Variables the harness reads from the environment. A developer shell that exports any of
// them must not change what the tests observe.
const HARNESS_ENV_VARS = [
  "SERVER_ARGS",
  "WORKER_ARGS",
  "SERVER_ADDR",
  "SPAWN_SERVER",
  "SPAWN_WORKERS",
  "HARNESS_LOGLEVEL",
  "JUDGE_TOOLS_BIN",
  "HARNESS_STORE_ROOT",
] as const;

let saved: Partial<Record<(typeof HARNESS_ENV_VARS)[number], string>> = {};

beforeEach(() => {
  saved = {};
  for (const key of HARNESS_ENV_VARS) {
    const value = process.env[key];
    if (value !== undefined) saved[key] = value;
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of HARNESS_ENV_VARS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});
