import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const BooleanFlag = z
  .string()
  .default("true")
  .transform((value) => value.trim().toLowerCase() === "true");

export const EnvSchema = z.object({
  SERVER_ARGS: z.string().default(""),
  WORKER_ARGS: z.string().default(""),
  SERVER_ADDR: z.string().trim().min(1).default("127.0.0.1:27183"),
  SPAWN_SERVER: BooleanFlag,
  SPAWN_WORKERS: BooleanFlag,
  HARNESS_LOGLEVEL: z.string().default("info"),
  JUDGE_TOOLS_BIN: z.string().trim().min(1).default("judge-tools"),
  SHELL: z.string().trim().min(1).default("/bin/bash"),
  HARNESS_STORE_ROOT: z.string().trim().min(1).optional(),
});

export type HarnessEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// RUN CONFIG
// =============================================================================

export type RunConfig = Readonly<{
  workerCount: number;
  spawnServer: boolean;
  spawnWorkers: boolean;
  serverAddr: string;
  serverArgs: string;
  workerArgs: string;
  logLevel: LogLevel;
  /** Set when HARNESS_LOGLEVEL held a value outside the known levels. */
  unrecognizedLogLevel?: string;
  toolsBin: string;
  shell: string;
  storeRoot: string;
  workersFile: string;
}>;

export type RunConfigInput = {
  env?: NodeJS.ProcessEnv;
  jobs?: number;
  workersFile?: string;
  availableParallelism?: number;
};

export const DEFAULT_WORKERS_FILE = "nworkers";

export function defaultWorkerCount(parallelism = os.availableParallelism()): number {
  return Math.max(parallelism - 1, 1);
}

export function loadRunConfig(input: RunConfigInput = {}): RunConfig {
  const env = parseEnv(input.env ?? process.env);

  if (input.jobs !== undefined && (!Number.isInteger(input.jobs) || input.jobs <= 0)) {
    throw new ConfigError(`Please specify a positive number of jobs, not ${input.jobs}.`);
  }

  const parsedLevel = parseLogLevel(env.HARNESS_LOGLEVEL);

  return Object.freeze({
    workerCount: input.jobs ?? defaultWorkerCount(input.availableParallelism),
    spawnServer: env.SPAWN_SERVER,
    spawnWorkers: env.SPAWN_WORKERS,
    serverAddr: env.SERVER_ADDR,
    serverArgs: env.SERVER_ARGS,
    workerArgs: env.WORKER_ARGS,
    logLevel: parsedLevel ?? "error",
    unrecognizedLogLevel: parsedLevel ? undefined : env.HARNESS_LOGLEVEL,
    toolsBin: env.JUDGE_TOOLS_BIN,
    shell: env.SHELL,
    storeRoot: path.resolve(env.HARNESS_STORE_ROOT ?? os.tmpdir()),
    workersFile: path.resolve(input.workersFile ?? DEFAULT_WORKERS_FILE),
  });
}

/** Log level for commands that only need logging, not the full supervisor config. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLogLevel(parseEnv(env).HARNESS_LOGLEVEL) ?? "error";
}

// =============================================================================
// CLI PARSERS
// =============================================================================

export function parseIntegerOption(value: string, label: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(`${label} must be an integer, got "${value}".`);
  }
  return Number.parseInt(trimmed, 10);
}

export function parsePositiveIntegerOption(value: string, label: string): number {
  const parsed = parseIntegerOption(value, label);
  if (parsed <= 0) {
    throw new ConfigError(`${label} must be a positive integer, got "${value}".`);
  }
  return parsed;
}

export function parsePositiveNumberOption(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${label} must be a positive number, got "${value}".`);
  }
  return parsed;
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseEnv(env: NodeJS.ProcessEnv): HarnessEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`, parsed.error);
  }
  return parsed.data;
}
