import { Command } from "commander";

import { runWithCleanup, type SignalHost } from "../core/cleanup-scope.js";
import { DEFAULT_WORKERS_FILE, loadRunConfig, parseIntegerOption, type RunConfig } from "../core/config.js";
import { Coordinator, selectMode } from "../core/coordinator.js";
import { JsonlLogger } from "../core/logger.js";
import type { ProcessLauncher } from "../core/processes.js";
import type { ReadinessPolicy } from "../core/readiness.js";
import { Supervisor } from "../core/supervisor.js";

import { normalizeCommandError } from "./command-errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type SuperviseOptions = {
  jobs?: number;
  workersFile?: string;
};

export type SuperviseDeps = {
  env?: NodeJS.ProcessEnv;
  launcher?: ProcessLauncher;
  logger?: JsonlLogger;
  readiness?: ReadinessPolicy;
  joinWindowMs?: number;
  host?: SignalHost;
  exit?: (code: number) => void;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerSuperviseCommand(program: Command): void {
  program
    .command("supervise")
    .description("Launch and supervise the compute server and/or worker fleet")
    .option(
      "-j, --jobs <n>",
      "Number of workers (default: available parallelism - 1, at least 1)",
      (v: string) => parseIntegerOption(v, "--jobs"),
    )
    .option("--workers-file <path>", "File that receives the started worker count", DEFAULT_WORKERS_FILE)
    .action(async (opts: SuperviseOptions) => {
      process.exitCode = await superviseCommand(opts);
    });
}

// =============================================================================
// COMMAND
// =============================================================================

export async function superviseCommand(
  opts: SuperviseOptions,
  deps: SuperviseDeps = {},
): Promise<number> {
  const config = loadConfig(opts, deps.env);
  const logger = deps.logger ?? JsonlLogger.toStderr({ level: config.logLevel });

  if (config.unrecognizedLogLevel !== undefined) {
    console.warn(
      `Warning: unrecognized HARNESS_LOGLEVEL "${config.unrecognizedLogLevel}"; logging errors only.`,
    );
  }
  logger.info("supervise.config", describeConfig(config));

  const supervisor = new Supervisor({ logger });
  const coordinator = new Coordinator({
    launcher: deps.launcher,
    logger,
    readiness: deps.readiness,
    joinWindowMs: deps.joinWindowMs,
  });

  // The fallback shell owns no stores; stores under the root may belong to another supervisor.
  const ownsStores = selectMode(config) !== "shell";

  try {
    const code = await runWithCleanup((stopSignal) => coordinator.run(config, stopSignal), {
      cleanup: async () => {
        if (ownsStores) await supervisor.cleanupStores(config);
      },
      host: deps.host,
      exit: deps.exit,
      logger,
    });
    logger.info("supervise.exit", { exit_code: code });
    return code;
  } catch (error) {
    throw normalizeCommandError(error, { title: "Supervisor failed." });
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function loadConfig(opts: SuperviseOptions, env: NodeJS.ProcessEnv | undefined): RunConfig {
  try {
    return loadRunConfig({ env, jobs: opts.jobs, workersFile: opts.workersFile });
  } catch (error) {
    throw normalizeCommandError(error, { title: "Invalid supervisor configuration." });
  }
}

function describeConfig(config: RunConfig): Record<string, string | number | boolean> {
  return {
    workers: config.workerCount,
    spawn_server: config.spawnServer,
    spawn_workers: config.spawnWorkers,
    server_addr: config.serverAddr,
    server_args: config.serverArgs,
    worker_args: config.workerArgs,
    log_level: config.logLevel,
    tools_bin: config.toolsBin,
    store_root: config.storeRoot,
    workers_file: config.workersFile,
  };
}
