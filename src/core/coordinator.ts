/**
 * Lifecycle coordinator for the `supervise` command.
 * Purpose: pick the supervision mode from the spawn toggles and drive it to a single exit code.
 * Assumptions: store cleanup is owned by the caller's cleanup scope, not by the coordinator.
 * Usage: const code = await new Coordinator({ logger }).run(config, stopSignal).
 */

import { command } from "./command.js";
import type { RunConfig } from "./config.js";
import { formatErrorMessage } from "./error-format.js";
import type { JsonlLogger } from "./logger.js";
import {
  ExecaProcessLauncher,
  isMissingExecutable,
  type ProcessHandle,
  type ProcessLauncher,
} from "./processes.js";
import { createReadinessDelay, joinWithin, type ReadinessPolicy } from "./readiness.js";
import { Supervisor } from "./supervisor.js";
import { writeTextFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type CoordinatorMode = "workers-only" | "server-only" | "server+workers" | "shell";

export type CoordinatorOptions = {
  launcher?: ProcessLauncher;
  logger?: JsonlLogger;
  readiness?: ReadinessPolicy;
  joinWindowMs?: number;
};

export const DEFAULT_JOIN_WINDOW_MS = 1_000;

export function selectMode(config: Pick<RunConfig, "spawnServer" | "spawnWorkers">): CoordinatorMode {
  if (config.spawnServer && config.spawnWorkers) return "server+workers";
  if (config.spawnServer) return "server-only";
  if (config.spawnWorkers) return "workers-only";
  return "shell";
}

export async function writeWorkerMarker(filePath: string, count: number): Promise<void> {
  await writeTextFile(filePath, `${count}\n`);
}

// =============================================================================
// COORDINATOR
// =============================================================================

export class Coordinator {
  private readonly launcher: ProcessLauncher;
  private readonly logger?: JsonlLogger;
  private readonly readiness: ReadinessPolicy;
  private readonly joinWindowMs: number;

  constructor(opts: CoordinatorOptions = {}) {
    this.launcher = opts.launcher ?? new ExecaProcessLauncher();
    this.logger = opts.logger;
    this.readiness = opts.readiness ?? createReadinessDelay();
    this.joinWindowMs = opts.joinWindowMs ?? DEFAULT_JOIN_WINDOW_MS;
  }

  async run(config: RunConfig, stopSignal?: AbortSignal): Promise<number> {
    const supervisor = new Supervisor({
      launcher: this.launcher,
      logger: this.logger,
      stopSignal,
    });
    const mode = selectMode(config);
    this.logger?.info("coordinator.mode", { mode, workers: config.workerCount });

    // Reset first so a crashed earlier run never leaves its count behind.
    await writeWorkerMarker(config.workersFile, 0);

    let stores: string[] = [];
    if (config.spawnWorkers) {
      stores = await supervisor.allocateWorkerStores(config, config.workerCount);
      await writeWorkerMarker(config.workersFile, config.workerCount);
    }

    switch (mode) {
      case "workers-only":
        return this.runWorkersOnly(supervisor, config, stores);
      case "server-only":
        return supervisor.spawnServer(config);
      case "server+workers":
        return this.runServerWithWorkers(supervisor, config, stores, stopSignal);
      case "shell":
        return this.runShell(config, stopSignal);
    }
  }

  private async runWorkersOnly(
    supervisor: Supervisor,
    config: RunConfig,
    stores: string[],
  ): Promise<number> {
    const handles = supervisor.launchWorkers(config, stores);
    const codes = await waitForAll(handles);
    const maxCode = Math.max(...codes);
    this.logger?.info("workers.exit", { exit_codes: codes, max_exit_code: maxCode });
    return maxCode;
  }

  private async runServerWithWorkers(
    supervisor: Supervisor,
    config: RunConfig,
    stores: string[],
    stopSignal: AbortSignal | undefined,
  ): Promise<number> {
    const launchAbort = new AbortController();
    const onStop = (): void => launchAbort.abort();
    stopSignal?.addEventListener("abort", onStop, { once: true });

    let handles: ProcessHandle[] = [];
    const launch = (async () => {
      this.logger?.debug("workers.readiness.wait", { policy: this.readiness.description });
      const ready = await this.readiness.waitForServer(launchAbort.signal);
      if (!ready) {
        this.logger?.debug("workers.launch.cancelled");
        return;
      }
      handles = supervisor.launchWorkers(config, stores);
      const codes = await waitForAll(handles);
      this.logger?.info("workers.exit", { exit_codes: codes });
    })().catch((error: unknown) => {
      this.logger?.error("workers.launch.failed", { error: formatErrorMessage(error) });
    });

    try {
      return await supervisor.spawnServer(config);
    } finally {
      launchAbort.abort();
      stopSignal?.removeEventListener("abort", onStop);

      const joined = await joinWithin(launch, this.joinWindowMs);
      if (!joined) {
        const lingering = handles.filter((handle) => handle.running);
        this.logger?.warn("workers.terminate", {
          workers: lingering.map((handle) => handle.label),
        });
        for (const handle of lingering) {
          handle.terminate();
          // Exit regardless of whether they have stopped.
          handle.release();
        }
      }
    }
  }

  private async runShell(config: RunConfig, stopSignal: AbortSignal | undefined): Promise<number> {
    this.logger?.info("shell.start", { shell: config.shell });
    try {
      return await this.launcher.run(command(config.shell).build(), {
        label: "shell",
        stopSignal,
      });
    } catch (error) {
      if (isMissingExecutable(error)) {
        this.logger?.error("shell.missing", { shell: config.shell });
        return 0;
      }
      throw error;
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

// A worker that never started fails the wait; the others are asked to stop so the
// failure is not left behind live processes.
async function waitForAll(handles: ProcessHandle[]): Promise<number[]> {
  try {
    return await Promise.all(handles.map((handle) => handle.wait()));
  } catch (error) {
    for (const handle of handles) {
      if (handle.running) handle.terminate();
    }
    throw error;
  }
}
