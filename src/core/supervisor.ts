/**
 * Server and worker processes, and the temporary store directories that back them.
 * Purpose: build the server/worker command lines, own their stores, and remove every store on exit.
 * Assumptions: stores live under `config.storeRoot` and are never shared between processes.
 * Usage: const supervisor = new Supervisor({ launcher, logger }); await supervisor.spawnServer(config).
 */

import fs from "node:fs/promises";

import fg from "fast-glob";
import fse from "fs-extra";

import { command, renderCommand, type CommandLine } from "./command.js";
import type { RunConfig } from "./config.js";
import { formatErrorMessage } from "./error-format.js";
import type { JsonlLogger, LogLevel } from "./logger.js";
import { serverStorePrefix, STORE_GLOB_PATTERNS, workerStorePath } from "./paths.js";
import { ExecaProcessLauncher, type ProcessHandle, type ProcessLauncher } from "./processes.js";
import { padIndex, randomSuffix } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type SupervisorOptions = {
  launcher?: ProcessLauncher;
  logger?: JsonlLogger;
  stopSignal?: AbortSignal;
};

export type CleanupReport = {
  removed: string[];
  failed: string[];
};

export type SupervisedConfig = Pick<
  RunConfig,
  "toolsBin" | "logLevel" | "serverArgs" | "workerArgs" | "serverAddr" | "storeRoot"
>;

const VERBOSITY_FLAGS: Record<LogLevel, string | undefined> = {
  error: undefined,
  warn: "-v",
  info: "-vv",
  debug: "-vvv",
};

export function verbosityFlag(level: string): string | undefined {
  const normalized = level === "warning" ? "warn" : level;
  const entry = Object.entries(VERBOSITY_FLAGS).find(([name]) => name === normalized);
  return entry?.[1];
}

// =============================================================================
// COMMAND LINES
// =============================================================================

export function buildServerCommand(config: SupervisedConfig, storeDir: string): CommandLine {
  return command(config.toolsBin)
    .flag(verbosityFlag(config.logLevel))
    .args("server", "--store-dir", storeDir)
    .rawArgs(config.serverArgs)
    .build();
}

export function buildWorkerCommand(config: SupervisedConfig, storeDir: string): CommandLine {
  return command(config.toolsBin)
    .flag(verbosityFlag(config.logLevel))
    .args("worker", "--store-dir", storeDir)
    .rawArgs(config.workerArgs)
    .args(config.serverAddr)
    .build();
}

// =============================================================================
// SUPERVISOR
// =============================================================================

export class Supervisor {
  private readonly launcher: ProcessLauncher;
  private readonly logger?: JsonlLogger;
  private readonly stopSignal?: AbortSignal;

  constructor(opts: SupervisorOptions = {}) {
    this.launcher = opts.launcher ?? new ExecaProcessLauncher();
    this.logger = opts.logger;
    this.stopSignal = opts.stopSignal;
  }

  async createServerStore(config: SupervisedConfig): Promise<string> {
    await fse.ensureDir(config.storeRoot);
    const store = await fs.mkdtemp(serverStorePrefix(config.storeRoot));
    this.logger?.debug("store.server.created", { store });
    return store;
  }

  async allocateWorkerStores(config: SupervisedConfig, count: number): Promise<string[]> {
    const base = randomSuffix();
    const stores: string[] = [];
    for (let i = 1; i <= count; i += 1) {
      const store = workerStorePath(config.storeRoot, base, padIndex(i));
      await fse.ensureDir(store);
      stores.push(store);
    }
    this.logger?.debug("store.worker.created", { count, base, stores });
    return stores;
  }

  /** Runs the server to completion and returns its exit code. */
  async spawnServer(config: SupervisedConfig): Promise<number> {
    const store = await this.createServerStore(config);
    const cmd = buildServerCommand(config, store);

    this.logger?.debug("process.exec", { command: renderCommand(cmd) });
    this.logger?.info("server.start", { store });
    const code = await this.launcher.run(cmd, { label: "server", stopSignal: this.stopSignal });
    this.logger?.info("server.exit", { exit_code: code });
    return code;
  }

  launchWorkers(config: SupervisedConfig, stores: string[]): ProcessHandle[] {
    return stores.map((store, idx) => {
      const cmd = buildWorkerCommand(config, store);
      this.logger?.debug("process.exec", { command: renderCommand(cmd) });
      this.logger?.info("worker.start", { store, server_addr: config.serverAddr });

      const handle = this.launcher.start(cmd, {
        label: `worker-${padIndex(idx + 1)}`,
        stopSignal: this.stopSignal,
      });
      this.logger?.debug("worker.started", { label: handle.label, pid: handle.pid ?? null });
      return handle;
    });
  }

  async spawnWorkers(config: SupervisedConfig, count: number): Promise<ProcessHandle[]> {
    const stores = await this.allocateWorkerStores(config, count);
    return this.launchWorkers(config, stores);
  }

  /** Removes every server and worker store under the store root. Never throws. */
  async cleanupStores(config: Pick<RunConfig, "storeRoot">): Promise<CleanupReport> {
    const report: CleanupReport = { removed: [], failed: [] };
    this.logger?.debug("cleanup.start", { store_root: config.storeRoot });

    let matches: string[];
    try {
      matches = await fg(STORE_GLOB_PATTERNS, {
        cwd: config.storeRoot,
        onlyDirectories: true,
        absolute: true,
        deep: 1,
      });
    } catch (error) {
      this.logger?.warn("cleanup.scan.failed", {
        store_root: config.storeRoot,
        error: formatErrorMessage(error),
      });
      return report;
    }

    for (const store of matches.sort()) {
      try {
        await fse.remove(store);
        report.removed.push(store);
        this.logger?.debug("cleanup.removed", { store });
      } catch (error) {
        report.failed.push(store);
        this.logger?.warn("cleanup.remove.failed", { store, error: formatErrorMessage(error) });
      }
    }

    this.logger?.debug("cleanup.complete", {
      removed: report.removed.length,
      failed: report.failed.length,
    });
    return report;
  }
}
