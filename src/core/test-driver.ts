/**
 * Resumable batch of judge runs over a directory of task subdirectories.
 * Tasks already recorded for the session are never run again, whatever their outcome.
 */

import path from "node:path";
import { performance } from "node:perf_hooks";

import fg from "fast-glob";

import { BatchStoppedError } from "./errors.js";
import {
  buildJudgeCommand,
  DEFAULT_JUDGE_CORES,
  DEFAULT_JUDGE_TIMEOUT_MS,
  ExecaJudgeRunner,
  type JudgeRunner,
} from "./judge.js";
import type { JsonlLogger } from "./logger.js";
import { packageRoot } from "./paths.js";
import type { ResultStore } from "./result-store.js";
import { secondsBetween } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunBatchOptions = {
  judgePath: string;
  taskRoot: string;
  sessionId: number;
  store: ResultStore;
  cores?: number;
  timeoutMs?: number;
  runner?: JudgeRunner;
  /** Working directory for the judge; defaults to the package root. */
  cwd?: string;
  logger?: JsonlLogger;
  log?: (message: string) => void;
  stopSignal?: AbortSignal;
  now?: () => Date;
};

export type BatchSummary = {
  sessionId: number;
  executed: string[];
  skipped: string[];
  killed: string[];
};

// =============================================================================
// DRIVER
// =============================================================================

export async function runBatch(opts: RunBatchOptions): Promise<BatchSummary> {
  const runner = opts.runner ?? new ExecaJudgeRunner(opts.logger);
  const log = opts.log ?? (() => undefined);
  const now = opts.now ?? (() => new Date());
  const cwd = opts.cwd ?? packageRoot();
  const cores = opts.cores ?? DEFAULT_JUDGE_CORES;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_JUDGE_TIMEOUT_MS;
  const logger = opts.logger?.child({ sessionId: opts.sessionId });

  const summary: BatchSummary = { sessionId: opts.sessionId, executed: [], skipped: [], killed: [] };
  const tasks = await listTaskDirs(opts.taskRoot);
  logger?.info("batch.start", { task_root: opts.taskRoot, tasks: tasks.length });

  for (const taskName of tasks) {
    if (opts.stopSignal?.aborted) {
      throw new BatchStoppedError(`Batch stopped before task ${taskName}`);
    }

    if (opts.store.hasResult(opts.sessionId, taskName)) {
      log(`Task ${taskName} already done, skipping`);
      logger?.debug("task.skip", { task: taskName });
      summary.skipped.push(taskName);
      continue;
    }

    const startTime = now();
    log(`Starting ${taskName} at ${startTime.toISOString()}`);
    logger?.log({ type: "task.start", level: "debug", task: taskName });

    const command = buildJudgeCommand({
      judgePath: opts.judgePath,
      taskDir: path.join(opts.taskRoot, taskName),
      cores,
    });

    const startedAt = performance.now();
    const outcome = await runner.run({ command, cwd, timeoutMs, stopSignal: opts.stopSignal });
    const durationSeconds = secondsBetween(startedAt, performance.now());

    opts.store.recordResult(opts.sessionId, {
      taskName,
      startTime: startTime.toISOString(),
      durationSeconds,
      outcome,
    });

    summary.executed.push(taskName);
    if (outcome.kind === "killed") {
      summary.killed.push(taskName);
      log(`Killed ${taskName} after ${durationSeconds.toFixed(3)}s (timeout)`);
      logger?.log({
        type: "task.killed",
        level: "warn",
        task: taskName,
        payload: { duration: durationSeconds },
      });
      continue;
    }

    log(`Completed ${taskName} after ${durationSeconds.toFixed(3)}s`);
    logger?.log({
      type: "task.complete",
      level: "debug",
      task: taskName,
      payload: { duration: durationSeconds, return_code: outcome.returnCode },
    });
  }

  logger?.info("batch.complete", {
    executed: summary.executed.length,
    skipped: summary.skipped.length,
    killed: summary.killed.length,
  });

  return summary;
}

/**
 * Immediate subdirectories of `taskRoot`, in lexicographic order.
 * Symlinks to directories count as tasks; dot entries do not.
 */
export async function listTaskDirs(taskRoot: string): Promise<string[]> {
  const names = await fg("*", { cwd: taskRoot, onlyDirectories: true, deep: 1 });
  return names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
