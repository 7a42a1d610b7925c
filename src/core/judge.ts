/**
 * Judge invocation for the test driver.
 * Purpose: run one task through the external judge binary under a wall-clock timeout.
 * Assumptions: the judge accepts `--task-dir`, `--num-cores`, `--no-cache` and `--ui json`.
 * Usage: await new ExecaJudgeRunner().run({ command: buildJudgeCommand(...), cwd, timeoutMs }).
 */

import path from "node:path";

import { execa, ExecaError } from "execa";

import { command, renderCommand, type CommandLine } from "./command.js";
import { BatchStoppedError, JudgeSpawnError } from "./errors.js";
import type { JsonlLogger } from "./logger.js";
import { signalNumber } from "./processes.js";
import type { CapturedOutput, TaskOutcome } from "./result-store.js";

// =============================================================================
// TYPES
// =============================================================================

export type JudgeInvocation = {
  command: CommandLine;
  cwd: string;
  timeoutMs: number;
  stopSignal?: AbortSignal;
};

export interface JudgeRunner {
  readVersion(judgePath: string): Promise<string>;
  run(invocation: JudgeInvocation): Promise<TaskOutcome>;
}

export type JudgeCommandInput = {
  judgePath: string;
  taskDir: string;
  cores: number;
};

export const DEFAULT_JUDGE_TIMEOUT_MS = 3 * 60 * 1000;
export const DEFAULT_JUDGE_CORES = 7;
const VERSION_TIMEOUT_MS = 30_000;

// Merged over the harness environment for every judge run.
const JUDGE_ENV: Readonly<Record<string, string>> = { RUST_BACKTRACE: "1" };

// =============================================================================
// COMMAND
// =============================================================================

export function buildJudgeCommand(input: JudgeCommandInput): CommandLine {
  return command(path.resolve(input.judgePath))
    .args("--task-dir", path.resolve(input.taskDir))
    .args("--num-cores", String(input.cores))
    .args("--no-cache")
    .args("--ui", "json")
    .build();
}

// =============================================================================
// RUNNER
// =============================================================================

export class ExecaJudgeRunner implements JudgeRunner {
  constructor(private readonly logger?: JsonlLogger) {}

  async readVersion(judgePath: string): Promise<string> {
    const file = path.resolve(judgePath);
    try {
      const result = await execa(file, ["--version"], {
        stdin: "ignore",
        timeout: VERSION_TIMEOUT_MS,
      });
      return asText(result.stdout).trim();
    } catch (error) {
      if (error instanceof ExecaError && error.exitCode !== undefined && !error.timedOut) {
        return asText(error.stdout).trim();
      }
      throw new JudgeSpawnError(`Failed to read the judge version from ${file}`, error);
    }
  }

  async run(invocation: JudgeInvocation): Promise<TaskOutcome> {
    const { stopSignal } = invocation;
    if (stopSignal?.aborted) {
      throw new BatchStoppedError("Batch stopped before the judge was started");
    }

    this.logger?.debug("judge.exec", {
      command: renderCommand(invocation.command),
      cwd: invocation.cwd,
    });

    // Detached: the judge leads its own process group, so a timeout can take its descendants too.
    const subprocess = execa(invocation.command.file, invocation.command.args, {
      cwd: invocation.cwd,
      env: JUDGE_ENV,
      detached: true,
      stdin: "ignore",
      encoding: "buffer",
      stripFinalNewline: false,
    });
    const pid = subprocess.pid;

    let timedOut = false;
    let stopped = false;
    const timer = setTimeout(() => {
      timedOut = true;
      this.killGroup(pid);
    }, invocation.timeoutMs);
    const onStop = (): void => {
      stopped = true;
      this.killGroup(pid);
    };
    stopSignal?.addEventListener("abort", onStop, { once: true });

    try {
      const result = await subprocess;
      return completed(result.stdout, result.stderr, result.exitCode ?? 0);
    } catch (error) {
      if (!(error instanceof ExecaError)) throw error;

      if (timedOut) return { kind: "killed" };
      if (stopped) {
        throw new BatchStoppedError("Batch stopped while the judge was running", error);
      }
      if (error.exitCode !== undefined) {
        return completed(error.stdout, error.stderr, error.exitCode);
      }
      if (error.signal) {
        return completed(error.stdout, error.stderr, -(signalNumber(error.signal) ?? 0));
      }

      throw new JudgeSpawnError(
        `Failed to start the judge ${invocation.command.file}: ${error.shortMessage}`,
        error,
      );
    } finally {
      clearTimeout(timer);
      stopSignal?.removeEventListener("abort", onStop);
    }
  }

  private killGroup(pid: number | undefined): void {
    if (pid === undefined) return;
    try {
      process.kill(-pid, "SIGKILL");
    } catch (error) {
      // ESRCH: the group is already gone.
      this.logger?.debug("judge.kill.skip", { pid, reason: String(error) });
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function completed(stdout: unknown, stderr: unknown, returnCode: number): TaskOutcome {
  return { kind: "completed", stdout: asBytes(stdout), stderr: asBytes(stderr), returnCode };
}

function asBytes(value: unknown): CapturedOutput {
  if (value instanceof Uint8Array) return value;
  return typeof value === "string" ? value : new Uint8Array();
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
  return "";
}
