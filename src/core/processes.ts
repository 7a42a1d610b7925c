/**
 * Process launching for supervised children (server, workers, fallback shell).
 * Purpose: keep execa behind a small port so the supervisor and coordinator can be tested with fakes.
 * Assumptions: children inherit stdio; the harness never reads their output.
 */

import os from "node:os";

import { execa, ExecaError } from "execa";

import { renderCommand, type CommandLine } from "./command.js";
import { ProcessSpawnError } from "./errors.js";

// =============================================================================
// PORTS
// =============================================================================

export interface ProcessHandle {
  readonly pid: number | undefined;
  readonly label: string;
  readonly running: boolean;
  /** Resolves with the exit code; rejects with ProcessSpawnError when the process never started. */
  wait(): Promise<number>;
  /** Polite termination request (SIGTERM). */
  terminate(): void;
  /** Stops the child from keeping the harness alive; the child itself keeps running. */
  release(): void;
}

export type LaunchOptions = {
  label: string;
  stopSignal?: AbortSignal;
};

export interface ProcessLauncher {
  /** Starts the command and waits for it to exit. */
  run(cmd: CommandLine, opts: LaunchOptions): Promise<number>;
  /** Starts the command and returns immediately. */
  start(cmd: CommandLine, opts: LaunchOptions): ProcessHandle;
}

// =============================================================================
// EXECA ADAPTER
// =============================================================================

export class ExecaProcessLauncher implements ProcessLauncher {
  async run(cmd: CommandLine, opts: LaunchOptions): Promise<number> {
    return this.start(cmd, opts).wait();
  }

  start(cmd: CommandLine, opts: LaunchOptions): ProcessHandle {
    const subprocess = execa(cmd.file, cmd.args, {
      stdio: "inherit",
      cancelSignal: opts.stopSignal,
      killSignal: "SIGTERM",
    });
    return new ExecaProcessHandle(
      {
        pid: subprocess.pid,
        exit: awaitExitCode(subprocess, cmd),
        kill: () => subprocess.kill("SIGTERM"),
        unref: () => subprocess.unref(),
      },
      opts.label,
    );
  }
}

type SpawnedProcess = {
  pid: number | undefined;
  exit: Promise<number>;
  kill: () => void;
  unref: () => void;
};

class ExecaProcessHandle implements ProcessHandle {
  private settled = false;
  private readonly exit: Promise<number>;

  constructor(
    private readonly spawned: SpawnedProcess,
    readonly label: string,
  ) {
    this.exit = spawned.exit.finally(() => {
      this.settled = true;
    });
  }

  get pid(): number | undefined {
    return this.spawned.pid;
  }

  get running(): boolean {
    return !this.settled;
  }

  wait(): Promise<number> {
    return this.exit;
  }

  terminate(): void {
    if (this.settled) return;
    this.spawned.kill();
  }

  release(): void {
    if (this.settled) return;
    this.spawned.unref();
  }
}

// =============================================================================
// EXIT CODES
// =============================================================================

export function signalNumber(signal: string): number | undefined {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return entry?.[1];
}

/** Conventional shell exit code for a process terminated by a signal. */
export function signalExitCode(signal: string): number {
  const num = signalNumber(signal);
  return num === undefined ? 1 : 128 + num;
}

async function awaitExitCode(
  subprocess: PromiseLike<{ exitCode?: number }>,
  cmd: CommandLine,
): Promise<number> {
  try {
    const result = await subprocess;
    return result.exitCode ?? 0;
  } catch (error) {
    return exitCodeFromError(error, cmd);
  }
}

function exitCodeFromError(error: unknown, cmd: CommandLine): number {
  if (!(error instanceof ExecaError)) throw error;
  if (error.exitCode !== undefined) return error.exitCode;
  if (error.signal) return signalExitCode(error.signal);

  throw new ProcessSpawnError(
    `Failed to start ${renderCommand(cmd)}: ${error.shortMessage}`,
    error,
    error.code,
  );
}

export function isMissingExecutable(error: unknown): boolean {
  return error instanceof ProcessSpawnError && error.code === "ENOENT";
}
