import { Command } from "commander";

import { runWithCleanup, type SignalHost } from "../core/cleanup-scope.js";
import {
  parseIntegerOption,
  parsePositiveIntegerOption,
  parsePositiveNumberOption,
  resolveLogLevel,
} from "../core/config.js";
import {
  DEFAULT_JUDGE_CORES,
  DEFAULT_JUDGE_TIMEOUT_MS,
  ExecaJudgeRunner,
  type JudgeRunner,
} from "../core/judge.js";
import { JsonlLogger } from "../core/logger.js";
import { DEFAULT_DB_PATH } from "../core/paths.js";
import { ResultStore } from "../core/result-store.js";
import { runBatch, type BatchSummary } from "../core/test-driver.js";

import { normalizeCommandError } from "./command-errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type BatchCliOptions = {
  db: string;
  session?: number;
  timeout: number;
  cores: number;
  logFile?: string;
};

export type BatchCommandInput = BatchCliOptions & {
  judge: string;
  dir: string;
};

export type BatchDeps = {
  runner?: JudgeRunner;
  logger?: JsonlLogger;
  /** Receives progress lines; defaults to stdout. */
  log?: (message: string) => void;
  cwd?: string;
  host?: SignalHost;
  exit?: (code: number) => void;
};

const DEFAULT_TIMEOUT_SECONDS = DEFAULT_JUDGE_TIMEOUT_MS / 1000;

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerBatchCommand(program: Command): void {
  program
    .command("batch")
    .description("Run every task directory through the judge, skipping tasks already recorded")
    .argument("<judge>", "Path to the judge binary")
    .argument("<dir>", "Directory containing one subdirectory per task")
    .option("--db <path>", "Result database", DEFAULT_DB_PATH)
    .option("--session <id>", "Resume an existing session instead of starting a new one", (v: string) =>
      parseIntegerOption(v, "--session"),
    )
    .option(
      "--timeout <seconds>",
      "Wall-clock limit per task",
      (v: string) => parsePositiveNumberOption(v, "--timeout"),
      DEFAULT_TIMEOUT_SECONDS,
    )
    .option(
      "--cores <n>",
      "Cores the judge may use per task",
      (v: string) => parsePositiveIntegerOption(v, "--cores"),
      DEFAULT_JUDGE_CORES,
    )
    .option("--log-file <path>", "Append JSONL log events to a file instead of stderr")
    .action(async (judge: string, dir: string, opts: BatchCliOptions) => {
      await batchCommand({ ...opts, judge, dir });
    });
}

// =============================================================================
// COMMAND
// =============================================================================

export async function batchCommand(
  input: BatchCommandInput,
  deps: BatchDeps = {},
): Promise<BatchSummary> {
  const level = resolveLogLevel();
  const logger =
    deps.logger ??
    (input.logFile
      ? JsonlLogger.toFile(input.logFile, { level })
      : JsonlLogger.toStderr({ level }));
  const log = deps.log ?? ((message: string) => console.log(message));
  const runner = deps.runner ?? new ExecaJudgeRunner(logger);
  const notFoundHint = `Run \`judge-harness sessions list --db ${input.db}\` to see recorded sessions.`;

  let store: ResultStore | undefined;
  try {
    store = ResultStore.openOrCreate(input.db);
    const opened = store;
    const sessionId = await resolveSession(opened, runner, input, log);

    const summary = await runWithCleanup(
      (stopSignal) =>
        runBatch({
          judgePath: input.judge,
          taskRoot: input.dir,
          sessionId,
          store: opened,
          cores: input.cores,
          timeoutMs: input.timeout * 1000,
          runner,
          cwd: deps.cwd,
          logger,
          log,
          stopSignal,
        }),
      {
        cleanup: () => {
          opened.close();
          logger.close();
        },
        host: deps.host,
        exit: deps.exit,
        logger,
      },
    );

    log(
      `Session ${summary.sessionId}: ${summary.executed.length} run, ` +
        `${summary.skipped.length} skipped, ${summary.killed.length} killed`,
    );
    return summary;
  } catch (error) {
    throw normalizeCommandError(error, { title: "Batch failed.", notFoundHint });
  } finally {
    store?.close();
    logger.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveSession(
  store: ResultStore,
  runner: JudgeRunner,
  input: BatchCommandInput,
  log: (message: string) => void,
): Promise<number> {
  if (input.session !== undefined) {
    const id = store.resumeSession(input.session);
    log(`Resuming session ${id}`);
    return id;
  }

  const version = await runner.readVersion(input.judge);
  const id = store.beginSession(version);
  log(`Started session ${id} for judge version ${version || "(unknown)"}`);
  return id;
}
