import fs from "node:fs";

import { Command } from "commander";

import { parseIntegerOption } from "../core/config.js";
import { NotFoundError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { DEFAULT_DB_PATH } from "../core/paths.js";
import {
  ResultStore,
  type Session,
  type SessionSummary,
  type TestResult,
} from "../core/result-store.js";

import { normalizeCommandError } from "./command-errors.js";

// =============================================================================
// TYPES
// =============================================================================

type SessionsOutputOptions = {
  db: string;
  json?: boolean;
};

export type ResultStatus = "ok" | "failed" | "killed";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerSessionsCommand(program: Command): void {
  const sessions = program
    .command("sessions")
    .description("Inspect sessions and results recorded by `batch`");

  sessions
    .command("list")
    .description("List recorded sessions with their result counts")
    .option("--db <path>", "Result database", DEFAULT_DB_PATH)
    .option("--json", "Emit JSON output", false)
    .action(async (opts: SessionsOutputOptions) => {
      await sessionsListCommand(opts);
    });

  sessions
    .command("show")
    .description("Show the per-task results of one session")
    .argument("<id>", "Session id", (v: string) => parseIntegerOption(v, "Session id"))
    .option("--db <path>", "Result database", DEFAULT_DB_PATH)
    .option("--json", "Emit JSON output", false)
    .action(async (id: number, opts: SessionsOutputOptions) => {
      await sessionsShowCommand(id, opts);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function sessionsListCommand(opts: SessionsOutputOptions): Promise<void> {
  await withStore(opts.db, (store) => {
    const sessions = store.listSessions();

    if (opts.json) {
      console.log(JSON.stringify(sessions, null, 2));
      return;
    }

    if (sessions.length === 0) {
      console.log(`No sessions recorded in ${opts.db}.`);
      return;
    }

    printSessionList(opts.db, sessions);
  });
}

export async function sessionsShowCommand(id: number, opts: SessionsOutputOptions): Promise<void> {
  await withStore(opts.db, (store) => {
    const session = store.getSession(id);
    if (!session) {
      throw new NotFoundError(`Session id ${id} not present`);
    }
    const results = store.listResults(id);

    if (opts.json) {
      console.log(JSON.stringify({ session, results }, null, 2));
      return;
    }

    printSessionResults(session, results);
  });
}

export function resultStatus(result: Pick<TestResult, "killed" | "returnCode">): ResultStatus {
  if (result.killed) return "killed";
  return result.returnCode === 0 ? "ok" : "failed";
}

// =============================================================================
// OUTPUT
// =============================================================================

function printSessionList(db: string, sessions: SessionSummary[]): void {
  const rows = sessions.map((session) => ({
    id: String(session.id),
    version: session.version,
    startedAt: formatTimestamp(session.startTime),
    ok: String(session.ok),
    failed: String(session.failed),
    killed: String(session.killed),
  }));

  const headers = {
    id: "ID",
    version: "Version",
    startedAt: "Started",
    ok: "OK",
    failed: "Failed",
    killed: "Killed",
  };

  const widths = {
    id: columnWidth(
      rows.map((row) => row.id),
      headers.id,
    ),
    version: columnWidth(
      rows.map((row) => row.version),
      headers.version,
    ),
    startedAt: columnWidth(
      rows.map((row) => row.startedAt),
      headers.startedAt,
    ),
    ok: columnWidth(
      rows.map((row) => row.ok),
      headers.ok,
    ),
    failed: columnWidth(
      rows.map((row) => row.failed),
      headers.failed,
    ),
  };

  console.log(`Sessions in ${db}:`);
  console.log(
    `${pad(headers.id, widths.id)}  ${pad(headers.version, widths.version)}  ${pad(
      headers.startedAt,
      widths.startedAt,
    )}  ${pad(headers.ok, widths.ok)}  ${pad(headers.failed, widths.failed)}  ${headers.killed}`,
  );

  for (const row of rows) {
    console.log(
      `${pad(row.id, widths.id)}  ${pad(row.version, widths.version)}  ${pad(
        row.startedAt,
        widths.startedAt,
      )}  ${pad(row.ok, widths.ok)}  ${pad(row.failed, widths.failed)}  ${row.killed}`,
    );
  }
}

function printSessionResults(session: Session, results: TestResult[]): void {
  console.log(
    `Session ${session.id} (version ${session.version}, started ${formatTimestamp(session.startTime)}):`,
  );
  if (results.length === 0) {
    console.log("No results recorded.");
    return;
  }

  const rows = results.map((result) => ({
    task: result.taskName,
    status: resultStatus(result),
    code: String(result.returnCode),
    duration: `${result.durationSeconds.toFixed(3)}s`,
  }));

  const headers = { task: "Task", status: "Status", code: "Code", duration: "Duration" };
  const widths = {
    task: columnWidth(
      rows.map((row) => row.task),
      headers.task,
    ),
    status: columnWidth(
      rows.map((row) => row.status),
      headers.status,
    ),
    code: columnWidth(
      rows.map((row) => row.code),
      headers.code,
    ),
  };

  console.log(
    `${pad(headers.task, widths.task)}  ${pad(headers.status, widths.status)}  ${pad(
      headers.code,
      widths.code,
    )}  ${headers.duration}`,
  );
  for (const row of rows) {
    console.log(
      `${pad(row.task, widths.task)}  ${pad(row.status, widths.status)}  ${pad(
        row.code,
        widths.code,
      )}  ${row.duration}`,
    );
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

async function withStore(db: string, fn: (store: ResultStore) => void): Promise<void> {
  let store: ResultStore | undefined;
  try {
    // Read-only commands never create a database.
    if (!fs.existsSync(db)) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.notFound,
        title: "Sessions command failed.",
        message: `No result database at ${db}.`,
        hint: "Pass --db with the path used by `judge-harness batch`.",
      });
    }
    store = ResultStore.openOrCreate(db);
    fn(store);
  } catch (error) {
    throw normalizeCommandError(error, {
      title: "Sessions command failed.",
      notFoundHint: `Run \`judge-harness sessions list --db ${db}\` to see recorded sessions.`,
    });
  } finally {
    store?.close();
  }
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

function formatTimestamp(ts: string): string {
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}
