/**
 * Durable record of batch sessions and per-task judge outcomes (SQLite).
 * Every write is a single statement committed before the call returns, so a crash between
 * tasks loses at most the task that was running.
 */

import path from "node:path";

import Database from "better-sqlite3";
import fse from "fs-extra";

import { DuplicateKeyError, NotFoundError, StorageError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

/** Judge output as captured; bytes are stored unchanged. */
export type CapturedOutput = string | Uint8Array;

export type TaskOutcome =
  | { kind: "completed"; stdout: CapturedOutput; stderr: CapturedOutput; returnCode: number }
  | { kind: "killed" };

export type TestResultInput = {
  taskName: string;
  startTime: string;
  durationSeconds: number;
  outcome: TaskOutcome;
};

export type TestResult = {
  taskName: string;
  sessionId: number;
  startTime: string;
  durationSeconds: number;
  killed: boolean;
  stdout: string;
  stderr: string;
  returnCode: number;
};

export type Session = {
  id: number;
  version: string;
  startTime: string;
};

export type SessionSummary = Session & {
  total: number;
  ok: number;
  failed: number;
  killed: number;
};

export const KILLED_RETURN_CODE = -1;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sessions (
    id INTEGER PRIMARY KEY,
    version TEXT NOT NULL,
    start_time TIMESTAMP NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tests (
    task_name TEXT NOT NULL,
    session_id INTEGER NOT NULL,
    start_time TIMESTAMP NOT NULL,
    duration DOUBLE NOT NULL,
    killed INTEGER NOT NULL CHECK ( killed = 0 OR killed = 1 ),
    stdout TEXT NOT NULL,
    stderr TEXT NOT NULL,
    return_code INTEGER NOT NULL,
    PRIMARY KEY (task_name, session_id),
    FOREIGN KEY (session_id) REFERENCES sessions(id)
  );
`;

const EXPECTED_COLUMNS: Record<string, string[]> = {
  sessions: ["id", "version", "start_time"],
  tests: [
    "task_name",
    "session_id",
    "start_time",
    "duration",
    "killed",
    "stdout",
    "stderr",
    "return_code",
  ],
};

type SessionRow = { id: number; version: string; start_time: string };

type TestRow = {
  task_name: string;
  session_id: number;
  start_time: string;
  duration: number;
  killed: number;
  stdout: string | Buffer;
  stderr: string | Buffer;
  return_code: number;
};

type SessionSummaryRow = SessionRow & {
  total: number;
  ok: number;
  failed: number;
  killed: number;
};

// =============================================================================
// STORE
// =============================================================================

export class ResultStore {
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    readonly filePath: string,
  ) {}

  static openOrCreate(filePath: string): ResultStore {
    let db: Database.Database | undefined;
    try {
      fse.ensureDirSync(path.dirname(path.resolve(filePath)));
      db = new Database(filePath);
      db.pragma("foreign_keys = ON");
      db.exec(SCHEMA);
      verifySchema(db);
      return new ResultStore(db, filePath);
    } catch (error) {
      db?.close();
      if (error instanceof StorageError) throw error;
      throw new StorageError(
        `Cannot open result store at ${filePath}: ${formatErrorMessage(error)}`,
        error,
      );
    }
  }

  beginSession(version: string, now: Date = new Date()): number {
    const res = this.run(
      () =>
        this.db
          .prepare("INSERT INTO sessions (version, start_time) VALUES (?, ?)")
          .run(version, now.toISOString()),
      "create session",
    );
    return Number(res.lastInsertRowid);
  }

  resumeSession(id: number): number {
    if (!this.getSession(id)) {
      throw new NotFoundError(`Session id ${id} not present`);
    }
    return id;
  }

  getSession(id: number): Session | undefined {
    const row = this.run(
      () =>
        this.db
          .prepare("SELECT id, version, start_time FROM sessions WHERE id = ?")
          .get(id) as SessionRow | undefined,
      "read session",
    );
    return row ? toSession(row) : undefined;
  }

  hasResult(sessionId: number, taskName: string): boolean {
    const row = this.run(
      () =>
        this.db
          .prepare("SELECT 1 AS found FROM tests WHERE task_name = ? AND session_id = ?")
          .get(taskName, sessionId),
      "read result",
    );
    return row !== undefined;
  }

  recordResult(sessionId: number, result: TestResultInput): void {
    const row = toTestRow(sessionId, result);
    try {
      this.db
        .prepare(
          `INSERT INTO tests
            (task_name, session_id, start_time, duration, killed, stdout, stderr, return_code)
           VALUES
            (@task_name, @session_id, @start_time, @duration, @killed, @stdout, @stderr, @return_code)`,
        )
        .run(row);
    } catch (error) {
      throw mapInsertError(error, sessionId, result.taskName);
    }
  }

  listSessions(): SessionSummary[] {
    const rows = this.run(
      () =>
        this.db
          .prepare(
            `SELECT s.id, s.version, s.start_time,
                    COUNT(t.task_name) AS total,
                    COALESCE(SUM(CASE WHEN t.killed = 0 AND t.return_code = 0 THEN 1 ELSE 0 END), 0) AS ok,
                    COALESCE(SUM(CASE WHEN t.killed = 0 AND t.return_code <> 0 THEN 1 ELSE 0 END), 0) AS failed,
                    COALESCE(SUM(t.killed), 0) AS killed
               FROM sessions s
               LEFT JOIN tests t ON t.session_id = s.id
              GROUP BY s.id
              ORDER BY s.id`,
          )
          .all() as SessionSummaryRow[],
      "list sessions",
    );

    return rows.map((row) => ({
      ...toSession(row),
      total: row.total,
      ok: row.ok,
      failed: row.failed,
      killed: row.killed,
    }));
  }

  listResults(sessionId: number): TestResult[] {
    const rows = this.run(
      () =>
        this.db
          .prepare("SELECT * FROM tests WHERE session_id = ? ORDER BY task_name")
          .all(sessionId) as TestRow[],
      "list results",
    );
    return rows.map(toTestResult);
  }

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }

  private run<T>(fn: () => T, action: string): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(`Failed to ${action}: ${formatErrorMessage(error)}`, error);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function verifySchema(db: Database.Database): void {
  for (const [table, expected] of Object.entries(EXPECTED_COLUMNS)) {
    const columns = (db.pragma(`table_info(${table})`) as { name: string }[]).map(
      (column) => column.name,
    );
    const missing = expected.filter((name) => !columns.includes(name));
    if (missing.length > 0) {
      throw new StorageError(
        `Incompatible result store: table ${table} is missing column(s) ${missing.join(", ")}`,
      );
    }
  }
}

function toTestRow(sessionId: number, result: TestResultInput): TestRow {
  const base = {
    task_name: result.taskName,
    session_id: sessionId,
    start_time: result.startTime,
    duration: result.durationSeconds,
  };

  if (result.outcome.kind === "killed") {
    return { ...base, killed: 1, stdout: "", stderr: "", return_code: KILLED_RETURN_CODE };
  }

  return {
    ...base,
    killed: 0,
    stdout: toColumn(result.outcome.stdout),
    stderr: toColumn(result.outcome.stderr),
    return_code: result.outcome.returnCode,
  };
}

function toSession(row: SessionRow): Session {
  return { id: row.id, version: row.version, startTime: row.start_time };
}

function toTestResult(row: TestRow): TestResult {
  return {
    taskName: row.task_name,
    sessionId: row.session_id,
    startTime: row.start_time,
    durationSeconds: row.duration,
    killed: row.killed === 1,
    stdout: decodeOutput(row.stdout),
    stderr: decodeOutput(row.stderr),
    returnCode: row.return_code,
  };
}

function toColumn(output: CapturedOutput): string | Buffer {
  if (typeof output === "string") return output;
  return Buffer.from(output.buffer, output.byteOffset, output.byteLength);
}

/** Text view of a stored output column; invalid UTF-8 sequences read as U+FFFD. */
export function decodeOutput(value: CapturedOutput): string {
  return typeof value === "string" ? value : Buffer.from(value).toString("utf8");
}

function mapInsertError(error: unknown, sessionId: number, taskName: string): Error {
  const code = sqliteErrorCode(error);
  if (code === "SQLITE_CONSTRAINT_PRIMARYKEY") {
    return new DuplicateKeyError(
      `Result for task ${taskName} in session ${sessionId} is already recorded`,
      error,
    );
  }
  if (code === "SQLITE_CONSTRAINT_FOREIGNKEY") {
    return new NotFoundError(`Session id ${sessionId} not present`, error);
  }
  return new StorageError(
    `Failed to record result for task ${taskName}: ${formatErrorMessage(error)}`,
    error,
  );
}

function sqliteErrorCode(error: unknown): string | undefined {
  if (error instanceof Database.SqliteError) return error.code;
  return undefined;
}
