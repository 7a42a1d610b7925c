import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { FakeJudgeRunner, taskNameOf } from "../__tests__/helpers/fake-judge.js";

import { BatchStoppedError, JudgeSpawnError } from "./errors.js";
import { ResultStore } from "./result-store.js";
import { listTaskDirs, runBatch } from "./test-driver.js";

// =============================================================================
// HELPERS
// =============================================================================

const tempDirs: string[] = [];
const stores: ResultStore[] = [];

afterEach(() => {
  for (const store of stores) store.close();
  stores.length = 0;
  for (const dir of tempDirs) fs.rmSync(dir, { recursive: true, force: true });
  tempDirs.length = 0;
});

function makeTaskRoot(names: string[]): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "test-driver-"));
  tempDirs.push(root);
  const tasks = path.join(root, "tasks");
  fs.mkdirSync(tasks);
  for (const name of names) fs.mkdirSync(path.join(tasks, name));
  return tasks;
}

function openStore(taskRoot: string): ResultStore {
  const store = ResultStore.openOrCreate(path.join(path.dirname(taskRoot), "db.sqlite3"));
  stores.push(store);
  return store;
}

// =============================================================================
// TESTS
// =============================================================================

describe("listTaskDirs", () => {
  it("returns only immediate directories in lexicographic order", async () => {
    const root = makeTaskRoot(["beta", "Zeta", "alpha", "10", "9"]);
    fs.writeFileSync(path.join(root, "notes.txt"), "not a task");
    fs.mkdirSync(path.join(root, "alpha", "nested"));

    expect(await listTaskDirs(root)).toEqual(["10", "9", "Zeta", "alpha", "beta"]);
  });

  it("follows symlinked task directories and skips dot entries", async () => {
    const root = makeTaskRoot(["alpha", ".git"]);
    const elsewhere = fs.mkdtempSync(path.join(os.tmpdir(), "test-driver-linked-"));
    tempDirs.push(elsewhere);
    fs.symlinkSync(elsewhere, path.join(root, "beta"));
    fs.symlinkSync(path.join(elsewhere, "missing"), path.join(root, "dangling"));

    expect(await listTaskDirs(root)).toEqual(["alpha", "beta"]);
  });
});

describe("runBatch", () => {
  it("records one row per task and resumes without re-running anything", async () => {
    const root = makeTaskRoot(["beta", "alpha"]);
    const store = openStore(root);
    const sessionId = store.beginSession("fake 0.0.1");
    const runner = new FakeJudgeRunner({
      alpha: { kind: "completed", stdout: "{}", stderr: "", returnCode: 0 },
      beta: { kind: "killed" },
    });
    const messages: string[] = [];

    const first = await runBatch({
      judgePath: "/opt/judge/bin/judge",
      taskRoot: root,
      sessionId,
      store,
      cores: 3,
      timeoutMs: 1_000,
      cwd: "/opt/judge",
      runner,
      log: (message) => messages.push(message),
    });

    expect(first).toEqual({
      sessionId,
      executed: ["alpha", "beta"],
      skipped: [],
      killed: ["beta"],
    });
    expect(runner.invocations).toHaveLength(2);

    const rows = store.listResults(sessionId);
    expect(rows.map((row) => [row.taskName, row.killed, row.returnCode])).toEqual([
      ["alpha", false, 0],
      ["beta", true, -1],
    ]);
    expect(rows[1].stdout).toBe("");
    expect(rows[1].stderr).toBe("");

    const second = await runBatch({
      judgePath: "/opt/judge/bin/judge",
      taskRoot: root,
      sessionId,
      store,
      runner,
      cwd: "/opt/judge",
      log: (message) => messages.push(message),
    });

    expect(second).toEqual({
      sessionId,
      executed: [],
      skipped: ["alpha", "beta"],
      killed: [],
    });
    expect(runner.invocations).toHaveLength(2);
    expect(store.listResults(sessionId)).toEqual(rows);
    expect(messages.slice(-2)).toEqual([
      "Task alpha already done, skipping",
      "Task beta already done, skipping",
    ]);
  });

  it("passes the judge command, working directory and timeout to the runner", async () => {
    const root = makeTaskRoot(["alpha"]);
    const store = openStore(root);
    const sessionId = store.beginSession("v");
    const runner = new FakeJudgeRunner({});

    await runBatch({
      judgePath: "/opt/judge/bin/judge",
      taskRoot: root,
      sessionId,
      store,
      cores: 5,
      timeoutMs: 2_500,
      cwd: "/opt/judge",
      runner,
    });

    expect(runner.invocations).toHaveLength(1);
    const [invocation] = runner.invocations;
    expect(invocation.cwd).toBe("/opt/judge");
    expect(invocation.timeoutMs).toBe(2_500);
    expect(invocation.command).toEqual({
      file: "/opt/judge/bin/judge",
      args: [
        "--task-dir",
        path.join(root, "alpha"),
        "--num-cores",
        "5",
        "--no-cache",
        "--ui",
        "json",
      ],
    });
  });

  it("records non-zero return codes as ordinary results", async () => {
    const root = makeTaskRoot(["alpha", "beta"]);
    const store = openStore(root);
    const sessionId = store.beginSession("v");
    const runner = new FakeJudgeRunner({
      alpha: { kind: "completed", stdout: "out", stderr: "panic", returnCode: 101 },
    });

    const summary = await runBatch({
      judgePath: "judge",
      taskRoot: root,
      sessionId,
      store,
      cwd: root,
      runner,
    });

    expect(summary.executed).toEqual(["alpha", "beta"]);
    const [alpha] = store.listResults(sessionId);
    expect(alpha).toMatchObject({
      taskName: "alpha",
      killed: false,
      stdout: "out",
      stderr: "panic",
      returnCode: 101,
    });
  });

  it("aborts the batch on a spawn failure without recording the failing task", async () => {
    const root = makeTaskRoot(["alpha", "beta", "gamma"]);
    const store = openStore(root);
    const sessionId = store.beginSession("v");
    const runner = new FakeJudgeRunner({
      beta: new JudgeSpawnError("Failed to start the judge judge: ENOENT"),
    });

    await expect(
      runBatch({ judgePath: "judge", taskRoot: root, sessionId, store, cwd: root, runner }),
    ).rejects.toThrow(JudgeSpawnError);

    expect(store.listResults(sessionId).map((row) => row.taskName)).toEqual(["alpha"]);
    expect(runner.invocations.map((inv) => taskNameOf(inv.command))).toEqual(["alpha", "beta"]);
  });

  it("stops between tasks once the stop signal fires", async () => {
    const root = makeTaskRoot(["alpha", "beta"]);
    const store = openStore(root);
    const sessionId = store.beginSession("v");
    const controller = new AbortController();
    const runner = new FakeJudgeRunner({}, () => controller.abort());

    await expect(
      runBatch({
        judgePath: "judge",
        taskRoot: root,
        sessionId,
        store,
        cwd: root,
        runner,
        stopSignal: controller.signal,
      }),
    ).rejects.toThrow(BatchStoppedError);

    expect(store.listResults(sessionId).map((row) => row.taskName)).toEqual(["alpha"]);
  });

  it("keeps results of other sessions separate", async () => {
    const root = makeTaskRoot(["alpha"]);
    const store = openStore(root);
    const first = store.beginSession("v1");
    const second = store.beginSession("v2");
    const runner = new FakeJudgeRunner({});

    await runBatch({ judgePath: "judge", taskRoot: root, sessionId: first, store, cwd: root, runner });
    const summary = await runBatch({
      judgePath: "judge",
      taskRoot: root,
      sessionId: second,
      store,
      cwd: root,
      runner,
    });

    expect(summary.executed).toEqual(["alpha"]);
    expect(runner.invocations).toHaveLength(2);
  });
});
