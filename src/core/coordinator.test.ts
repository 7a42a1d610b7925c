import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FakeProcessLauncher, type FakeBehavior } from "../__tests__/helpers/fake-launcher.js";
import { createMemoryLogger } from "../__tests__/helpers/memory-logger.js";

import { command, type CommandLine } from "./command.js";
import { loadRunConfig, type RunConfig } from "./config.js";
import { Coordinator, selectMode } from "./coordinator.js";
import { ProcessSpawnError } from "./errors.js";
import {
  ExecaProcessLauncher,
  type LaunchOptions,
  type ProcessHandle,
  type ProcessLauncher,
} from "./processes.js";
import { createReadinessDelay } from "./readiness.js";

// Real children, one shell script per launch label.
class ScriptedLauncher implements ProcessLauncher {
  readonly handles: ProcessHandle[] = [];
  private readonly real = new ExecaProcessLauncher();

  constructor(private readonly scripts: Record<string, string>) {}

  async run(cmd: CommandLine, opts: LaunchOptions): Promise<number> {
    return this.start(cmd, opts).wait();
  }

  start(_cmd: CommandLine, opts: LaunchOptions): ProcessHandle {
    const script = this.scripts[opts.label] ?? "exit 0";
    const handle = this.real.start(command("/bin/sh").args("-c", script).build(), opts);
    this.handles.push(handle);
    return handle;
  }
}

function activeChildProcesses(): number {
  return process.getActiveResourcesInfo().filter((resource) => resource === "ProcessWrap").length;
}

describe("selectMode", () => {
  it("maps the spawn toggles to a supervision mode", () => {
    expect(selectMode({ spawnServer: true, spawnWorkers: true })).toBe("server+workers");
    expect(selectMode({ spawnServer: true, spawnWorkers: false })).toBe("server-only");
    expect(selectMode({ spawnServer: false, spawnWorkers: true })).toBe("workers-only");
    expect(selectMode({ spawnServer: false, spawnWorkers: false })).toBe("shell");
  });
});

describe("Coordinator", () => {
  let tmpDir: string;
  let markerPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "coordinator-"));
    markerPath = path.join(tmpDir, "nworkers");
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  function makeConfig(env: NodeJS.ProcessEnv, jobs = 2): RunConfig {
    return loadRunConfig({
      env: { HARNESS_STORE_ROOT: path.join(tmpDir, "stores"), ...env },
      jobs,
      workersFile: markerPath,
    });
  }

  function readMarker(): string {
    return fs.readFileSync(markerPath, "utf8");
  }

  function subcommand(cmd: CommandLine): string {
    return cmd.args.find((arg) => !arg.startsWith("-")) ?? "";
  }

  it("runs workers only and reports the highest worker exit code", async () => {
    const launcher = new FakeProcessLauncher((cmd): FakeBehavior => {
      const store = cmd.args[cmd.args.indexOf("--store-dir") + 1] ?? "";
      return store.endsWith("-02") ? { kind: "exit", code: 5 } : { kind: "exit", code: 0 };
    });
    const coordinator = new Coordinator({ launcher });

    const code = await coordinator.run(makeConfig({ SPAWN_SERVER: "false" }));

    expect(code).toBe(5);
    expect(readMarker()).toBe("2\n");
    expect(launcher.labels()).toEqual(["worker-01", "worker-02"]);
    expect(launcher.launched.map((record) => record.cmd.args.at(-1))).toEqual([
      "127.0.0.1:27183",
      "127.0.0.1:27183",
    ]);
  });

  it("runs the server only and returns its exit code", async () => {
    const launcher = new FakeProcessLauncher(() => ({ kind: "exit", code: 7 }));
    const coordinator = new Coordinator({ launcher });

    const code = await coordinator.run(makeConfig({ SPAWN_WORKERS: "False" }));

    expect(code).toBe(7);
    expect(readMarker()).toBe("0\n");
    expect(launcher.subcommands()).toEqual(["server"]);
  });

  it("fails when the server binary cannot be started", async () => {
    const launcher = new FakeProcessLauncher(() => ({ kind: "missing" }));
    const coordinator = new Coordinator({ launcher });

    await expect(coordinator.run(makeConfig({ SPAWN_WORKERS: "no" }))).rejects.toBeInstanceOf(
      ProcessSpawnError,
    );
  });

  it("terminates workers still running after the server exits", async () => {
    const launcher = new FakeProcessLauncher((cmd): FakeBehavior =>
      subcommand(cmd) === "server" ? { kind: "exit", code: 0, delayMs: 50 } : { kind: "hang" },
    );
    const coordinator = new Coordinator({
      launcher,
      readiness: createReadinessDelay(0),
      joinWindowMs: 20,
    });

    const code = await coordinator.run(makeConfig({}, 3));

    expect(code).toBe(0);
    expect(readMarker()).toBe("3\n");
    expect(launcher.subcommands()).toEqual(["server", "worker", "worker", "worker"]);
    const workers = launcher.launched.filter((record) => record.label.startsWith("worker-"));
    expect(workers.map((record) => record.handle.terminated)).toEqual([true, true, true]);
    expect(workers.map((record) => record.handle.released)).toEqual([true, true, true]);
  });

  it("does not wait for a worker that ignores SIGTERM after the server exits", async () => {
    const launcher = new ScriptedLauncher({
      server: "sleep 0.3; exit 3",
      "worker-01": "trap '' TERM; exec sleep 5",
    });
    const coordinator = new Coordinator({
      launcher,
      readiness: createReadinessDelay(50),
      joinWindowMs: 200,
    });
    const baseline = activeChildProcesses();

    try {
      const startedAt = Date.now();
      const code = await coordinator.run(makeConfig({}, 1));

      expect(code).toBe(3);
      expect(Date.now() - startedAt).toBeLessThan(3_000);
      expect(launcher.handles.map((handle) => [handle.label, handle.running])).toEqual([
        ["server", false],
        ["worker-01", true],
      ]);
      // The lingering worker no longer holds the event loop open.
      expect(activeChildProcesses()).toBe(baseline);
    } finally {
      for (const handle of launcher.handles) {
        if (handle.running && handle.pid !== undefined) process.kill(handle.pid, "SIGKILL");
      }
    }
  });

  it("returns the server code without terminating workers that already exited", async () => {
    const launcher = new FakeProcessLauncher((cmd): FakeBehavior =>
      subcommand(cmd) === "server"
        ? { kind: "exit", code: 2, delayMs: 60 }
        : { kind: "exit", code: 9 },
    );
    const coordinator = new Coordinator({
      launcher,
      readiness: createReadinessDelay(0),
      joinWindowMs: 200,
    });

    const code = await coordinator.run(makeConfig({}));

    expect(code).toBe(2);
    const workers = launcher.launched.filter((record) => record.label.startsWith("worker-"));
    expect(workers).toHaveLength(2);
    expect(workers.map((record) => record.handle.terminated)).toEqual([false, false]);
  });

  it("skips the worker launch when the server exits during the readiness delay", async () => {
    const launcher = new FakeProcessLauncher(() => ({ kind: "exit", code: 4 }));
    const coordinator = new Coordinator({
      launcher,
      readiness: createReadinessDelay(10_000),
      joinWindowMs: 1_000,
    });

    const startedAt = Date.now();
    const code = await coordinator.run(makeConfig({}));

    expect(code).toBe(4);
    expect(launcher.subcommands()).toEqual(["server"]);
    expect(readMarker()).toBe("2\n");
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  it("logs worker launch failures and lets the server decide the exit code", async () => {
    const { logger, types } = createMemoryLogger();
    const launcher = new FakeProcessLauncher((cmd): FakeBehavior =>
      subcommand(cmd) === "server" ? { kind: "exit", code: 0, delayMs: 40 } : { kind: "missing" },
    );
    const coordinator = new Coordinator({
      launcher,
      logger,
      readiness: createReadinessDelay(0),
      joinWindowMs: 100,
    });

    const code = await coordinator.run(makeConfig({}));

    expect(code).toBe(0);
    expect(types()).toContain("workers.launch.failed");
  });

  it("stops workers when the stop signal fires", async () => {
    const launcher = new FakeProcessLauncher(() => ({ kind: "hang" }));
    const coordinator = new Coordinator({ launcher });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const code = await coordinator.run(makeConfig({ SPAWN_SERVER: "false" }), controller.signal);

    expect(code).toBe(143);
  });

  it("falls back to the configured shell when nothing is spawned", async () => {
    const launcher = new FakeProcessLauncher(() => ({ kind: "exit", code: 9 }));
    const coordinator = new Coordinator({ launcher });

    const code = await coordinator.run(
      makeConfig({ SPAWN_SERVER: "false", SPAWN_WORKERS: "false", SHELL: "/bin/test-shell" }),
    );

    expect(code).toBe(9);
    expect(readMarker()).toBe("0\n");
    expect(launcher.launched.map((record) => record.cmd)).toEqual([
      { file: "/bin/test-shell", args: [] },
    ]);
  });

  it("returns 0 when the fallback shell does not exist", async () => {
    const { logger, events } = createMemoryLogger();
    const launcher = new FakeProcessLauncher(() => ({ kind: "missing" }));
    const coordinator = new Coordinator({ launcher, logger });

    const code = await coordinator.run(
      makeConfig({ SPAWN_SERVER: "false", SPAWN_WORKERS: "false", SHELL: "/no/such/shell" }),
    );

    expect(code).toBe(0);
    const missing = events().find((event) => event.type === "shell.missing");
    expect(missing?.level).toBe("error");
    expect(missing?.payload).toEqual({ shell: "/no/such/shell" });
  });

  it("resets a stale marker before running", async () => {
    fs.writeFileSync(markerPath, "12\n");
    const launcher = new FakeProcessLauncher(() => ({ kind: "exit", code: 0 }));

    await new Coordinator({ launcher }).run(makeConfig({ SPAWN_WORKERS: "false" }));

    expect(readMarker()).toBe("0\n");
  });
});
