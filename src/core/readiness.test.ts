import { describe, expect, it } from "vitest";

import { createReadinessDelay, joinWithin } from "./readiness.js";

describe("createReadinessDelay", () => {
  it("resolves true once the delay has elapsed", async () => {
    const policy = createReadinessDelay(10);

    expect(policy.description).toBe("fixed 10ms delay");
    await expect(policy.waitForServer()).resolves.toBe(true);
  });

  it("resolves false when the wait is aborted", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(createReadinessDelay(10_000).waitForServer(controller.signal)).resolves.toBe(false);
  });

  it("resolves false immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createReadinessDelay(10_000).waitForServer(controller.signal)).resolves.toBe(false);
  });
});

describe("joinWithin", () => {
  it("reports a promise that settles in time", async () => {
    await expect(joinWithin(Promise.resolve("done"), 100)).resolves.toBe(true);
    await expect(joinWithin(Promise.reject(new Error("boom")), 100)).resolves.toBe(true);
  });

  it("gives up on a promise that outlives the window", async () => {
    const never = new Promise<void>(() => undefined);

    await expect(joinWithin(never, 10)).resolves.toBe(false);
  });
});
