import { setTimeout as delay } from "node:timers/promises";

// There is no readiness handshake with the server: workers start after a fixed delay and
// retry their own connection. Swap this policy for a health check once the server exposes one.

export interface ReadinessPolicy {
  readonly description: string;
  /** Resolves true when workers may start, false when `signal` aborted the wait. */
  waitForServer(signal?: AbortSignal): Promise<boolean>;
}

export const DEFAULT_READINESS_DELAY_MS = 2_000;

export function createReadinessDelay(ms = DEFAULT_READINESS_DELAY_MS): ReadinessPolicy {
  return {
    description: `fixed ${ms}ms delay`,
    async waitForServer(signal?: AbortSignal): Promise<boolean> {
      if (signal?.aborted) return false;
      try {
        await delay(ms, undefined, { signal });
        return true;
      } catch (error) {
        if (signal?.aborted) return false;
        throw error;
      }
    },
  };
}

/** Waits for `promise` at most `ms`; resolves whether it settled in time. */
export async function joinWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  const settled = promise.then(
    () => true as const,
    () => true as const,
  );

  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
