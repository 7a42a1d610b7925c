/**
 * Runs supervised work under a cleanup action that fires exactly once on every exit path.
 * Purpose: replace exit hooks registered at import time with an explicit, composable scope.
 * Assumptions: the caller owns process exit; signals end the process with a fixed code.
 * Usage: const code = await runWithCleanup((stop) => coordinator.run(config, stop), { cleanup });
 */

import { formatErrorMessage } from "./error-format.js";
import type { JsonlLogger } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalHost {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export const DEFAULT_SIGNAL_EXIT_CODES: Readonly<Partial<Record<NodeJS.Signals, number>>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export type CleanupScopeOptions = {
  cleanup: () => Promise<void> | void;
  signals?: Readonly<Partial<Record<NodeJS.Signals, number>>>;
  host?: SignalHost;
  exit?: (code: number) => void;
  logger?: JsonlLogger;
};

// =============================================================================
// SCOPE
// =============================================================================

export async function runWithCleanup<T>(
  work: (stopSignal: AbortSignal) => Promise<T>,
  opts: CleanupScopeOptions,
): Promise<T> {
  const host = opts.host ?? process;
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  const signals = opts.signals ?? DEFAULT_SIGNAL_EXIT_CODES;
  const controller = new AbortController();

  let cleanupRun: Promise<void> | undefined;
  const runCleanupOnce = (): Promise<void> => {
    cleanupRun ??= runCleanup(opts.cleanup, opts.logger);
    return cleanupRun;
  };

  let shuttingDown = false;
  const onSignal: SignalListener = (signal) => {
    if (shuttingDown) {
      opts.logger?.debug("shutdown.signal.ignored", { signal });
      return;
    }
    shuttingDown = true;
    const code = signals[signal] ?? 1;
    opts.logger?.warn("shutdown.signal", { signal, exit_code: code });

    controller.abort(signal);
    void runCleanupOnce().then(() => {
      detach();
      exit(code);
    });
  };

  const registered = Object.keys(signals).filter(isSignalName);
  for (const signal of registered) {
    host.on(signal, onSignal);
  }
  const detach = (): void => {
    for (const signal of registered) {
      host.off(signal, onSignal);
    }
  };

  try {
    return await work(controller.signal);
  } finally {
    await runCleanupOnce();
    if (!shuttingDown) detach();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runCleanup(
  cleanup: () => Promise<void> | void,
  logger: JsonlLogger | undefined,
): Promise<void> {
  try {
    await cleanup();
  } catch (error) {
    logger?.error("cleanup.failed", { error: formatErrorMessage(error) });
  }
}

function isSignalName(value: string): value is NodeJS.Signals {
  return value.startsWith("SIG");
}
