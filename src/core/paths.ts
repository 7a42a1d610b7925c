import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// STORE NAMESPACE
// =============================================================================

export const SERVER_STORE_PREFIX = "harness-server.";
export const WORKER_STORE_PREFIX = "harness-worker.";

/** Glob patterns (relative to the store root) that match every server and worker store. */
export const STORE_GLOB_PATTERNS = [`${SERVER_STORE_PREFIX}*`, `${WORKER_STORE_PREFIX}*`];

export function serverStorePrefix(storeRoot: string): string {
  return path.join(storeRoot, SERVER_STORE_PREFIX);
}

export function workerStorePath(storeRoot: string, base: string, index: string): string {
  return path.join(storeRoot, `${WORKER_STORE_PREFIX}${base}-${index}`);
}

// =============================================================================
// PACKAGE ROOT
// =============================================================================

export const DEFAULT_DB_PATH = "db.sqlite3";

/**
 * Directory the judge runs in, so that relative paths inside task directories resolve the
 * same way no matter where the driver is launched from.
 */
export function packageRoot(): string {
  return findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
}

// Walk upward until we find the package root so compiled builds resolve the same directory.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error("package.json not found while resolving the package root");
}
