import crypto from "node:crypto";
import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, content, "utf8");
}

const RANDOM_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

// Same shape as the suffix mktemp(1) produces.
export function randomSuffix(length = 7): string {
  const bytes = crypto.randomBytes(length);
  let out = "";
  for (const byte of bytes) {
    out += RANDOM_ALPHABET[byte % RANDOM_ALPHABET.length];
  }
  return out;
}

export function padIndex(index: number, width = 2): string {
  return String(index).padStart(width, "0");
}

export function secondsBetween(startMs: number, endMs: number): number {
  return (endMs - startMs) / 1000;
}
