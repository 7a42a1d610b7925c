/**
 * Structured command lines for the external judge, server and worker binaries.
 * Purpose: compose optional flags and user-supplied argument strings without string concatenation.
 * Usage: command("judge-tools").flag("-vv").args("server", "--store-dir", dir).rawArgs(extra).
 */

import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandLine = {
  file: string;
  args: string[];
};

// =============================================================================
// BUILDER
// =============================================================================

export class CommandBuilder {
  private readonly argv: string[] = [];

  constructor(private readonly file: string) {}

  /** Appends the flag only when it is a non-empty string. */
  flag(value: string | undefined): this {
    if (value) this.argv.push(value);
    return this;
  }

  args(...values: string[]): this {
    this.argv.push(...values);
    return this;
  }

  /** Appends arguments parsed from a user-supplied string such as `SERVER_ARGS`. */
  rawArgs(value: string): this {
    this.argv.push(...splitArgs(value));
    return this;
  }

  build(): CommandLine {
    return { file: this.file, args: [...this.argv] };
  }
}

export function command(file: string): CommandBuilder {
  return new CommandBuilder(file);
}

export function renderCommand(cmd: CommandLine): string {
  return [cmd.file, ...cmd.args].map(quoteArg).join(" ");
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Splits an argument string the way a POSIX shell would for words: whitespace separates,
 * single quotes are literal, double quotes allow `\"` and `\\`, and a backslash outside quotes
 * escapes the next character. No expansion of any kind is performed.
 */
export function splitArgs(input: string): string[] {
  const out: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i += 1) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && (input[i + 1] === '"' || input[i + 1] === "\\")) {
        current += input[i + 1];
        i += 1;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
      continue;
    }

    if (ch === "\\") {
      if (i + 1 >= input.length) {
        throw new ConfigError(`Trailing backslash in argument string: ${input}`);
      }
      current += input[i + 1];
      inWord = true;
      i += 1;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        out.push(current);
        current = "";
        inWord = false;
      }
      continue;
    }

    current += ch;
    inWord = true;
  }

  if (quote) {
    throw new ConfigError(`Unterminated ${quote} quote in argument string: ${input}`);
  }
  if (inWord) {
    out.push(current);
  }

  return out;
}

export function quoteArg(value: string): string {
  if (value === "") return "''";
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}
