#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// Commander already printed these; they are not failures to render.
const QUIET_EXITS = new Set(["commander.help", "commander.helpDisplayed", "commander.version"]);

// Errors surface from parseAsync and are rendered once by main. Subcommands are registered
// before this runs, so each one is configured explicitly.
function routeErrorsToMain(program: Command): void {
  program.configureOutput({ outputError: () => undefined });
  program.exitOverride();
  for (const sub of program.commands) routeErrorsToMain(sub);
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  routeErrorsToMain(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && QUIET_EXITS.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: argv.includes("--debug") }));
    const code = error instanceof CommanderError ? error.exitCode : 1;
    process.exitCode = code === 0 ? 1 : code;
  }
}

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // npm installs the bin as a symlink; compare the resolved file.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
