import { Command } from "commander";

import { registerBatchCommand } from "./batch.js";
import { registerSessionsCommand } from "./sessions.js";
import { registerSuperviseCommand } from "./supervise.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("judge-harness")
    .description("Compute server/worker supervisor and resumable judge batch driver")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerSuperviseCommand(program);
  registerBatchCommand(program);
  registerSessionsCommand(program);

  return program;
}
