import { formatErrorMessage } from "../core/error-format.js";
import {
  BatchStoppedError,
  ConfigError,
  NotFoundError,
  resolveUserFacingErrorCode,
  UserFacingError,
} from "../core/errors.js";

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

export type CommandErrorContext = {
  title: string;
  /** Hint for a missing session or other lookup failure. */
  notFoundHint?: string;
};

const CONFIG_HINT =
  "Check the SPAWN_SERVER, SPAWN_WORKERS, SERVER_ADDR and HARNESS_LOGLEVEL environment variables and the command options.";

export function normalizeCommandError(
  error: unknown,
  context: CommandErrorContext,
): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: resolveUserFacingErrorCode(error),
    title: context.title,
    message: formatErrorMessage(error),
    hint: resolveHint(error, context),
    cause: error,
  });
}

function resolveHint(error: unknown, context: CommandErrorContext): string | undefined {
  if (error instanceof ConfigError) return CONFIG_HINT;
  if (error instanceof NotFoundError) return context.notFoundHint;
  if (error instanceof BatchStoppedError) {
    return "Re-run with --session to continue where the batch stopped.";
  }
  return undefined;
}
