import type { StateCommand } from "@codemirror/state";
import { isMarkupCommandError, type MarkupCommandError } from "../core/errors";
import { logger } from "../core/logger";

export type RunMarkupCommandOptions = {
  onUserError?: (error: MarkupCommandError) => void;
};

function reportUserError(error: MarkupCommandError): void {
  logger.warn(error.message, { code: error.code });
}

/**
 * Turn a command's user-facing failures into a report and a `false` result.
 * Anything else is a bug and keeps propagating.
 */
export function runMarkupCommand(
  command: StateCommand,
  { onUserError = reportUserError }: RunMarkupCommandOptions = {},
): StateCommand {
  return (target) => {
    try {
      return command(target);
    } catch (error) {
      if (!isMarkupCommandError(error)) {
        throw error;
      }
      onUserError(error);
      return false;
    }
  };
}
