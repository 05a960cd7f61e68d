export type MarkupErrorCode =
  | "not-markup-document"
  | "not-in-citation"
  | "invalid-citation-key";

const DEFAULT_MESSAGES: Record<MarkupErrorCode, string> = {
  "not-markup-document": "This command only works in Markdown or MDX documents",
  "not-in-citation": "Point is not on a citation",
  "invalid-citation-key": "Citation keys cannot contain commas or double quotes",
};

/**
 * A command was invoked somewhere it cannot apply. Thrown before any change
 * is dispatched, so the document is left untouched.
 */
export class MarkupCommandError extends Error {
  readonly code: MarkupErrorCode;

  constructor(code: MarkupErrorCode, message: string = DEFAULT_MESSAGES[code]) {
    super(message);
    this.name = "MarkupCommandError";
    this.code = code;
  }
}

export function isMarkupCommandError(
  error: unknown,
): error is MarkupCommandError {
  return error instanceof MarkupCommandError;
}
