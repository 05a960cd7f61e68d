import type { EditorState } from "@codemirror/state";
import {
  escapeRegExp,
  searchForward,
  sliceSpan,
  type Span,
  type SpanGroup,
} from "./text-span";

export const METADATA_DELIMITER = /^---[ \t]*$/m;
export const LOCAL_VARIABLES_START = /^<!-- Local Variables: -->[ \t]*$/m;
export const LOCAL_VARIABLES_END = /^<!-- End: -->[ \t]*$/m;

/**
 * Span from the first match of `startPattern` to the end of the nearest
 * following match of `endPattern` (or of `startPattern` again). The scan
 * always starts at the top of the document, whatever the cursor.
 */
export function findRegion(
  state: EditorState,
  startPattern: RegExp,
  endPattern: RegExp = startPattern,
): Span | null {
  const start = searchForward(state, startPattern, 0);
  if (!start) {
    return null;
  }

  const end = searchForward(state, endPattern, start.span.to);
  if (!end) {
    return null;
  }

  return { from: start.span.from, to: end.span.to };
}

function regionText(state: EditorState, span: Span | null): SpanGroup | null {
  return span ? { text: sliceSpan(state, span), span } : null;
}

export function getMetadataBlock(state: EditorState): SpanGroup | null {
  return regionText(state, findRegion(state, METADATA_DELIMITER));
}

export function getLocalVariablesBlock(state: EditorState): SpanGroup | null {
  return regionText(
    state,
    findRegion(state, LOCAL_VARIABLES_START, LOCAL_VARIABLES_END),
  );
}

function unquote(value: string): string {
  const quoted = value.match(/^(["'])(.*)\1$/);
  return quoted?.[2] ?? value;
}

/** Value of a `name: value` line inside the metadata block. */
export function readMetadataField(
  state: EditorState,
  name: string,
): string | null {
  const block = getMetadataBlock(state);
  if (!block) {
    return null;
  }

  const line = new RegExp(`^${escapeRegExp(name)}:[ \\t]*(.*?)[ \\t]*$`, "m");
  const value = block.text.match(line)?.[1];
  return value === undefined ? null : unquote(value);
}

/** Value of a `<!-- name: value -->` line inside the local-variables block. */
export function readLocalVariable(
  state: EditorState,
  name: string,
): string | null {
  const block = getLocalVariablesBlock(state);
  if (!block) {
    return null;
  }

  const line = new RegExp(
    `^<!-- ${escapeRegExp(name)}:[ \\t]*(.*?)[ \\t]*-->[ \\t]*$`,
    "m",
  );
  const value = block.text.match(line)?.[1];
  return value === undefined ? null : unquote(value);
}
