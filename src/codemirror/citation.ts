import type { EditorState, StateCommand } from "@codemirror/state";
import { requireMarkup } from "../editor";
import { MarkupCommandError } from "../core/errors";
import { logger } from "../core/logger";
import {
  activeSelection,
  cursorOf,
  replaceSpan,
  searchAll,
  spanContains,
  type Span,
  type SpanGroup,
  type SpanMatch,
} from "../core/text-span";
import { insertPair } from "./insert-pair";

/**
 * `<Cite bibKey={"KEY[, LOCATORS]"} [short] />` or
 * `<Cite bibKey={"KEY[, LOCATORS]"}>body</Cite>`.
 */
export const CITATION_PATTERN =
  /<Cite bibKey=\{"([^",]+)(?:, ([^"]*))?"\}(?:( short)? \/>|>[\s\S]*?<\/Cite>)/;

export const CITATION_CLOSE = "</Cite>";

export type CitationField = "key" | "locators";

export type ClosingForm = "self-closing" | "body";

export type Citation = {
  span: Span;
  key: SpanGroup;
  locators: SpanGroup | null;
  short: boolean;
  closingForm: ClosingForm;
};

export function captureGroupFor(field: CitationField): number {
  switch (field) {
    case "key":
      return 1;
    case "locators":
      return 2;
    default: {
      const unknown: never = field;
      throw new Error(`Unknown citation field: ${String(unknown)}`);
    }
  }
}

function toCitation(match: SpanMatch): Citation | null {
  const key = match.groups[captureGroupFor("key")];
  if (!key) {
    return null;
  }
  return {
    span: match.span,
    key,
    locators: match.groups[captureGroupFor("locators")] ?? null,
    short: Boolean(match.groups[3]),
    closingForm: match.text.endsWith(CITATION_CLOSE) ? "body" : "self-closing",
  };
}

function citationMatchAt(state: EditorState, pos: number): SpanMatch | null {
  return (
    searchAll(state, CITATION_PATTERN).find((match) =>
      spanContains(match.span, pos),
    ) ?? null
  );
}

export function listCitations(state: EditorState): Citation[] {
  const citations: Citation[] = [];
  for (const match of searchAll(state, CITATION_PATTERN)) {
    const citation = toCitation(match);
    if (citation) {
      citations.push(citation);
    }
  }
  return citations;
}

export function matchCitationAtPoint(
  state: EditorState,
  pos: number = cursorOf(state),
): Citation | null {
  const match = citationMatchAt(state, pos);
  return match ? toCitation(match) : null;
}

/**
 * Text and span of one field of the citation under the cursor, or null when
 * the cursor is not on a citation or the field is missing.
 */
export function getElement(
  state: EditorState,
  field: CitationField,
  pos: number = cursorOf(state),
): SpanGroup | null {
  const match = citationMatchAt(state, pos);
  return match?.groups[captureGroupFor(field)] ?? null;
}

/**
 * Replace `span` with `text`. The span is not re-validated, so it must come
 * from a match against the state this command runs on.
 */
export function replaceElement(text: string, span: Span): StateCommand {
  return ({ state, dispatch }) => {
    dispatch(state.update(replaceSpan(span, text)));
    return true;
  };
}

export type InsertCitationOptions = {
  short?: boolean;
};

function assertValidKey(key: string): void {
  if (key === "" || /[",]/.test(key)) {
    throw new MarkupCommandError("invalid-citation-key");
  }
}

/**
 * On an existing citation key, swap in `key` and keep everything else.
 * Anywhere else, insert a new citation: self-closing at the cursor, or
 * wrapping the selection as its body.
 */
export function insertCitation(
  key: string,
  { short = false }: InsertCitationOptions = {},
): StateCommand {
  return (target) => {
    const { state, dispatch } = target;
    requireMarkup(state);
    assertValidKey(key);

    const current = getElement(state, "key");
    if (current && spanContains(current.span, cursorOf(state))) {
      logger.debug("replace citation key", { from: current.text, to: key });
      dispatch(state.update(replaceSpan(current.span, key)));
      return true;
    }

    const attributes = `bibKey={"${key}"}`;
    const open =
      short && !activeSelection(state)
        ? `<Cite ${attributes} short>`
        : `<Cite ${attributes}>`;
    return insertPair(open, CITATION_CLOSE, true)(target);
  };
}
