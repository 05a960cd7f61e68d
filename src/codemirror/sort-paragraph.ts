import type {
  EditorState,
  StateCommand,
  TransactionSpec,
} from "@codemirror/state";
import { markupSettings, requireMarkup, type MarkupSettings } from "../editor";
import { createComparator, normalizeElement } from "../core/collation";
import { logger } from "../core/logger";
import {
  cursorOf,
  replaceSpan,
  searchBackward,
  searchForward,
  sliceSpan,
  type Span,
} from "../core/text-span";

const PARAGRAPH_BREAK = /\n[ \t]*\n/;

function trimSpan(state: EditorState, span: Span): Span | null {
  const text = sliceSpan(state, span);
  const from = span.from + (text.length - text.trimStart().length);
  const to = span.to - (text.length - text.trimEnd().length);
  return from < to ? { from, to } : null;
}

/**
 * The text of the paragraph around `pos`, without its leading or trailing
 * whitespace. Paragraphs are separated by blank lines.
 */
export function paragraphSpanAt(state: EditorState, pos: number): Span | null {
  // A blank line belongs to no paragraph.
  if (state.doc.lineAt(pos).text.trim() === "") {
    return null;
  }

  const before = searchBackward(state, PARAGRAPH_BREAK, pos);
  const after = searchForward(state, PARAGRAPH_BREAK, pos);
  return trimSpan(state, {
    from: before ? before.span.to : 0,
    to: after ? after.span.from : state.doc.length,
  });
}

export function sortElements(
  text: string,
  separator: string,
  settings: Pick<MarkupSettings, "collationLocale" | "normalizationForm">,
): string {
  const compare = createComparator(settings.collationLocale);
  return text
    .split(separator)
    .map((element) => normalizeElement(element, settings.normalizationForm))
    .sort(compare)
    .join(separator);
}

function sortSpan(
  state: EditorState,
  span: Span,
  separator: string,
): TransactionSpec | null {
  const original = sliceSpan(state, span);
  const sorted = sortElements(original, separator, state.facet(markupSettings));
  return sorted === original ? null : replaceSpan(span, sorted);
}

/**
 * Sort the `separator`-delimited elements of the paragraph under the cursor.
 * Defaults to the related-entries separator.
 */
export function sortParagraphElements(separator?: string): StateCommand {
  return ({ state, dispatch }) => {
    const span = paragraphSpanAt(state, cursorOf(state));
    if (!span) {
      return false;
    }

    const transaction = sortSpan(
      state,
      span,
      separator ?? state.facet(markupSettings).relatedEntriesSeparator,
    );
    if (transaction) {
      logger.debug("sort paragraph", { from: span.from, to: span.to });
      dispatch(state.update(transaction));
    }
    return true;
  };
}

/**
 * Sort the paragraph that follows the related-entries heading. Does nothing
 * when the heading, or a paragraph after it, is missing.
 */
export const sortRelatedEntries: StateCommand = ({ state, dispatch }) => {
  requireMarkup(state);
  const settings = state.facet(markupSettings);

  const heading = searchForward(state, settings.relatedEntriesHeading, 0);
  if (!heading) {
    return false;
  }

  const body = searchForward(state, /\S/, heading.span.to);
  if (!body) {
    return false;
  }

  const paragraph = paragraphSpanAt(state, body.span.from);
  if (!paragraph) {
    return false;
  }

  // A paragraph that starts right under the heading would otherwise take the
  // heading line with it.
  const span = {
    from: Math.max(paragraph.from, body.span.from),
    to: paragraph.to,
  };
  const transaction = sortSpan(state, span, settings.relatedEntriesSeparator);
  if (transaction) {
    logger.debug("sort related entries", { from: span.from, to: span.to });
    dispatch(state.update(transaction));
  }
  return true;
};
