import {
  Transaction,
  type EditorState,
  type TransactionSpec,
} from "@codemirror/state";

export type Span = {
  from: number;
  to: number;
};

export type SpanGroup = {
  text: string;
  span: Span;
};

/**
 * A regular-expression match against a document, with explicit offsets for
 * the whole match and every capture group. `groups[0]` is the whole match and
 * `groups[n]` is capture group `n`, or null when that group did not take part.
 */
export type SpanMatch = {
  span: Span;
  text: string;
  groups: (SpanGroup | null)[];
};

export function cursorOf(state: EditorState): number {
  return state.selection.main.head;
}

export function activeSelection(state: EditorState): Span | null {
  const range = state.selection.main;
  return range.empty ? null : { from: range.from, to: range.to };
}

export function sliceSpan(state: EditorState, span: Span): string {
  return state.sliceDoc(span.from, span.to);
}

export function spanContains(span: Span, pos: number): boolean {
  return span.from <= pos && pos <= span.to;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function searchPattern(pattern: RegExp): RegExp {
  let flags = pattern.flags;
  for (const flag of ["g", "d"]) {
    if (!flags.includes(flag)) {
      flags += flag;
    }
  }
  return new RegExp(pattern.source, flags);
}

function toSpanMatch(match: RegExpExecArray): SpanMatch {
  const groups: (SpanGroup | null)[] = [];
  for (let i = 0; i < match.length; i += 1) {
    const text = match[i];
    const range = match.indices?.[i];
    groups.push(
      text === undefined || !range
        ? null
        : { text, span: { from: range[0], to: range[1] } },
    );
  }
  return {
    span: { from: match.index, to: match.index + match[0].length },
    text: match[0],
    groups,
  };
}

/** First match of `pattern` starting at or after `from`. */
export function searchForward(
  state: EditorState,
  pattern: RegExp,
  from = 0,
): SpanMatch | null {
  const regex = searchPattern(pattern);
  regex.lastIndex = Math.max(0, from);
  const match = regex.exec(state.doc.toString());
  return match ? toSpanMatch(match) : null;
}

/** Last match of `pattern` that ends at or before `to`. */
export function searchBackward(
  state: EditorState,
  pattern: RegExp,
  to: number,
): SpanMatch | null {
  const regex = searchPattern(pattern);
  const text = state.doc.toString();
  let last: RegExpExecArray | null = null;

  for (let match = regex.exec(text); match; match = regex.exec(text)) {
    if (match.index + match[0].length > to) {
      break;
    }
    last = match;
    if (match[0].length === 0) {
      regex.lastIndex += 1;
    }
  }

  return last ? toSpanMatch(last) : null;
}

/** Every non-overlapping match of `pattern`, in document order. */
export function searchAll(state: EditorState, pattern: RegExp): SpanMatch[] {
  const regex = searchPattern(pattern);
  const text = state.doc.toString();
  const matches: SpanMatch[] = [];

  for (let match = regex.exec(text); match; match = regex.exec(text)) {
    matches.push(toSpanMatch(match));
    if (match[0].length === 0) {
      regex.lastIndex += 1;
    }
  }

  return matches;
}

/**
 * Delete `span` and insert `text` at its start. Spans are only valid against
 * the state they were read from; re-query after dispatching.
 */
export function replaceSpan(span: Span, text: string): TransactionSpec {
  return {
    changes: { from: span.from, to: span.to, insert: text },
    scrollIntoView: true,
    annotations: Transaction.userEvent.of("input"),
  };
}
