import {
  EditorSelection,
  Transaction,
  type EditorState,
  type StateCommand,
} from "@codemirror/state";
import { MarkupCommandError } from "../core/errors";
import { logger } from "../core/logger";
import {
  cursorOf,
  escapeRegExp,
  replaceSpan,
  spanContains,
  type SpanGroup,
} from "../core/text-span";
import { matchCitationAtPoint, type Citation } from "./citation";
import catalogue from "./locators.json";

export type LocatorEntry = Readonly<{
  name: string;
  abbreviation: string;
}>;

/** Freeze a locator table, rejecting duplicate names or abbreviations. */
export function buildLocatorTable(
  entries: { name: string; abbreviation: string }[],
): readonly LocatorEntry[] {
  const names = new Set<string>();
  const abbreviations = new Set<string>();
  for (const { name, abbreviation } of entries) {
    if (names.has(name)) {
      throw new Error(`Duplicate locator name: ${name}`);
    }
    if (abbreviations.has(abbreviation)) {
      throw new Error(`Duplicate locator abbreviation: ${abbreviation}`);
    }
    names.add(name);
    abbreviations.add(abbreviation);
  }
  return Object.freeze(
    entries.map((entry) =>
      Object.freeze({ name: entry.name, abbreviation: entry.abbreviation }),
    ),
  );
}

export const LOCATORS: readonly LocatorEntry[] = buildLocatorTable(catalogue);

const abbreviationsByName = new Map(
  LOCATORS.map((entry) => [entry.name, entry.abbreviation] as const),
);
const namesByAbbreviation = new Map(
  LOCATORS.map((entry) => [entry.abbreviation, entry.name] as const),
);

// "p." must not match inside "pp." or "op.", but may run into its value ("p.12").
const abbreviationPatterns = LOCATORS.map(
  (entry) =>
    [
      entry.abbreviation,
      new RegExp(`(?<![^\\s,])${escapeRegExp(entry.abbreviation)}(?![A-Za-z])`, "g"),
    ] as const,
);

export function locatorNames(): string[] {
  return LOCATORS.map((entry) => entry.name);
}

/** Abbreviation for a full locator name, or "" when the name is unknown. */
export function abbreviationFor(name: string): string {
  return abbreviationsByName.get(name) ?? "";
}

export function nameForAbbreviation(abbreviation: string): string | null {
  return namesByAbbreviation.get(abbreviation) ?? null;
}

/** The locator abbreviation token under `pos` inside the citation's locators. */
export function locatorAtPoint(
  citation: Citation,
  pos: number,
): SpanGroup | null {
  const locators = citation.locators;
  if (!locators || !spanContains(locators.span, pos)) {
    return null;
  }

  for (const [abbreviation, pattern] of abbreviationPatterns) {
    for (const match of locators.text.matchAll(pattern)) {
      const from = locators.span.from + (match.index ?? 0);
      const span = { from, to: from + abbreviation.length };
      if (spanContains(span, pos)) {
        return { text: abbreviation, span };
      }
    }
  }

  return null;
}

export function locatorAtCursor(state: EditorState): SpanGroup | null {
  const citation = matchCitationAtPoint(state);
  return citation ? locatorAtPoint(citation, cursorOf(state)) : null;
}

/**
 * Replace the locator under the cursor with the one named `name`, or append
 * `, <abbreviation> ` after the last locator (or the key) and leave the
 * cursor there for the locator's value.
 */
export function insertLocator(name: string): StateCommand {
  return ({ state, dispatch }) => {
    const pos = cursorOf(state);
    const citation = matchCitationAtPoint(state, pos);
    if (!citation) {
      throw new MarkupCommandError("not-in-citation");
    }

    const abbreviation = abbreviationFor(name);
    const existing = locatorAtPoint(citation, pos);
    if (existing) {
      logger.debug("replace locator", { from: existing.text, to: abbreviation });
      dispatch(state.update(replaceSpan(existing.span, abbreviation)));
      return true;
    }

    const at = (citation.locators ?? citation.key).span.to;
    const insert = `, ${abbreviation} `;
    logger.debug("insert locator", { at, abbreviation });
    dispatch(
      state.update({
        changes: { from: at, insert },
        selection: EditorSelection.cursor(at + insert.length),
        scrollIntoView: true,
        annotations: Transaction.userEvent.of("input"),
      }),
    );
    return true;
  };
}
