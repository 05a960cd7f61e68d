import {
  EditorSelection,
  Transaction,
  type StateCommand,
} from "@codemirror/state";
import { logger } from "../core/logger";

export const SELF_CLOSING_TERMINATOR = " />";

/** `<Foo bar>` becomes `<Foo bar />`. */
export function selfClosingForm(open: string): string {
  return `${open.slice(0, -1)}${SELF_CLOSING_TERMINATOR}`;
}

/**
 * Wrap each selection in `open`/`close`. Empty selections get either the
 * self-closing form of `open`, or the full pair with the cursor between them.
 *
 * Callers check that the document supports markup first.
 */
export function insertPair(
  open: string,
  close: string,
  selfClosing = false,
): StateCommand {
  return ({ state, dispatch }) => {
    const changes = state.changeByRange((range) => {
      if (!range.empty) {
        // Both changes use pre-edit offsets; `close` goes in after the
        // selection so `range.from` still points at the selection start.
        return {
          changes: [
            { from: range.to, insert: close },
            { from: range.from, insert: open },
          ],
          range: EditorSelection.range(
            range.anchor + open.length,
            range.head + open.length,
          ),
        };
      }

      if (selfClosing) {
        const element = selfClosingForm(open);
        return {
          changes: { from: range.from, insert: element },
          range: EditorSelection.cursor(range.from + element.length),
        };
      }

      return {
        changes: { from: range.from, insert: open + close },
        range: EditorSelection.cursor(range.from + open.length),
      };
    });

    logger.debug("insert-pair", { open, close, selfClosing });
    dispatch(
      state.update(changes, {
        scrollIntoView: true,
        annotations: Transaction.userEvent.of("input"),
      }),
    );

    return true;
  };
}
