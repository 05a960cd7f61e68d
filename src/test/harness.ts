import {
  EditorState,
  type Extension,
  type StateCommand,
  type Transaction,
} from "@codemirror/state";
import { documentKind } from "../editor";

/** Cursor marker; two of them mark a selection from the first to the second. */
export const CURSOR = "¦";

export function createState(
  source: string,
  extensions: Extension[] = [documentKind.of("mdx")],
): EditorState {
  const first = source.indexOf(CURSOR);
  if (first === -1) {
    return EditorState.create({ doc: source, extensions });
  }

  const second = source.indexOf(CURSOR, first + 1);
  if (second === -1) {
    return EditorState.create({
      doc: source.slice(0, first) + source.slice(first + 1),
      selection: { anchor: first },
      extensions,
    });
  }

  return EditorState.create({
    doc:
      source.slice(0, first) +
      source.slice(first + 1, second) +
      source.slice(second + 1),
    selection: { anchor: first, head: second - 1 },
    extensions,
  });
}

/** The document with the main selection drawn back in as markers. */
export function render(state: EditorState): string {
  const { from, to, empty } = state.selection.main;
  const doc = state.doc.toString();
  if (empty) {
    return `${doc.slice(0, from)}${CURSOR}${doc.slice(from)}`;
  }
  return `${doc.slice(0, from)}${CURSOR}${doc.slice(from, to)}${CURSOR}${doc.slice(to)}`;
}

export type CommandResult = {
  handled: boolean;
  state: EditorState;
  transactions: Transaction[];
};

export function runCommand(
  state: EditorState,
  command: StateCommand,
): CommandResult {
  const transactions: Transaction[] = [];
  let current = state;
  const handled = command({
    state,
    dispatch: (transaction) => {
      transactions.push(transaction);
      current = transaction.state;
    },
  });
  return { handled, state: current, transactions };
}
