import type { EditorState } from "@codemirror/state";
import { describe, expect, it } from "vitest";
import { createState, render, runCommand } from "../test/harness";
import { MarkupCommandError } from "../core/errors";
import {
  abbreviationFor,
  buildLocatorTable,
  insertLocator,
  locatorAtCursor,
  locatorNames,
  LOCATORS,
  nameForAbbreviation,
} from "./locators";

function moveCursor(state: EditorState, pos: number): EditorState {
  return state.update({ selection: { anchor: pos } }).state;
}

describe("locator table", () => {
  it("holds singular and plural forms with unique abbreviations", () => {
    expect(LOCATORS).toHaveLength(30);
    expect(new Set(locatorNames()).size).toBe(30);
    expect(new Set(LOCATORS.map((entry) => entry.abbreviation)).size).toBe(30);
  });

  it("looks up abbreviations by full name", () => {
    expect(abbreviationFor("page")).toBe("p.");
    expect(abbreviationFor("pages")).toBe("pp.");
    expect(abbreviationFor("chapter")).toBe("chap.");
    expect(abbreviationFor("volumes")).toBe("vols.");
  });

  it("falls back to an empty abbreviation for unknown names", () => {
    expect(abbreviationFor("stanza")).toBe("");
  });

  it("looks up full names by abbreviation", () => {
    expect(nameForAbbreviation("pp.")).toBe("pages");
    expect(nameForAbbreviation("n.")).toBe("note");
    expect(nameForAbbreviation("zz.")).toBeNull();
  });

  it("is frozen", () => {
    expect(Object.isFrozen(LOCATORS)).toBe(true);
    expect(Object.isFrozen(LOCATORS[0])).toBe(true);
  });

  it("rejects tables with ambiguous abbreviations", () => {
    expect(() =>
      buildLocatorTable([
        { name: "chapter", abbreviation: "chap." },
        { name: "chapters", abbreviation: "chap." },
      ]),
    ).toThrow("Duplicate locator abbreviation: chap.");
  });
});

describe("locatorAtCursor", () => {
  it("finds the abbreviation token under the cursor", () => {
    const state = createState('<Cite bibKey={"k, p¦p. 4"} />');
    expect(locatorAtCursor(state)).toEqual({
      text: "pp.",
      span: { from: 18, to: 21 },
    });
  });

  it("does not match an abbreviation inside a longer token", () => {
    const state = createState('<Cite bibKey={"k, op¦. 4"} />');
    expect(locatorAtCursor(state)?.text).toBe("op.");
  });

  it("returns null on the locator's value", () => {
    expect(locatorAtCursor(createState('<Cite bibKey={"k, p. 4¦2"} />'))).toBeNull();
  });

  it("returns null on the key", () => {
    expect(locatorAtCursor(createState('<Cite bibKey={"k¦ey, p. 4"} />'))).toBeNull();
  });
});

describe("insertLocator", () => {
  it("appends every locator after the key and swaps it for the next one", () => {
    LOCATORS.forEach(({ name, abbreviation }, index) => {
      const inserted = runCommand(
        createState('<Cite bibKey={"key¦2020"} />'),
        insertLocator(name),
      );
      expect(render(inserted.state)).toBe(
        `<Cite bibKey={"key2020, ${abbreviation} ¦"} />`,
      );

      const next = LOCATORS[(index + 1) % LOCATORS.length];
      if (!next) {
        throw new Error("expected a locator");
      }
      const onAbbreviation = moveCursor(
        inserted.state,
        inserted.state.doc.toString().indexOf(", ") + 3,
      );
      const replaced = runCommand(onAbbreviation, insertLocator(next.name));
      expect(replaced.state.doc.toString()).toBe(
        `<Cite bibKey={"key2020, ${next.abbreviation} "} />`,
      );
    });
  });

  it("replaces an abbreviation written flush against its value", () => {
    const state = createState('<Cite bibKey={"k, p¦.12"} />');
    expect(locatorAtCursor(state)).toEqual({
      text: "p.",
      span: { from: 18, to: 20 },
    });

    const result = runCommand(state, insertLocator("pages"));
    expect(result.state.doc.toString()).toBe('<Cite bibKey={"k, pp.12"} />');
  });

  it("appends after existing locators", () => {
    const result = runCommand(
      createState('<Cite bibKey={"smith¦2020, p. 12"} />'),
      insertLocator("chapter"),
    );
    expect(render(result.state)).toBe(
      '<Cite bibKey={"smith2020, p. 12, chap. ¦"} />',
    );
  });

  it("works inside body citations", () => {
    const result = runCommand(
      createState('<Cite bibKey={"doe1999"}>Do¦e</Cite>'),
      insertLocator("page"),
    );
    expect(result.state.doc.toString()).toBe(
      '<Cite bibKey={"doe1999, p. "}>Doe</Cite>',
    );
  });

  it("refuses to run outside a citation without touching the document", () => {
    const state = createState("plain ¦text");
    let error: unknown;
    try {
      runCommand(state, insertLocator("page"));
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(MarkupCommandError);
    expect(error).toMatchObject({ code: "not-in-citation" });
    expect(state.doc.toString()).toBe("plain text");
  });
});
