import { combineConfig, Facet, type EditorState } from "@codemirror/state";
import { MarkupCommandError } from "./core/errors";

export type DocumentKind = "markdown" | "mdx" | "plain";

export type NormalizationForm = "NFC" | "NFD" | "NFKC" | "NFKD";

export type MarkupSettings = {
  /** Locale used to collate sorted entries; fixed, never detected. */
  collationLocale: string;
  normalizationForm: NormalizationForm;
  relatedEntriesSeparator: string;
  relatedEntriesHeading: RegExp;
};

export const defaultMarkupSettings: MarkupSettings = {
  collationLocale: "es",
  normalizationForm: "NFD",
  relatedEntriesSeparator: " • ",
  relatedEntriesHeading: /^#{1,6} Related entries[ \t]*$/im,
};

/**
 * The kind of document the state holds. Markup commands refuse to run on
 * anything but Markdown and MDX.
 */
export const documentKind = Facet.define<DocumentKind, DocumentKind>({
  combine: (values) => values[0] ?? "plain",
});

export const markupSettings = Facet.define<
  Partial<MarkupSettings>,
  MarkupSettings
>({
  combine: (configs) => combineConfig(configs, defaultMarkupSettings),
});

export function supportsMarkup(state: EditorState): boolean {
  return state.facet(documentKind) !== "plain";
}

export function requireMarkup(state: EditorState): void {
  if (!supportsMarkup(state)) {
    throw new MarkupCommandError("not-markup-document");
  }
}
