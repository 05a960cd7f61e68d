export {
  defaultMarkupSettings,
  documentKind,
  markupSettings,
  requireMarkup,
  supportsMarkup,
} from "./editor";
export type { DocumentKind, MarkupSettings, NormalizationForm } from "./editor";
export {
  activeSelection,
  cursorOf,
  replaceSpan,
  searchAll,
  searchBackward,
  searchForward,
  sliceSpan,
  spanContains,
} from "./core/text-span";
export type { Span, SpanGroup, SpanMatch } from "./core/text-span";
export {
  findRegion,
  getLocalVariablesBlock,
  getMetadataBlock,
  LOCAL_VARIABLES_END,
  LOCAL_VARIABLES_START,
  METADATA_DELIMITER,
  readLocalVariable,
  readMetadataField,
} from "./core/delimited-region";
export { createComparator, normalizeElement } from "./core/collation";
export type { Comparator } from "./core/collation";
export { isMarkupCommandError, MarkupCommandError } from "./core/errors";
export type { MarkupErrorCode } from "./core/errors";
export { createLogger, logger } from "./core/logger";
export type { Logger, LogLevel } from "./core/logger";
export {
  insertPair,
  selfClosingForm,
  SELF_CLOSING_TERMINATOR,
} from "./codemirror/insert-pair";
export {
  captureGroupFor,
  CITATION_CLOSE,
  CITATION_PATTERN,
  getElement,
  insertCitation,
  listCitations,
  matchCitationAtPoint,
  replaceElement,
} from "./codemirror/citation";
export type {
  Citation,
  CitationField,
  ClosingForm,
  InsertCitationOptions,
} from "./codemirror/citation";
export {
  abbreviationFor,
  buildLocatorTable,
  insertLocator,
  locatorAtCursor,
  locatorAtPoint,
  locatorNames,
  LOCATORS,
  nameForAbbreviation,
} from "./codemirror/locators";
export type { LocatorEntry } from "./codemirror/locators";
export {
  paragraphSpanAt,
  sortElements,
  sortParagraphElements,
  sortRelatedEntries,
} from "./codemirror/sort-paragraph";
export { runMarkupCommand } from "./codemirror/run-command";
export type { RunMarkupCommandOptions } from "./codemirror/run-command";
