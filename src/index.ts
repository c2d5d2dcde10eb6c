// src/index.ts
// ---------------------------------------------------------------------------
// Public entry point. Grouped by pipeline stage: configuration → splitting and
// parsing → validation → formatting → Anki interop.
// ---------------------------------------------------------------------------

export type * from "./types";

export { log, LOG_LEVELS, type LogLevel } from "./core/logger";
export {
  DuplicateFieldError,
  UnknownNoteTypeError,
  InvalidFilenameError,
  PrefixTableError,
  SettingsError,
  AnkiConnectError,
} from "./core/errors";
export { DEFAULT_SETTINGS, normaliseSettings, applySettings } from "./core/settings";
export { NOTE_SEPARATOR, deckIdComment, noteIdComment } from "./core/constants";

export {
  QA_NOTE_TYPE,
  REVERSED_NOTE_TYPE,
  CLOZE_NOTE_TYPE,
  INPUT_NOTE_TYPE,
  CHOICE_NOTE_TYPE,
  DEFAULT_NOTE_TYPES,
  DEFAULT_PREFIX_TABLE,
  buildPrefixTable,
  getNoteTypeConfig,
  noteTypeFieldNames,
} from "./note-types/note-types";

export { extractDeckId, splitNoteBlocks, extractNoteBlocks, hasUntrackedNotes } from "./parser/block-splitter";
export { parseNoteBlock } from "./parser/parser";
export {
  inferByRequiredFields,
  inferByUniqueMarker,
  DEFAULT_UNIQUE_MARKERS,
  resolveInferrer,
  inferType,
  type UniqueMarker,
} from "./parser/note-type-inference";

export { validateNote, validateFileState } from "./validation/validator";
export { checkIds, noteIdentifier } from "./validation/id-check";

export { formatNote, formatRemoteNote, formatDeckFile, toHtmlFields } from "./formatter/formatter";

export {
  readFileState,
  readFileStates,
  parseOptionsFromSettings,
  type FileInput,
  type FileStateResult,
} from "./sync/file-state";

export { sanitizeDeckFilename, deckNameFromFilename } from "./anki/deck-filename";
export {
  markdownToHtml,
  htmlToMarkdown,
  MarkdownToHtmlConverter,
  HtmlToMarkdownConverter,
  identityConverter,
} from "./anki/field-converters";
export {
  AnkiConnectClient,
  collectRemoteIds,
  getFieldValue,
  NoteInfoSchema,
  type AnkiNoteInfo,
  type RemoteIds,
} from "./anki/anki-connect";
