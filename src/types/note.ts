/**
 * @file src/types/note.ts
 * @summary Note-level type definitions shared by the parser, inferencer, validator and
 * formatter. A note type is a named schema of prefixed fields; the prefix table bundles
 * every configured note type with the prefix lookup the parser walks.
 *
 * @exports
 *   - FieldMapping     - one field of a note type (name, markdown prefix, mandatory flag)
 *   - NoteTypeKind     - which structural validation rules apply to a note type
 *   - NoteTypeConfig   - a named note type and its ordered fields
 *   - PrefixTable      - frozen lookup of all note types and prefixes
 *   - NoteFields       - field name to content, in first-seen order
 *   - ParsedNote       - one parsed markdown block
 *   - FileState        - snapshot of one markdown file
 *   - IdKind           - "deck" or "note"
 *   - InvalidId        - an id present in markdown but missing remotely
 *   - FieldConverter   - text conversion capability (markdown <-> HTML)
 *   - NoteTypeInferrer - policy mapping populated field names to a note type
 *   - ParseOptions     - table and inference policy passed to the parser
 */

export type FieldMapping = {
  fieldName: string;
  /** Line prefix in markdown, e.g. "Q:". Content follows after a single space. */
  prefix: string;
  mandatory: boolean;
};

/** "standard" has no structural rules beyond mandatory fields. */
export type NoteTypeKind = "standard" | "cloze" | "choice";

export type NoteTypeConfig = {
  name: string;
  kind: NoteTypeKind;
  fields: readonly FieldMapping[];
};

export type PrefixTable = {
  /** Note types in declared order. */
  readonly noteTypes: ReadonlyMap<string, NoteTypeConfig>;
  /** Every prefix of every note type, first-seen order. Parser match order. */
  readonly prefixToField: ReadonlyMap<string, string>;
  /** Note type evaluated last by required-field inference. */
  readonly catchAll: string;
};

export type NoteFields = Readonly<Record<string, string>>;

export type ParsedNote = {
  readonly noteId: number | null;
  readonly noteType: string;
  readonly fields: NoteFields;
  readonly rawContent: string;
};

export type FileState = {
  readonly filePath: string;
  readonly rawContent: string;
  readonly deckId: number | null;
  readonly parsedNotes: readonly ParsedNote[];
};

export type IdKind = "deck" | "note";

export type InvalidId = {
  idValue: number;
  idKind: IdKind;
  filePath: string;
  /** Human-readable location, e.g. "note_id: 42 in deck.md". */
  context: string;
};

export type FieldConverter = {
  convert(raw: string): string;
};

/** Must be a pure function of the field-name set. Throws UnknownNoteTypeError when nothing fits. */
export type NoteTypeInferrer = (fieldNames: ReadonlySet<string>, table: PrefixTable) => string;

export type ParseOptions = {
  table: PrefixTable;
  /** Defaults to required-field inference. */
  inferType?: NoteTypeInferrer;
};
