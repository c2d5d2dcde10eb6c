/**
 * @file src/core/errors.ts
 * @summary Error types thrown by the parser, the note-type table, the filename sanitizer,
 * the settings loader and the AnkiConnect client. Validation problems are not errors:
 * they are returned as message lists by the validator.
 *
 * @exports
 *  - NOTE_SEPARATOR_HINT   - escaped separator shown in remediation hints
 *  - DuplicateFieldError   - a field prefix recurs inside one note block
 *  - UnknownNoteTypeError  - no note type fits the populated fields, or a type name is not configured
 *  - InvalidFilenameError  - a deck name cannot become a file name
 *  - PrefixTableError      - the note-type configuration is inconsistent
 *  - SettingsError         - settings failed schema checks
 *  - AnkiConnectError      - an AnkiConnect action failed
 */

/** The note separator as the user types it, with newlines written out. */
export const NOTE_SEPARATOR_HINT = "\\n\\n---\\n\\n";

export class DuplicateFieldError extends Error {
  constructor(
    public readonly prefix: string,
    public readonly fieldName: string,
    public readonly noteId: number | null,
  ) {
    const ctx = noteId !== null ? `in note_id: ${noteId}` : "in this note";
    super(
      `Duplicate field '${prefix}' ${ctx}. ` +
        `Did you forget to end the previous note with '${NOTE_SEPARATOR_HINT}' ` +
        `or is there an accidental duplicate prefix?`,
    );
    this.name = "DuplicateFieldError";
  }
}

/**
 * Raised in two situations: inference found no matching note type for a set
 * of field names (`noteType` is null), or a caller named a note type the
 * prefix table does not define (`fieldNames` is empty).
 */
export class UnknownNoteTypeError extends Error {
  constructor(
    public readonly fieldNames: readonly string[],
    public readonly noteType: string | null = null,
  ) {
    super(
      noteType !== null
        ? `Unknown note type '${noteType}'`
        : `Cannot determine note type from fields: ${fieldNames.length ? fieldNames.join(", ") : "(none)"}`,
    );
    this.name = "UnknownNoteTypeError";
  }
}

export class InvalidFilenameError extends Error {
  constructor(
    public readonly deckName: string,
    public readonly invalidChars: readonly string[],
    public readonly reservedName: string | null,
    message: string,
  ) {
    super(message);
    this.name = "InvalidFilenameError";
  }
}

export class PrefixTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PrefixTableError";
  }
}

export class SettingsError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid settings: ${issues.join("; ")}`);
    this.name = "SettingsError";
  }
}

export class AnkiConnectError extends Error {
  constructor(
    public readonly action: string,
    message: string,
    cause?: unknown,
  ) {
    super(`AnkiConnect action '${action}' failed: ${message}`);
    this.name = "AnkiConnectError";
    if (cause !== undefined) this.cause = cause;
  }
}
