/**
 * @file src/formatter/formatter.ts
 * @summary The reverse path: builds canonical markdown note blocks from remote note data,
 * and converts parsed markdown fields to the HTML map sent to Anki. The two directions
 * treat empty fields differently: formatting omits empty optional fields, while
 * toHtmlFields fills every field of the note type so Anki clears fields the user deleted.
 *
 * @exports
 *  - formatNote       - markdown block from a field map
 *  - formatRemoteNote - markdown block from an AnkiConnect notesInfo entry
 *  - formatDeckFile   - whole file content from a deck id and blocks
 *  - toHtmlFields     - markdown fields → HTML fields
 */

import { CODE_FENCE_RE, NOTE_SEPARATOR, deckIdComment, noteIdComment } from "../core/constants";
import { getFieldValue, type AnkiNoteInfo } from "../anki/anki-connect";
import { getNoteTypeConfig } from "../note-types/note-types";
import type { FieldConverter, NoteFields, PrefixTable } from "../types/note";

/**
 * Emit `<!-- note_id: N -->` then one `"<prefix> <markdown>"` line per field,
 * in configured order. Content that starts with a code fence is written on the
 * line after a bare prefix. A field is written when its raw value is non-empty and
 * either the converted text is non-empty or the field is mandatory.
 *
 * Throws UnknownNoteTypeError when `noteType` is not in the table.
 */
export function formatNote(
  noteId: number,
  remoteFields: Readonly<Record<string, string | undefined>>,
  converter: FieldConverter,
  noteType: string,
  table: PrefixTable,
): string {
  const cfg = getNoteTypeConfig(table, noteType);
  const lines = [noteIdComment(noteId)];

  for (const { fieldName, prefix, mandatory } of cfg.fields) {
    const raw = remoteFields[fieldName];
    if (!raw) continue;
    const md = converter.convert(raw);
    if (md || mandatory) lines.push(fieldLine(prefix, md));
  }

  return lines.join("\n");
}

/**
 * A fence only toggles at the start of a line, so content that opens with one
 * goes below a bare prefix.
 */
function fieldLine(prefix: string, md: string): string {
  return CODE_FENCE_RE.test(md.trimStart()) ? `${prefix}\n${md}` : `${prefix} ${md}`;
}

export function formatRemoteNote(note: AnkiNoteInfo, converter: FieldConverter, table: PrefixTable): string {
  const cfg = getNoteTypeConfig(table, note.modelName);
  const values: Record<string, string | undefined> = {};
  for (const f of cfg.fields) values[f.fieldName] = getFieldValue(note, f.fieldName);
  return formatNote(note.noteId, values, converter, note.modelName, table);
}

/** Inverse of splitNoteBlocks. Ends with a single newline. */
export function formatDeckFile(deckId: number | null, blocks: readonly string[]): string {
  const body = blocks.join(NOTE_SEPARATOR);
  return deckId !== null ? `${deckIdComment(deckId)}\n${body}\n` : `${body}\n`;
}

/**
 * Convert every present field to HTML. With `noteType`, every field that type
 * defines is present in the result, defaulting to `""`.
 *
 * Throws UnknownNoteTypeError when `noteType` is given but not in the table.
 */
export function toHtmlFields(
  fields: NoteFields,
  converter: FieldConverter,
  noteType: string | undefined,
  table: PrefixTable,
): Record<string, string> {
  const html: Record<string, string> = {};
  for (const [name, content] of Object.entries(fields)) html[name] = converter.convert(content);

  if (noteType) {
    for (const f of getNoteTypeConfig(table, noteType).fields) {
      html[f.fieldName] ??= "";
    }
  }
  return html;
}
