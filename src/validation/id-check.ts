/**
 * @file src/validation/id-check.ts
 * @summary Cross-checks deck and note ids found in markdown against the ids that exist
 * in Anki. Mismatches are returned as data and the caller decides what to do with them.
 *
 * @exports
 *  - fileBaseName   - last path segment of a file path
 *  - noteIdentifier - stable label for a note in messages
 *  - checkIds       - ids present in markdown but unknown remotely
 */

import type { FileState, InvalidId, ParsedNote } from "../types/note";

const CONTEXT_LINE_MAX = 60;

export function fileBaseName(filePath: string): string {
  return filePath.split(/[\\/]/).pop() || filePath;
}

/**
 * `note_id: N` when the note has an id, else the first content line (at most
 * 60 characters) quoted and followed by an ellipsis.
 */
export function noteIdentifier(note: ParsedNote): string {
  if (note.noteId !== null) return `note_id: ${note.noteId}`;
  const firstLine = note.rawContent.trim().split(/\r?\n/)[0] ?? "";
  // Code points, so astral characters are never split.
  return `'${Array.from(firstLine).slice(0, CONTEXT_LINE_MAX).join("")}...'`;
}

/**
 * Ids present in markdown but absent from the valid sets. Output order is
 * file order, then note order within the file; nothing is deduplicated.
 */
export function checkIds(
  files: readonly FileState[],
  validDeckIds: ReadonlySet<number>,
  validNoteIds: ReadonlySet<number>,
): InvalidId[] {
  const invalid: InvalidId[] = [];

  for (const fs of files) {
    const name = fileBaseName(fs.filePath);

    if (fs.deckId !== null && !validDeckIds.has(fs.deckId)) {
      invalid.push({
        idValue: fs.deckId,
        idKind: "deck",
        filePath: fs.filePath,
        context: `deck_id in ${name}`,
      });
    }

    for (const note of fs.parsedNotes) {
      if (note.noteId !== null && !validNoteIds.has(note.noteId)) {
        invalid.push({
          idValue: note.noteId,
          idKind: "note",
          filePath: fs.filePath,
          context: `${noteIdentifier(note)} in ${name}`,
        });
      }
    }
  }

  return invalid;
}
