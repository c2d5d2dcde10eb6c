/**
 * @file src/validation/validator.ts
 * @summary Validates parsed notes against their note type: mandatory fields, cloze
 * syntax for cloze notes, and answer format/range for choice notes. Rule violations are
 * collected, never thrown, so a user sees every problem of a note in one pass.
 *
 * @exports
 *  - validateNote      - error messages for one note (empty = valid)
 *  - validateFileState - error messages for every note of a file, with location prefix
 */

import { CLOZE_RE } from "../core/constants";
import {
  ANSWER_FIELD,
  MAX_CHOICES,
  choiceFieldName,
} from "../note-types/note-types";
import { noteIdentifier, fileBaseName } from "./id-check";
import type { FileState, NoteTypeConfig, ParsedNote, PrefixTable } from "../types/note";

const INTEGER_RE = /^[+-]?\d+$/;

function isBlank(s: string | undefined): boolean {
  return !s || s.trim().length === 0;
}

function validateCloze(note: ParsedNote, cfg: NoteTypeConfig): string[] {
  const primary = cfg.fields[0];
  if (!primary) return [];
  const text = note.fields[primary.fieldName];
  if (isBlank(text) || CLOZE_RE.test(text ?? "")) return [];
  return [
    `${cfg.name} note must contain cloze syntax (e.g. {{c1::answer}}) in the ${primary.prefix} field`,
  ];
}

/** Only the first out-of-range answer is reported. */
function validateChoice(note: ParsedNote, cfg: NoteTypeConfig): string[] {
  const answer = note.fields[ANSWER_FIELD];
  if (isBlank(answer)) return [];

  const answerPrefix = cfg.fields.find((f) => f.fieldName === ANSWER_FIELD)?.prefix ?? "A:";
  const parts = (answer ?? "").split(",").map((p) => p.trim());
  if (!parts.every((p) => INTEGER_RE.test(p))) {
    return [
      `${cfg.name} answer (${answerPrefix}) must contain integers ` +
        `(e.g. '1' for single choice or '1, 2, 3' for multiple choice)`,
    ];
  }

  let maxChoice = 0;
  for (let i = 1; i <= MAX_CHOICES; i++) {
    if (!isBlank(note.fields[choiceFieldName(i)])) maxChoice = i;
  }

  for (const n of parts.map((p) => Number.parseInt(p, 10))) {
    if (n < 1 || n > maxChoice) {
      return [
        `${cfg.name} answer contains '${n}' but only ${maxChoice} choice(s) are provided ` +
          `(C1: through C${maxChoice}:)`,
      ];
    }
  }
  return [];
}

/**
 * Validate one note. An unknown note type yields a single error and stops;
 * every other rule adds to the list.
 */
export function validateNote(note: ParsedNote, table: PrefixTable): string[] {
  const cfg = table.noteTypes.get(note.noteType);
  if (!cfg) return [`Unknown note type '${note.noteType}'`];

  const errors: string[] = [];
  for (const f of cfg.fields) {
    if (f.mandatory && isBlank(note.fields[f.fieldName])) {
      errors.push(`Missing mandatory field '${f.fieldName}' (${f.prefix})`);
    }
  }

  if (cfg.kind === "cloze") errors.push(...validateCloze(note, cfg));
  if (cfg.kind === "choice") errors.push(...validateChoice(note, cfg));

  return errors;
}

/**
 * Validate every note of a file. Each message is prefixed with the note's
 * identifier and the file name, e.g. `note_id: 42 in deck.md: Missing ...`.
 */
export function validateFileState(state: FileState, table: PrefixTable): string[] {
  const name = fileBaseName(state.filePath);
  const out: string[] = [];
  for (const note of state.parsedNotes) {
    for (const err of validateNote(note, table)) {
      out.push(`${noteIdentifier(note)} in ${name}: ${err}`);
    }
  }
  return out;
}
