/**
 * @file src/parser/note-type-inference.ts
 * @summary Note-type inference policies. Both map the set of populated field names to a
 * note type name and throw UnknownNoteTypeError when nothing fits; neither depends on the
 * order in which fields were inserted.
 *
 * @exports
 *  - inferByRequiredFields  - declared order, catch-all last, mandatory-subset match (default)
 *  - UniqueMarker           - one entry of the unique-marker policy
 *  - DEFAULT_UNIQUE_MARKERS - markers for the built-in note types, most specific first
 *  - inferByUniqueMarker    - build a policy from ordered markers
 *  - resolveInferrer        - policy for a settings strategy name
 *  - inferType              - run a policy over a fields record
 */

import { UnknownNoteTypeError } from "../core/errors";
import {
  CHOICE_NOTE_TYPE,
  CLOZE_NOTE_TYPE,
  INPUT_NOTE_TYPE,
  QA_NOTE_TYPE,
  REVERSED_NOTE_TYPE,
  choiceFieldName,
} from "../note-types/note-types";
import type { NoteFields, NoteTypeConfig, NoteTypeInferrer, PrefixTable } from "../types/note";
import type { InferenceStrategy } from "../types/settings";

function mandatoryFieldNames(cfg: NoteTypeConfig): string[] {
  return cfg.fields.filter((f) => f.mandatory).map((f) => f.fieldName);
}

function unknown(fieldNames: ReadonlySet<string>): UnknownNoteTypeError {
  return new UnknownNoteTypeError(Array.from(fieldNames));
}

/**
 * First note type, in declared order with the catch-all moved last, whose
 * mandatory field names are all present.
 */
export const inferByRequiredFields: NoteTypeInferrer = (fieldNames, table) => {
  const ordered: NoteTypeConfig[] = [];
  let catchAll: NoteTypeConfig | null = null;
  for (const cfg of table.noteTypes.values()) {
    if (cfg.name === table.catchAll) catchAll = cfg;
    else ordered.push(cfg);
  }
  if (catchAll) ordered.push(catchAll);

  for (const cfg of ordered) {
    if (mandatoryFieldNames(cfg).every((name) => fieldNames.has(name))) return cfg.name;
  }
  throw unknown(fieldNames);
};

export type UniqueMarker = {
  /** Any one of these present selects `noteType`. */
  fieldNames: readonly string[];
  noteType: string;
};

export const DEFAULT_UNIQUE_MARKERS: readonly UniqueMarker[] = [
  { fieldNames: [choiceFieldName(1)], noteType: CHOICE_NOTE_TYPE },
  { fieldNames: ["Text"], noteType: CLOZE_NOTE_TYPE },
  { fieldNames: ["Front", "Back"], noteType: REVERSED_NOTE_TYPE },
  { fieldNames: ["Input"], noteType: INPUT_NOTE_TYPE },
  { fieldNames: ["Question", "Answer"], noteType: QA_NOTE_TYPE },
];

/**
 * Policy that checks distinguishing fields from most to least specific.
 * Markers naming a type the table does not define are skipped.
 */
export function inferByUniqueMarker(markers: readonly UniqueMarker[] = DEFAULT_UNIQUE_MARKERS): NoteTypeInferrer {
  return (fieldNames: ReadonlySet<string>, table: PrefixTable) => {
    for (const m of markers) {
      if (!table.noteTypes.has(m.noteType)) continue;
      if (m.fieldNames.some((name) => fieldNames.has(name))) return m.noteType;
    }
    throw unknown(fieldNames);
  };
}

export function resolveInferrer(strategy: InferenceStrategy): NoteTypeInferrer {
  switch (strategy) {
    case "unique-marker":
      return inferByUniqueMarker();
    case "required-subset":
      return inferByRequiredFields;
  }
}

export function inferType(
  fields: NoteFields,
  table: PrefixTable,
  inferrer: NoteTypeInferrer = inferByRequiredFields,
): string {
  return inferrer(new Set(Object.keys(fields)), table);
}
