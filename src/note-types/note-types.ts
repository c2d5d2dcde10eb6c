/**
 * @file src/note-types/note-types.ts
 * @summary Note-type blueprints and the prefix table built from them. The table is
 * constructed once, frozen, and passed explicitly into every parse, validate and format
 * call so tests can substitute their own configuration.
 *
 * @exports
 *  - QA_NOTE_TYPE ... CHOICE_NOTE_TYPE - names of the built-in note types
 *  - ANSWER_FIELD, MAX_CHOICES, choiceFieldName - choice-note field conventions
 *  - DEFAULT_NOTE_TYPES    - built-in note types in declared order
 *  - buildPrefixTable      - validate configs and build a frozen PrefixTable
 *  - DEFAULT_PREFIX_TABLE  - table built from DEFAULT_NOTE_TYPES
 *  - getNoteTypeConfig     - look up a note type, throwing when unknown
 *  - noteTypeFieldNames    - field names of a note type in configured order
 */

import { PrefixTableError, UnknownNoteTypeError } from "../core/errors";
import type { FieldMapping, NoteTypeConfig, PrefixTable } from "../types/note";

// ── Note type names ────────────────────────────────────────────────────────────

export const QA_NOTE_TYPE = "AnkiMdQA";
export const REVERSED_NOTE_TYPE = "AnkiMdReversed";
export const CLOZE_NOTE_TYPE = "AnkiMdCloze";
export const INPUT_NOTE_TYPE = "AnkiMdInput";
export const CHOICE_NOTE_TYPE = "AnkiMdChoice";

// ── Choice conventions ─────────────────────────────────────────────────────────

export const ANSWER_FIELD = "Answer";
export const MAX_CHOICES = 7;

/** `choiceFieldName(3)` → `"Choice 3"`. */
export function choiceFieldName(n: number): string {
  return `Choice ${n}`;
}

// ── Blueprints ─────────────────────────────────────────────────────────────────

function field(fieldName: string, prefix: string, mandatory: boolean): FieldMapping {
  return { fieldName, prefix, mandatory };
}

const EXTRA_FIELDS: readonly FieldMapping[] = [field("Extra", "E:", false), field("More", "M:", false)];

function choiceFields(): FieldMapping[] {
  const out: FieldMapping[] = [];
  for (let i = 1; i <= MAX_CHOICES; i++) out.push(field(choiceFieldName(i), `C${i}:`, i === 1));
  return out;
}

/**
 * Built-in note types. Declared order drives required-field inference, with
 * the QA type (the catch-all) always evaluated last.
 */
export const DEFAULT_NOTE_TYPES: readonly NoteTypeConfig[] = [
  {
    name: QA_NOTE_TYPE,
    kind: "standard",
    fields: [field("Question", "Q:", true), field(ANSWER_FIELD, "A:", true), ...EXTRA_FIELDS],
  },
  {
    name: REVERSED_NOTE_TYPE,
    kind: "standard",
    fields: [field("Front", "F:", true), field("Back", "B:", true), ...EXTRA_FIELDS],
  },
  {
    name: CLOZE_NOTE_TYPE,
    kind: "cloze",
    fields: [field("Text", "T:", true), ...EXTRA_FIELDS],
  },
  {
    name: INPUT_NOTE_TYPE,
    kind: "standard",
    fields: [field("Question", "Q:", true), field("Input", "I:", true), ...EXTRA_FIELDS],
  },
  {
    name: CHOICE_NOTE_TYPE,
    kind: "choice",
    fields: [field("Question", "Q:", true), ...choiceFields(), field(ANSWER_FIELD, "A:", true), ...EXTRA_FIELDS],
  },
];

// ── Table construction ─────────────────────────────────────────────────────────

// Integer-like keys are enumerated before all others by JS objects, which
// would break first-seen field order in ParsedNote.fields.
const ARRAY_INDEX_RE = /^(?:0|[1-9]\d*)$/;

/**
 * Validate note-type blueprints and build a frozen PrefixTable.
 *
 * Throws PrefixTableError when a prefix maps to two field names, a prefix is
 * empty or holds whitespace, a field name is integer-like, a type name or a
 * field name repeats, a type has no mandatory field, or `catchAll` names no
 * configured type. Every type needs a mandatory field so that a block without
 * fields never matches one.
 */
export function buildPrefixTable(
  configs: readonly NoteTypeConfig[],
  opts: { catchAll?: string } = {},
): PrefixTable {
  const noteTypes = new Map<string, NoteTypeConfig>();
  const prefixToField = new Map<string, string>();

  for (const cfg of configs) {
    if (noteTypes.has(cfg.name)) throw new PrefixTableError(`Note type '${cfg.name}' is defined twice`);
    if (!cfg.fields.some((f) => f.mandatory)) {
      throw new PrefixTableError(`Note type '${cfg.name}' has no mandatory field`);
    }

    const seen = new Set<string>();
    for (const f of cfg.fields) {
      if (!f.prefix || /\s/.test(f.prefix)) {
        throw new PrefixTableError(`Prefix '${f.prefix}' of field '${f.fieldName}' must be non-empty without whitespace`);
      }
      if (ARRAY_INDEX_RE.test(f.fieldName)) {
        throw new PrefixTableError(`Field name '${f.fieldName}' in '${cfg.name}' must not be an integer`);
      }
      if (seen.has(f.fieldName)) {
        throw new PrefixTableError(`Field '${f.fieldName}' appears twice in '${cfg.name}'`);
      }
      seen.add(f.fieldName);

      const existing = prefixToField.get(f.prefix);
      if (existing !== undefined && existing !== f.fieldName) {
        throw new PrefixTableError(
          `Prefix '${f.prefix}' maps to both '${existing}' and '${f.fieldName}'`,
        );
      }
      prefixToField.set(f.prefix, f.fieldName);
    }

    noteTypes.set(cfg.name, Object.freeze({ ...cfg, fields: Object.freeze(cfg.fields.map((f) => Object.freeze({ ...f }))) }));
  }

  const catchAll = opts.catchAll ?? configs[0]?.name;
  if (catchAll === undefined || !noteTypes.has(catchAll)) {
    throw new PrefixTableError(`Catch-all note type '${catchAll ?? ""}' is not configured`);
  }

  return Object.freeze({ noteTypes, prefixToField, catchAll });
}

export const DEFAULT_PREFIX_TABLE: PrefixTable = buildPrefixTable(DEFAULT_NOTE_TYPES, {
  catchAll: QA_NOTE_TYPE,
});

// ── Lookups ────────────────────────────────────────────────────────────────────

export function getNoteTypeConfig(table: PrefixTable, noteType: string): NoteTypeConfig {
  const cfg = table.noteTypes.get(noteType);
  if (!cfg) throw new UnknownNoteTypeError([], noteType);
  return cfg;
}

export function noteTypeFieldNames(table: PrefixTable, noteType: string): string[] {
  return getNoteTypeConfig(table, noteType).fields.map((f) => f.fieldName);
}
