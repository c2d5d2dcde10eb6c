// tests/validator.test.ts
// ---------------------------------------------------------------------------
// Tests for note validation: mandatory fields, cloze syntax, choice answers
// and file-level message prefixes.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { validateFileState, validateNote } from "../src/validation/validator";
import { parseNoteBlock } from "../src/parser/parser";
import { readFileState } from "../src/sync/file-state";
import { DEFAULT_PREFIX_TABLE } from "../src/note-types/note-types";
import type { NoteFields, ParsedNote } from "../src/types/note";

const table = DEFAULT_PREFIX_TABLE;

function parse(block: string): ParsedNote {
  return parseNoteBlock(block, { table });
}

function note(noteType: string, fields: NoteFields): ParsedNote {
  return { noteId: null, noteType, fields, rawContent: "" };
}

const CLOZE_ERROR = "AnkiMdCloze note must contain cloze syntax (e.g. {{c1::answer}}) in the T: field";
const INTEGER_ERROR =
  "AnkiMdChoice answer (A:) must contain integers (e.g. '1' for single choice or '1, 2, 3' for multiple choice)";

describe("validateNote", () => {
  it("accepts a complete QA note", () => {
    expect(validateNote(parse("<!-- note_id: 42 -->\nQ: What is 2+2?\nA: 4"), table)).toEqual([]);
  });

  it("reports an empty mandatory field", () => {
    expect(validateNote(parse("Q: q\nA:"), table)).toEqual(["Missing mandatory field 'Answer' (A:)"]);
  });

  it("treats whitespace-only content as missing", () => {
    expect(validateNote(note("AnkiMdReversed", { Front: "  ", Back: "b" }), table)).toEqual([
      "Missing mandatory field 'Front' (F:)",
    ]);
  });

  it("stops at an unknown note type", () => {
    expect(validateNote(note("Nope", {}), table)).toEqual(["Unknown note type 'Nope'"]);
  });

  it("lists every missing field in configured order", () => {
    expect(validateNote(note("AnkiMdChoice", { "Choice 1": "a" }), table)).toEqual([
      "Missing mandatory field 'Question' (Q:)",
      "Missing mandatory field 'Answer' (A:)",
    ]);
  });
});

describe("validateNote cloze rule", () => {
  it("accepts text with a cloze deletion", () => {
    expect(validateNote(parse("T: {{c1::Paris}} is the capital of France"), table)).toEqual([]);
  });

  it("rejects text without cloze syntax", () => {
    expect(validateNote(parse("T: Paris is the capital of France"), table)).toEqual([CLOZE_ERROR]);
  });

  it("only reports the missing field when the text is blank", () => {
    expect(validateNote(note("AnkiMdCloze", { Text: "   " }), table)).toEqual([
      "Missing mandatory field 'Text' (T:)",
    ]);
  });
});

describe("validateNote choice rule", () => {
  const choices = "Q: Pick\nC1: a\nC2: b\nC3: c\n";

  it("accepts single and multiple answers in range", () => {
    expect(validateNote(parse(`${choices}A: 2`), table)).toEqual([]);
    expect(validateNote(parse(`${choices}A: 1, 3`), table)).toEqual([]);
  });

  it("rejects an answer above the last choice", () => {
    expect(validateNote(parse(`${choices}A: 1, 4`), table)).toEqual([
      "AnkiMdChoice answer contains '4' but only 3 choice(s) are provided (C1: through C3:)",
    ]);
  });

  it("rejects zero", () => {
    expect(validateNote(parse(`${choices}A: 0`), table)).toEqual([
      "AnkiMdChoice answer contains '0' but only 3 choice(s) are provided (C1: through C3:)",
    ]);
  });

  it("reports only the first out-of-range value", () => {
    expect(validateNote(parse(`${choices}A: 5, 6`), table)).toEqual([
      "AnkiMdChoice answer contains '5' but only 3 choice(s) are provided (C1: through C3:)",
    ]);
  });

  it("rejects non-integer answers", () => {
    expect(validateNote(parse(`${choices}A: 1, x`), table)).toEqual([INTEGER_ERROR]);
    expect(validateNote(parse(`${choices}A: 1.5`), table)).toEqual([INTEGER_ERROR]);
    expect(validateNote(parse(`${choices}A: 1,`), table)).toEqual([INTEGER_ERROR]);
  });

  it("counts up to the highest populated choice, even with gaps", () => {
    expect(validateNote(parse("Q: Pick\nC1: a\nC3: c\nA: 3"), table)).toEqual([]);
  });
});

describe("validateFileState", () => {
  it("prefixes each message with the note and file", () => {
    const content = "<!-- note_id: 42 -->\nQ: q\nA:\n\n---\n\nT: plain";
    const state = readFileState("decks/Geo.md", content, { table });

    expect(validateFileState(state, table)).toEqual([
      "note_id: 42 in Geo.md: Missing mandatory field 'Answer' (A:)",
      `'T: plain...' in Geo.md: ${CLOZE_ERROR}`,
    ]);
  });

  it("returns nothing for a valid file", () => {
    const state = readFileState("Geo.md", "Q: q\nA: a\n\n---\n\nF: f\nB: b", { table });
    expect(validateFileState(state, table)).toEqual([]);
  });
});
