// tests/id-check.test.ts
// ---------------------------------------------------------------------------
// Tests for the markdown-vs-Anki id cross-check and message helpers.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { checkIds, fileBaseName, noteIdentifier } from "../src/validation/id-check";
import type { FileState, ParsedNote } from "../src/types/note";

function note(noteId: number | null, rawContent = "Q: q\nA: a"): ParsedNote {
  return { noteId, noteType: "AnkiMdQA", fields: { Question: "q", Answer: "a" }, rawContent };
}

function file(filePath: string, deckId: number | null, notes: ParsedNote[]): FileState {
  return { filePath, rawContent: "", deckId, parsedNotes: notes };
}

describe("fileBaseName", () => {
  it.each([
    ["decks/Geo.md", "Geo.md"],
    ["C:\\decks\\Geo.md", "Geo.md"],
    ["Geo.md", "Geo.md"],
  ])("%s → %s", (path, name) => {
    expect(fileBaseName(path)).toBe(name);
  });
});

describe("noteIdentifier", () => {
  it("uses the note id when present", () => {
    expect(noteIdentifier(note(42))).toBe("note_id: 42");
  });

  it("quotes the first line otherwise", () => {
    expect(noteIdentifier(note(null, "\nQ: What?\nA: That"))).toBe("'Q: What?...'");
  });

  it("cuts the first line at 60 characters", () => {
    const long = "Q: " + "x".repeat(77);
    expect(noteIdentifier(note(null, long))).toBe(`'Q: ${"x".repeat(57)}...'`);
  });

  it("counts characters, not UTF-16 units", () => {
    const emoji = "Q: " + "🦉".repeat(70);
    expect(noteIdentifier(note(null, emoji))).toBe(`'Q: ${"🦉".repeat(57)}...'`);
  });
});

describe("checkIds", () => {
  it("returns nothing when every id is known", () => {
    const files = [file("A.md", 1, [note(10), note(null)])];
    expect(checkIds(files, new Set([1]), new Set([10]))).toEqual([]);
  });

  it("reports unknown deck ids before the notes of the same file", () => {
    const files = [file("decks/A.md", 2, [note(11)])];

    expect(checkIds(files, new Set([1]), new Set())).toEqual([
      { idValue: 2, idKind: "deck", filePath: "decks/A.md", context: "deck_id in A.md" },
      { idValue: 11, idKind: "note", filePath: "decks/A.md", context: "note_id: 11 in A.md" },
    ]);
  });

  it("keeps file order and does not deduplicate", () => {
    const files = [
      file("A.md", 1, [note(10), note(11), note(null)]),
      file("B.md", null, [note(11), note(12)]),
    ];

    expect(checkIds(files, new Set([1]), new Set([10])).map((i) => i.context)).toEqual([
      "note_id: 11 in A.md",
      "note_id: 11 in B.md",
      "note_id: 12 in B.md",
    ]);
  });
});
