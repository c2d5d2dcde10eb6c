/**
 * @file src/core/constants.ts
 * @summary Markdown markers shared by the splitter, parser, validator and formatter:
 * the note separator, the deck and note id comments, code fences and cloze deletions.
 *
 * @exports
 *   - NOTE_SEPARATOR                          - literal separator between note blocks
 *   - DECK_ID_RE / NOTE_ID_LINE_RE / NOTE_ID_START_RE - id comment patterns
 *   - CODE_FENCE_RE                           - fence opener/closer at line start
 *   - CLOZE_RE                                - a cloze deletion opener ({{cN::)
 *   - deckIdComment / noteIdComment           - write-side comment builders
 */

/** Blank-line-delimited horizontal rule between notes. Matched exactly. */
export const NOTE_SEPARATOR = "\n\n---\n\n";

/** Deck id comment, anchored at the start of file content, eats one newline. */
export const DECK_ID_RE = /^<!--\s*deck_id:\s*(\d+)\s*-->\n?/;

/** A whole (trimmed) line holding only a note id comment. */
export const NOTE_ID_LINE_RE = /^<!--\s*note_id:\s*(\d+)\s*-->$/;

/** A note id comment at the start of a block. */
export const NOTE_ID_START_RE = /^<!--\s*note_id:\s*(\d+)\s*-->/;

/** Tested against the left-trimmed line. */
export const CODE_FENCE_RE = /^(?:```|~~~)/;

export const CLOZE_RE = /\{\{c\d+::/;

export function deckIdComment(deckId: number): string {
  return `<!-- deck_id: ${deckId} -->`;
}

export function noteIdComment(noteId: number): string {
  return `<!-- note_id: ${noteId} -->`;
}
