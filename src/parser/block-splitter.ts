/**
 * @file src/parser/block-splitter.ts
 * @summary Splits markdown file content into an optional leading deck id and raw note
 * blocks, using the literal NOTE_SEPARATOR. Also answers two questions the sync layer asks
 * about a file without parsing it: which blocks already carry a note id, and whether any
 * block has not been imported yet.
 *
 * @exports
 *  - extractDeckId      - strip a leading deck id comment
 *  - splitNoteBlocks    - deck id + trimmed, non-empty blocks in document order
 *  - extractNoteBlocks  - identified blocks keyed by "note_id: N"
 *  - hasUntrackedNotes  - true when some block has fields but no note id
 */

import { DECK_ID_RE, NOTE_ID_START_RE, NOTE_SEPARATOR } from "../core/constants";
import type { PrefixTable } from "../types/note";

/** No characters are consumed when the content does not start with a deck id comment. */
export function extractDeckId(content: string): { deckId: number | null; remaining: string } {
  const m = DECK_ID_RE.exec(content);
  if (!m) return { deckId: null, remaining: content };
  return { deckId: Number(m[1]), remaining: content.slice(m[0].length) };
}

function normaliseLineEndings(content: string): string {
  return content.replace(/\r\n?/g, "\n");
}

function blocksOf(content: string): string[] {
  return normaliseLineEndings(content)
    .split(NOTE_SEPARATOR)
    .map((b) => b.trim())
    .filter((b) => b.length > 0);
}

/** CRLF and lone CR line endings are read as LF. */
export function splitNoteBlocks(content: string): { deckId: number | null; blocks: string[] } {
  const { deckId, remaining } = extractDeckId(normaliseLineEndings(content));
  return { deckId, blocks: blocksOf(remaining) };
}

/**
 * Blocks that start with a note id comment, keyed `"note_id: N"`.
 * Expects content with the deck id already stripped.
 */
export function extractNoteBlocks(cardsContent: string): Map<string, string> {
  const notes = new Map<string, string>();
  for (const block of blocksOf(cardsContent)) {
    const m = NOTE_ID_START_RE.exec(block);
    if (m) notes.set(`note_id: ${m[1]}`, block);
  }
  return notes;
}

/**
 * True when a block holds a field prefix (at its start or after a newline,
 * followed by a space) but does not start with a note id comment, i.e. the
 * note has never been imported. Expects content with the deck id stripped.
 */
export function hasUntrackedNotes(cardsContent: string, table: PrefixTable): boolean {
  const prefixes = Array.from(table.prefixToField.keys());
  for (const block of blocksOf(cardsContent)) {
    const hasFields = prefixes.some(
      (p) => block.startsWith(`${p} `) || block.includes(`\n${p} `),
    );
    if (hasFields && !NOTE_ID_START_RE.test(block)) return true;
  }
  return false;
}
