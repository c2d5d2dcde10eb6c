/**
 * @file src/parser/parser.ts
 * @summary Parses one raw markdown note block into a ParsedNote. A block is a run of
 * prefixed fields (`Q: ...`, `A: ...`, `C1: ...`) that may span several lines, an optional
 * `<!-- note_id: N -->` comment, and fenced code in which prefix detection is suspended.
 * The note type is inferred from the populated field names once the block is read.
 *
 * @exports
 *  - parseNoteBlock - parse a raw block, throwing DuplicateFieldError / UnknownNoteTypeError
 */

import { CODE_FENCE_RE, NOTE_ID_LINE_RE } from "../core/constants";
import { DuplicateFieldError } from "../core/errors";
import { log } from "../core/logger";
import { inferByRequiredFields } from "./note-type-inference";
import type { ParsedNote, ParseOptions, PrefixTable } from "../types/note";

type PrefixMatch = { prefix: string; fieldName: string; rest: string | null };

/** First prefix, in table order, that the line equals or starts with followed by a space. */
function matchPrefix(line: string, table: PrefixTable): PrefixMatch | null {
  for (const [prefix, fieldName] of table.prefixToField) {
    if (line === prefix) return { prefix, fieldName, rest: null };
    if (line.startsWith(prefix + " ")) return { prefix, fieldName, rest: line.slice(prefix.length + 1) };
  }
  return null;
}

/**
 * Parse a raw note block.
 *
 * Single forward pass over the lines of the trimmed block. Fence lines toggle
 * the in-fence flag and belong to the open field; the note id comment is
 * recognised even inside a fence; field prefixes are ignored inside a fence.
 * Lines before the first field are dropped.
 *
 * Throws DuplicateFieldError when a field prefix recurs, and whatever the
 * inference policy throws (UnknownNoteTypeError) when no note type fits.
 */
export function parseNoteBlock(rawBlock: string, options: ParseOptions): ParsedNote {
  const { table } = options;
  const inferType = options.inferType ?? inferByRequiredFields;

  const lines = rawBlock.trim().split(/\r?\n/);

  let noteId: number | null = null;
  const fields: Record<string, string> = {};
  let currentField: string | null = null;
  let currentLines: string[] = [];
  let inCodeFence = false;
  const seen = new Set<string>();

  const flush = () => {
    if (currentField === null) return;
    fields[currentField] = currentLines.join("\n").trim();
  };

  const append = (line: string) => {
    if (currentField !== null) currentLines.push(line);
  };

  for (const line of lines) {
    // 1) Fence toggle
    if (CODE_FENCE_RE.test(line.trimStart())) {
      inCodeFence = !inCodeFence;
      append(line);
      continue;
    }

    // 2) Note id comment
    const idm = NOTE_ID_LINE_RE.exec(line.trim());
    if (idm) {
      noteId = Number(idm[1]);
      continue;
    }

    // 3) Inside a fence: content only
    if (inCodeFence) {
      append(line);
      continue;
    }

    // 4) Field prefix
    const pm = matchPrefix(line, table);
    if (pm) {
      if (seen.has(pm.fieldName)) {
        const err = new DuplicateFieldError(pm.prefix, pm.fieldName, noteId);
        log.error(err.message);
        throw err;
      }
      seen.add(pm.fieldName);
      flush();
      currentField = pm.fieldName;
      currentLines = pm.rest === null ? [] : [pm.rest];
      continue;
    }

    // 5) Continuation
    append(line);
  }

  flush();

  let noteType: string;
  try {
    noteType = inferType(new Set(Object.keys(fields)), table);
  } catch (e) {
    log.error(e instanceof Error ? e.message : String(e));
    throw e;
  }

  return Object.freeze({
    noteId,
    noteType,
    fields: Object.freeze(fields),
    rawContent: rawBlock,
  });
}
