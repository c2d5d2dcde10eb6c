/**
 * @file src/sync/file-state.ts
 * @summary Builds FileState snapshots from markdown file content that the caller has
 * already read. A parse error discards the whole file: no partially parsed FileState is
 * ever returned. Batches keep input order and report each failed file separately.
 *
 * @exports
 *  - FileInput        - path + content of one markdown file
 *  - FileStateResult  - parsed state or the error that stopped the file
 *  - readFileState    - one file → FileState (throws on parse errors)
 *  - readFileStates   - many files → one FileStateResult each, in input order
 *  - parseOptionsFromSettings - ParseOptions for a table and the configured inference strategy
 */

import { log } from "../core/logger";
import { DEFAULT_PREFIX_TABLE } from "../note-types/note-types";
import { splitNoteBlocks } from "../parser/block-splitter";
import { resolveInferrer } from "../parser/note-type-inference";
import { parseNoteBlock } from "../parser/parser";
import type { FileState, ParseOptions, PrefixTable } from "../types/note";
import type { SyncSettings } from "../types/settings";

export type FileInput = {
  filePath: string;
  content: string;
};

export type FileStateResult =
  | { ok: true; state: FileState }
  | { ok: false; filePath: string; error: Error };

export function parseOptionsFromSettings(
  settings: Pick<SyncSettings, "inference">,
  table: PrefixTable = DEFAULT_PREFIX_TABLE,
): ParseOptions {
  return { table, inferType: resolveInferrer(settings.inference) };
}

export function readFileState(filePath: string, rawContent: string, options: ParseOptions): FileState {
  const { deckId, blocks } = splitNoteBlocks(rawContent);
  const parsedNotes = blocks.map((block) => parseNoteBlock(block, options));
  return Object.freeze({
    filePath,
    rawContent,
    deckId,
    parsedNotes: Object.freeze(parsedNotes),
  });
}

export function readFileStates(inputs: readonly FileInput[], options: ParseOptions): FileStateResult[] {
  return inputs.map(({ filePath, content }): FileStateResult => {
    try {
      return { ok: true, state: readFileState(filePath, content, options) };
    } catch (e: unknown) {
      const error = e instanceof Error ? e : new Error(String(e));
      log.warn(`Skipping ${filePath}: ${error.message}`);
      return { ok: false, filePath, error };
    }
  });
}
