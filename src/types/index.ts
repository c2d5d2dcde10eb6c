// src/types/index.ts
// ---------------------------------------------------------------------------
// Barrel re-export: import any shared type from "types" or "types/index".
// Organised by domain: note -> settings.
// ---------------------------------------------------------------------------

export type {
  FieldMapping,
  NoteTypeKind,
  NoteTypeConfig,
  PrefixTable,
  NoteFields,
  ParsedNote,
  FileState,
  IdKind,
  InvalidId,
  FieldConverter,
  NoteTypeInferrer,
  ParseOptions,
} from "./note";
export type { InferenceStrategy, SyncSettings } from "./settings";
