/**
 * @file src/types/settings.ts
 * @summary Library settings type definition. Only the type is defined here; the
 * DEFAULT_SETTINGS constant and the loader live in src/core/settings.ts.
 *
 * @exports
 *   - InferenceStrategy - which note-type inference policy the parser uses
 *   - SyncSettings      - complete settings structure
 */

import type { LogLevel } from "../core/logger";

/**
 * "required-subset": first declared note type whose mandatory fields are all present,
 * catch-all type last. "unique-marker": first distinguishing field found, most specific first.
 */
export type InferenceStrategy = "required-subset" | "unique-marker";

export type SyncSettings = {
  // AnkiConnect endpoint
  ankiConnect: {
    url: string;
    /** AnkiConnect API version sent with every request. */
    version: number;
    timeoutMs: number;
  };

  inference: InferenceStrategy;

  logLevel: LogLevel;
};
