/**
 * @file src/anki/deck-filename.ts
 * @summary Conversion between hierarchical Anki deck names (`A::B::C`) and markdown file
 * names (`A__B__C.md`). Deck names that cannot be file names on every platform are
 * rejected with InvalidFilenameError.
 *
 * @exports
 *  - INVALID_FILENAME_CHARS - characters rejected in deck names
 *  - RESERVED_DEVICE_NAMES  - Windows device names rejected as the top-level deck
 *  - sanitizeDeckFilename   - deck name → file base name (`::` → `__`)
 *  - deckNameFromFilename   - file name → deck name (`__` → `::`, `.md` dropped)
 */

import { InvalidFilenameError } from "../core/errors";

/** `:` is not listed: `::` is the hierarchy separator and is replaced. */
export const INVALID_FILENAME_CHARS: readonly string[] = ["/", "\\", "?", "*", "|", '"', "<", ">"];

export const RESERVED_DEVICE_NAMES: ReadonlySet<string> = new Set([
  "CON",
  "PRN",
  "AUX",
  "NUL",
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

export function sanitizeDeckFilename(deckName: string): string {
  const invalid = INVALID_FILENAME_CHARS.filter((c) => deckName.includes(c));
  if (invalid.length) {
    throw new InvalidFilenameError(
      deckName,
      invalid,
      null,
      `Deck name '${deckName}' contains invalid filename characters: ${invalid.join(" ")}\n` +
        `Please rename the deck in Anki to remove these characters: ${INVALID_FILENAME_CHARS.join(" ")}`,
    );
  }

  const base = (deckName.split("::")[0] ?? "").toUpperCase();
  if (RESERVED_DEVICE_NAMES.has(base)) {
    throw new InvalidFilenameError(
      deckName,
      [],
      base,
      `Deck name '${deckName}' starts with reserved name '${base}'.\nPlease rename the deck in Anki.`,
    );
  }

  return deckName.replace(/::/g, "__");
}

export function deckNameFromFilename(filename: string): string {
  return filename.replace(/\.md$/i, "").replace(/__/g, "::");
}
