// tests/deck-filename.test.ts
// ---------------------------------------------------------------------------
// Tests for deck name ↔ file name conversion.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { deckNameFromFilename, sanitizeDeckFilename } from "../src/anki/deck-filename";
import { InvalidFilenameError } from "../src/core/errors";

function catchInvalid(deckName: string): InvalidFilenameError {
  try {
    sanitizeDeckFilename(deckName);
  } catch (e) {
    if (e instanceof InvalidFilenameError) return e;
    throw e;
  }
  throw new Error(`expected '${deckName}' to be rejected`);
}

describe("sanitizeDeckFilename", () => {
  it("replaces the hierarchy separator", () => {
    expect(sanitizeDeckFilename("Languages::French::Verbs")).toBe("Languages__French__Verbs");
  });

  it("allows a single colon", () => {
    expect(sanitizeDeckFilename("Time: 10 minutes")).toBe("Time: 10 minutes");
  });

  it("rejects invalid characters and lists them", () => {
    const err = catchInvalid("A/B");

    expect(err.invalidChars).toEqual(["/"]);
    expect(err.reservedName).toBeNull();
    expect(err.message).toBe(
      "Deck name 'A/B' contains invalid filename characters: /\n" +
        'Please rename the deck in Anki to remove these characters: / \\ ? * | " < >',
    );
  });

  it("lists invalid characters in table order", () => {
    expect(catchInvalid('What? "quoted"').invalidChars).toEqual(["?", '"']);
  });

  it.each([["con::Sub", "CON"], ["COM1", "COM1"], ["lpt9::x", "LPT9"]])(
    "rejects %s as reserved (%s)",
    (deckName, reserved) => {
      const err = catchInvalid(deckName);
      expect(err.reservedName).toBe(reserved);
      expect(err.message).toBe(
        `Deck name '${deckName}' starts with reserved name '${reserved}'.\nPlease rename the deck in Anki.`,
      );
    },
  );

  it("accepts names that only start like a reserved name", () => {
    expect(sanitizeDeckFilename("Console::X")).toBe("Console__X");
    expect(sanitizeDeckFilename("LPT10")).toBe("LPT10");
  });
});

describe("deckNameFromFilename", () => {
  it("restores the hierarchy and drops the extension", () => {
    expect(deckNameFromFilename("Languages__French.md")).toBe("Languages::French");
    expect(deckNameFromFilename("Default")).toBe("Default");
  });
});
