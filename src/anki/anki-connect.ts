/**
 * @file src/anki/anki-connect.ts
 * @summary Thin client for the AnkiConnect JSON-RPC endpoint. Every action posts
 * `{ action, version, params }` and unwraps the `{ result, error }` envelope; results are
 * checked against zod schemas so the rest of the library only ever sees typed payloads.
 * No retries: a failed action throws AnkiConnectError and the caller decides.
 *
 * @exports
 *  - NoteInfoSchema      - zod schema of one notesInfo entry
 *  - AnkiNoteInfo        - typed notesInfo entry
 *  - getFieldValue       - typed accessor for a note's field value
 *  - AnkiConnectClient   - invoke + typed helpers (deckNamesAndIds, findNotes, notesInfo, modelNames)
 *  - RemoteIds           - deck and note ids known to Anki
 *  - collectRemoteIds    - fetch the id sets consumed by checkIds
 */

import { z } from "zod";
import { AnkiConnectError } from "../core/errors";
import { log } from "../core/logger";
import type { SyncSettings } from "../types/settings";

// ── Payload schemas ───────────────────────────────────────────────────────────

const EnvelopeSchema = z.object({
  result: z.unknown(),
  error: z.string().nullable(),
});

export const NoteInfoSchema = z.object({
  noteId: z.number().int(),
  modelName: z.string(),
  tags: z.array(z.string()).default([]),
  fields: z.record(
    z.object({
      value: z.string(),
      order: z.number().int(),
    }),
  ),
});

export type AnkiNoteInfo = z.infer<typeof NoteInfoSchema>;

// notesInfo answers `{}` for ids that no longer exist.
const NotesInfoSchema = z.array(
  z.union([NoteInfoSchema, z.object({}).strict().transform(() => null)]),
);

const DeckNamesAndIdsSchema = z.record(z.number().int());
const IdListSchema = z.array(z.number().int());
const NameListSchema = z.array(z.string());

/** The field's raw (HTML) value, or undefined when the note has no such field. */
export function getFieldValue(note: AnkiNoteInfo, fieldName: string): string | undefined {
  if (!Object.hasOwn(note.fields, fieldName)) return undefined;
  return note.fields[fieldName].value;
}

// ── Client ────────────────────────────────────────────────────────────────────

export class AnkiConnectClient {
  constructor(private readonly config: SyncSettings["ankiConnect"]) {}

  /**
   * Run one AnkiConnect action and validate its result with `schema`.
   * Transport failures, non-2xx responses, an `error` in the envelope and
   * results that fail the schema all throw AnkiConnectError.
   */
  async invoke<T>(
    action: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    log.debug(`invoke ${action}`, params);

    let response: Response;
    try {
      response = await fetch(this.config.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ action, version: this.config.version, params }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (e: unknown) {
      throw new AnkiConnectError(action, e instanceof Error ? e.message : String(e), e);
    }

    if (!response.ok) {
      let detail = "";
      try {
        detail = await response.text();
      } catch (e) {
        log.swallow(`read error body of ${action}`, e);
      }
      throw new AnkiConnectError(action, `HTTP ${response.status}${detail ? `: ${detail}` : ""}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (e: unknown) {
      throw new AnkiConnectError(action, "response is not JSON", e);
    }

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new AnkiConnectError(action, "response is not an AnkiConnect envelope", envelope.error);
    }
    if (envelope.data.error !== null) {
      throw new AnkiConnectError(action, envelope.data.error);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new AnkiConnectError(action, "unexpected result shape", result.error);
    }
    return result.data;
  }

  async deckNamesAndIds(): Promise<Map<string, number>> {
    const rec = await this.invoke("deckNamesAndIds", {}, DeckNamesAndIdsSchema);
    return new Map(Object.entries(rec));
  }

  async findNotes(query: string): Promise<number[]> {
    return this.invoke("findNotes", { query }, IdListSchema);
  }

  /** Entries for ids unknown to Anki are dropped. */
  async notesInfo(noteIds: readonly number[]): Promise<AnkiNoteInfo[]> {
    const entries = await this.invoke("notesInfo", { notes: noteIds }, NotesInfoSchema);
    return entries.filter((n): n is AnkiNoteInfo => n !== null);
  }

  async modelNames(): Promise<string[]> {
    return this.invoke("modelNames", {}, NameListSchema);
  }
}

export type RemoteIds = {
  deckIds: Set<number>;
  noteIds: Set<number>;
};

/** Every deck id and every note id in the collection. */
export async function collectRemoteIds(client: AnkiConnectClient): Promise<RemoteIds> {
  const decks = await client.deckNamesAndIds();
  const noteIds = await client.findNotes("deck:*");
  return { deckIds: new Set(decks.values()), noteIds: new Set(noteIds) };
}
