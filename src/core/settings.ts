/**
 * @file src/core/settings.ts
 * @summary Factory defaults and loading for SyncSettings. Raw settings (parsed JSON, an
 * options object) are validated with zod; missing keys fall back to DEFAULT_SETTINGS and
 * invalid values raise a SettingsError naming every offending path.
 *
 * @exports
 *   - SyncSettings (re-exported type)
 *   - DEFAULT_SETTINGS  - factory-default values
 *   - normaliseSettings - validate raw input and fill defaults
 *   - applySettings     - apply process-wide settings (log level)
 */

import { z } from "zod";
import { SettingsError } from "./errors";
import { LOG_LEVELS, log } from "./logger";
import type { SyncSettings } from "../types/settings";

export type { SyncSettings } from "../types/settings";

export const DEFAULT_SETTINGS: SyncSettings = {
  ankiConnect: {
    url: "http://127.0.0.1:8765",
    version: 6,
    timeoutMs: 10_000,
  },
  inference: "required-subset",
  logLevel: "info",
};

const SettingsSchema = z.object({
  ankiConnect: z
    .object({
      url: z.string().url().default(DEFAULT_SETTINGS.ankiConnect.url),
      version: z.number().int().positive().default(DEFAULT_SETTINGS.ankiConnect.version),
      timeoutMs: z.number().int().positive().default(DEFAULT_SETTINGS.ankiConnect.timeoutMs),
    })
    .default({}),
  inference: z.enum(["required-subset", "unique-marker"]).default(DEFAULT_SETTINGS.inference),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_SETTINGS.logLevel),
});

/**
 * Validate raw settings and fill every missing key from DEFAULT_SETTINGS.
 * `null` and `undefined` yield the defaults.
 */
export function normaliseSettings(raw: unknown): SyncSettings {
  const parsed = SettingsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`),
    );
  }
  return parsed.data;
}

export function applySettings(settings: SyncSettings): void {
  log.setLevel(settings.logLevel);
}
