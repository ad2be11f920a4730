import { z } from "zod";

/**
 * Runtime-валидация “сырых” настроек из `settings.json`.
 *
 * Зачем:
 * - защититься от битого/частично испорченного файла
 * - отфильтровать мусорные типы до нормализации (defaults/trim/границы)
 *
 * Важно:
 * - схема описывает именно RAW (persisted) формат, где часть чисел может прийти строками
 * - окончательная нормализация делается в `normalizeSettings()`
 */

const zBool = z.boolean();
const zStr = z.string();
const zNumOrStr = z.union([z.number(), z.string()]);

export const RawRecorderSettingsSchema = z
  .object({
    debug: z
      .object({
        enabled: zBool.optional(),
      })
      .strict()
      .optional(),
    recording: z
      .object({
        recordingsDir: zStr.optional(),
        ffmpegPath: zStr.optional(),
        inputDevice: zStr.optional(),
        fileNameTimeZone: zStr.optional(),
      })
      .strict()
      .optional(),
    control: z
      .object({
        host: zStr.optional(),
        port: zNumOrStr.optional(),
        path: zStr.optional(),
        requestTimeoutMs: zNumOrStr.optional(),
      })
      .strict()
      .optional(),
    log: z
      .object({
        maxEntries: zNumOrStr.optional(),
        retentionDays: zNumOrStr.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type RawRecorderSettings = z.infer<typeof RawRecorderSettingsSchema>;
