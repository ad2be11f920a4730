import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { FileNameTimeZone, RecorderSettings } from "./types";
import { RawRecorderSettingsSchema } from "./shared/validation/recorderSettingsSchema";
import { err, ok, type Result } from "./shared/result";
import { APP_ERROR } from "./shared/appErrorCodes";

export const DEFAULT_CONTROL_PORT = 47613;

/**
 * Настройки по умолчанию.
 *
 * `recording.recordingsDir` пустой = папка по умолчанию из `RecorderPaths` (~/Documents/StealthRecorder).
 */
export const DEFAULT_SETTINGS: RecorderSettings = {
  debug: {
    enabled: false,
  },
  recording: {
    recordingsDir: "",
    ffmpegPath: "ffmpeg",
    inputDevice: "auto",
    fileNameTimeZone: "utc",
  },
  control: {
    host: "127.0.0.1",
    port: DEFAULT_CONTROL_PORT,
    path: "/recorder",
    requestTimeoutMs: 15_000,
  },
  log: {
    maxEntries: 2048,
    retentionDays: 7,
  },
};

/**
 * Нормализовать настройки, прочитанные из `settings.json`.
 *
 * Делает:
 * - отбрасывает невалидный по схеме ввод целиком (→ defaults)
 * - заполняет значения по умолчанию, делает trim и зажимает числа в границы
 */
export function normalizeSettings(raw: unknown): RecorderSettings {
  const parsed = RawRecorderSettingsSchema.safeParse(raw ?? {});
  const obj = parsed.success ? parsed.data : {};

  return {
    debug: {
      enabled: obj.debug?.enabled ?? DEFAULT_SETTINGS.debug.enabled,
    },
    recording: {
      recordingsDir: normalizeText(obj.recording?.recordingsDir, DEFAULT_SETTINGS.recording.recordingsDir),
      ffmpegPath: normalizeText(obj.recording?.ffmpegPath, DEFAULT_SETTINGS.recording.ffmpegPath),
      inputDevice: normalizeText(obj.recording?.inputDevice, DEFAULT_SETTINGS.recording.inputDevice),
      fileNameTimeZone: normalizeTimeZone(obj.recording?.fileNameTimeZone),
    },
    control: {
      host: normalizeText(obj.control?.host, DEFAULT_SETTINGS.control.host),
      port: normalizeNumber(obj.control?.port, { defaultValue: DEFAULT_SETTINGS.control.port, min: 1, max: 65_535 }),
      path: normalizeControlPath(obj.control?.path),
      requestTimeoutMs: normalizeNumber(obj.control?.requestTimeoutMs, {
        defaultValue: DEFAULT_SETTINGS.control.requestTimeoutMs,
        min: 1000,
        max: 120_000,
      }),
    },
    log: {
      maxEntries: normalizeNumber(obj.log?.maxEntries, { defaultValue: DEFAULT_SETTINGS.log.maxEntries, min: 10, max: 20_000 }),
      retentionDays: normalizeRetentionDays(obj.log?.retentionDays ?? DEFAULT_SETTINGS.log.retentionDays),
    },
  };
}

/**
 * Прочитать настройки из файла.
 *
 * Нет файла: defaults, не ошибка. Битый JSON: `err(E_SETTINGS)`.
 */
export async function readSettingsFile(filePath: string): Promise<Result<RecorderSettings>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (e) {
    if (isMissingFileError(e)) return ok(normalizeSettings({}));
    return err({ code: APP_ERROR.SETTINGS, message: "Не удалось прочитать файл настроек", cause: String(e), details: { filePath } });
  }

  try {
    return ok(normalizeSettings(JSON.parse(text)));
  } catch (e) {
    return err({ code: APP_ERROR.SETTINGS, message: "Файл настроек повреждён (невалидный JSON)", cause: String(e), details: { filePath } });
  }
}

export async function writeSettingsFile(filePath: string, settings: RecorderSettings): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(settings, null, 2) + "\n", { encoding: "utf-8" });
}

function isMissingFileError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

function normalizeText(v: string | undefined, defaultValue: string): string {
  return typeof v === "string" && v.trim() ? v.trim() : defaultValue;
}

function normalizeTimeZone(v: string | undefined): FileNameTimeZone {
  const s = String(v ?? "").trim().toLowerCase();
  return s === "utc" ? "utc" : s === "local" ? "local" : DEFAULT_SETTINGS.recording.fileNameTimeZone;
}

function normalizeControlPath(v: string | undefined): string {
  const s = normalizeText(v, DEFAULT_SETTINGS.control.path);
  return s.startsWith("/") ? s : `/${s}`;
}

function normalizeNumber(v: unknown, params: { defaultValue: number; min?: number; max?: number }): number {
  const n = typeof v === "number" ? v : typeof v === "string" ? Number(v) : NaN;
  if (!Number.isFinite(n)) return params.defaultValue;
  const min = typeof params.min === "number" ? params.min : -Infinity;
  const max = typeof params.max === "number" ? params.max : Infinity;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function normalizeRetentionDays(v: unknown): number {
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n)) return 7;
  return Math.min(365, Math.max(1, Math.floor(n)));
}
