/**
 * Политика: именование файлов записи.
 *
 * Формат фиксированный (совместимость с уже сохранёнными записями): `stealth-<yyyyMMdd_HHmmss>.m4a`.
 * Метка рендерится только цифрами, без локали; часовой пояс берётся из настроек.
 */
import type { FileNameTimeZone } from "../../types";

export const RECORDING_FILE_PREFIX = "stealth-";
export const RECORDING_FILE_EXT = "m4a";

const RECORDING_FILE_NAME_RE = /^stealth-(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.m4a$/;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `yyyyMMdd_HHmmss` для момента `ms`. */
export function formatRecordingTimestamp(ms: number, timeZone: FileNameTimeZone): string {
  const d = new Date(ms);
  const utc = timeZone === "utc";
  const y = utc ? d.getUTCFullYear() : d.getFullYear();
  const mo = (utc ? d.getUTCMonth() : d.getMonth()) + 1;
  const day = utc ? d.getUTCDate() : d.getDate();
  const h = utc ? d.getUTCHours() : d.getHours();
  const mi = utc ? d.getUTCMinutes() : d.getMinutes();
  const s = utc ? d.getUTCSeconds() : d.getSeconds();
  return `${String(y).padStart(4, "0")}${pad2(mo)}${pad2(day)}_${pad2(h)}${pad2(mi)}${pad2(s)}`;
}

export function recordingFileName(ms: number, timeZone: FileNameTimeZone): string {
  return `${RECORDING_FILE_PREFIX}${formatRecordingTimestamp(ms, timeZone)}.${RECORDING_FILE_EXT}`;
}

/** Имя файла соответствует формату записи (а не просто `.m4a`). */
export function isRecordingFileName(name: string): boolean {
  return RECORDING_FILE_NAME_RE.test(String(name ?? ""));
}

/**
 * Имя для следующего файла: строго больше `lastFileName` (имена сравниваются как строки).
 *
 * Если часы не ушли дальше последнего имени (две записи в одну секунду, перевод часов назад,
 * конец летнего времени для `local`), берём метку последнего имени плюс одна секунда.
 */
export function nextRecordingFileName(params: {
  nowMs: number;
  timeZone: FileNameTimeZone;
  lastFileName: string | null;
}): string {
  const candidate = recordingFileName(params.nowMs, params.timeZone);
  const last = params.lastFileName;
  if (last == null || candidate > last) return candidate;
  const m = RECORDING_FILE_NAME_RE.exec(last);
  if (!m) return candidate;
  // Поля метки считаем как UTC, чтобы сдвиг на секунду не зависел от часового пояса процесса.
  const lastMs = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6]));
  return recordingFileName(lastMs + 1000, "utc");
}
