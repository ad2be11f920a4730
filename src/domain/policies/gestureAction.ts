/**
 * Политика: разбор действий жеста (ярлык ОС → URL-схема → демон).
 *
 * Ярлык открывает `stealthrecorder://start` или `stealthrecorder://stop`.
 */
export const GESTURE_URL_SCHEME = "stealthrecorder";

export type GestureAction = "start" | "stop";

export function normalizeGestureAction(raw: string | null | undefined): GestureAction | null {
  const s = String(raw ?? "")
    .trim()
    .toLowerCase();
  return s === "start" || s === "stop" ? s : null;
}

/**
 * Достать строку действия из URL (`stealthrecorder://start`, `stealthrecorder:stop`, `stealthrecorder:///start`).
 *
 * Возвращает “сырое” действие (как есть, без проверки на start/stop) или `null`, если схема чужая.
 * Проверку действия делает gesture use-case: неизвестное действие там логируется и игнорируется.
 */
export function parseGestureUrl(url: string): string | null {
  const raw = String(url ?? "").trim();
  const m = /^([a-z][a-z0-9+.-]*):(?:\/\/)?\/?([^/?#]*)/i.exec(raw);
  if (!m) return null;
  if (m[1].toLowerCase() !== GESTURE_URL_SCHEME) return null;
  try {
    return decodeURIComponent(m[2]);
  } catch {
    return m[2];
  }
}
