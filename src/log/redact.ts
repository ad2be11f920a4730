const SENSITIVE_KEYS = new Set(["token", "access_token", "password", "pass", "secret", "apikey", "api_key", "key"]);

const SENSITIVE_QUERY_RE = /([?#&](?:token|access_token|password|pass|secret|api[_-]?key|key)=)([^&#\s]+)/gi;

/**
 * Замаскировать чувствительные параметры в URL (query).
 *
 * Пример: `ws://127.0.0.1:47613/recorder?token=abc` → `ws://127.0.0.1:47613/recorder?token=***`
 */
export function redactUrlForLog(url: string): string {
  const raw = String(url ?? "");
  if (!raw) return raw;

  try {
    const u = new URL(raw);
    // Не итерируем `searchParams` “вживую” во время `set()`, чтобы не терять элементы.
    for (const k of Array.from(u.searchParams.keys())) {
      if (SENSITIVE_KEYS.has(k.toLowerCase())) u.searchParams.set(k, "***");
    }
    return u.toString();
  } catch {
    return raw.replace(SENSITIVE_QUERY_RE, "$1***");
  }
}

/**
 * Замаскировать чувствительные значения в произвольной строке (для логов).
 *
 * Поддерживает `token=...`, `password: ...` и query-параметры.
 */
export function redactSecretsInStringForLog(input: string): string {
  const s = String(input ?? "");
  if (!s) return s;

  let out = s.replace(SENSITIVE_QUERY_RE, "$1***");
  out = out.replace(/\b(token|access_token|password|pass|secret|api[_-]?key)\b\s*[:=]\s*([^\s,;&#]+)/gi, "$1=***");
  return out;
}

/**
 * Сократить абсолютные пути внутри домашней папки до `~/...`.
 *
 * Имена записей остаются (они нужны для диагностики), но имя пользователя в лог не попадает.
 */
export function shortenHomePathsForLog(input: string, homeDir: string): string {
  const s = String(input ?? "");
  const home = String(homeDir ?? "").replace(/[\\/]+$/, "");
  if (!s || !home || home === "/" || !s.includes(home)) return s;
  return s.split(home).join("~");
}
