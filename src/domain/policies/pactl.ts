/**
 * Политика: парсинг `pactl` stdout (list short sources / info) для выбора микрофона.
 *
 * Все функции чистые: принимают stdout как строку.
 */

export function parsePactlListShortRows(stdout: string): string[][] {
  return String(stdout ?? "")
    .split("\n")
    .map((x) => x.trim())
    .filter(Boolean)
    .map((row) =>
      row
        .split(/\s+/)
        .map((p) => p.trim())
        .filter(Boolean),
    );
}

export function parsePactlDefaultSourceFromInfo(stdout: string): string {
  const m = String(stdout ?? "").match(/^Default Source:\s*(.+)$/m);
  return (m?.[1] ?? "").trim();
}

/** Источники-микрофоны из `pactl list short sources` (monitor-источники это выход, не вход). */
export function parseInputSourcesFromListShortSources(stdout: string): string[] {
  const out: string[] = [];
  for (const parts of parsePactlListShortRows(stdout)) {
    const name = String(parts[1] ?? "").trim();
    if (!name || name.endsWith(".monitor")) continue;
    out.push(name);
  }
  return out;
}

export function buildPulseMicCandidates(params: { defaultSourceFromInfo?: string }): string[] {
  const out: string[] = [];
  const src = String(params.defaultSourceFromInfo ?? "").trim();
  // default source может оказаться monitor'ом (если пользователь так настроил), такой не берём.
  if (src && !src.endsWith(".monitor")) out.push(src);

  // PulseAudio alias
  out.push("@DEFAULT_SOURCE@", "default");

  const seen = new Set<string>();
  return out.filter((c) => {
    if (seen.has(c)) return false;
    seen.add(c);
    return true;
  });
}
