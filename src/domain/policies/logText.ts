/**
 * Policy: текст для логов: обрезка длинных значений и rolling-хвост stderr дочернего процесса.
 */
export function trimForLogPolicy(value: unknown, maxChars = 1200): string {
  const text = String(value ?? "");
  const max = Math.max(0, Math.floor(Number(maxChars) || 0));
  if (text.length <= max) return text;
  return text.slice(0, max) + "…(truncated)";
}

/** Дописать `chunk` и оставить последние `maxChars` символов. */
export function appendRollingText(params: { prev: string; chunk: string; maxChars: number }): string {
  const max = Math.max(0, Math.floor(Number(params.maxChars) || 0));
  if (max === 0) return "";
  const next = String(params.prev ?? "") + String(params.chunk ?? "");
  return next.length > max ? next.slice(next.length - max) : next;
}
