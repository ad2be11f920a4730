import type { Logger } from "../types";
import { redactSecretsInStringForLog, redactUrlForLog, shortenHomePathsForLog } from "./redact";

/** Уровень записи лога. */
export type LogLevel = "info" | "warn" | "error";

/** Одна запись лога (в памяти и/или в файле). */
export interface LogEntry {
  /** Unix time в мс. */
  ts: number;
  level: LogLevel;
  message: string;
  /** Доп. данные (для диагностики). */
  data?: Record<string, unknown>;
}

type Listener = () => void;
type Sink = (entry: LogEntry) => void;

const MAX_STRING_CHARS = 4000;
const MAX_ARRAY_ITEMS = 200;
const MAX_OBJECT_KEYS = 200;

/**
 * In-memory лог демона.
 *
 * Каждая запись санитизируется (секреты, домашняя папка, размер) до того, как попадёт в память или в sinks:
 * - `LogFileWriter.enqueue` (файлы по дням)
 * - stderr (если включён debug)
 */
export class LogService {
  private maxEntries: number;
  private entries: LogEntry[] = [];
  private listeners = new Set<Listener>();
  private sinks = new Set<Sink>();
  private homeDir: string;

  constructor(maxEntries: number, params?: { onEntry?: Sink; homeDir?: string }) {
    this.maxEntries = Math.max(10, maxEntries);
    this.homeDir = params?.homeDir ?? "";
    if (params?.onEntry) this.sinks.add(params.onEntry);
  }

  /** Изменить лимит записей (с обрезкой старых). */
  setMaxEntries(maxEntries: number) {
    this.maxEntries = Math.max(10, maxEntries);
    this.trim();
    this.emit();
  }

  /** Подключить получателя записей; возвращает отписку. */
  addSink(sink: Sink): () => void {
    this.sinks.add(sink);
    return () => this.sinks.delete(sink);
  }

  /** Подписка на любые изменения лога (добавление/очистка). */
  onChange(cb: Listener) {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  list(): LogEntry[] {
    return this.entries.slice();
  }

  /**
   * Логгер в скоупе (единый префикс + фиксированный контекст).
   *
   * Пример:
   *   const log = base.scoped("Запись", { via: "gesture" });
   *   log.info("start", { fileName });
   */
  scoped(scope: string, fixed?: Record<string, unknown>): Logger {
    const prefix = String(scope ?? "").trim();
    const merge = (data?: Record<string, unknown>) => {
      if (!fixed && !data) return undefined;
      return { ...(fixed ?? {}), ...(data ?? {}) };
    };
    return {
      info: (message, data) => this.info(prefix ? `${prefix}: ${message}` : message, merge(data)),
      warn: (message, data) => this.warn(prefix ? `${prefix}: ${message}` : message, merge(data)),
      error: (message, data) => this.error(prefix ? `${prefix}: ${message}` : message, merge(data)),
    };
  }

  info(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "info", message, data });
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "warn", message, data });
  }

  error(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "error", message, data });
  }

  /** Очистить лог (только в памяти). */
  clear() {
    this.entries = [];
    this.emit();
  }

  private push(e: LogEntry) {
    const safe = this.sanitizeEntry(e);
    this.entries.push(safe);
    this.trim();
    for (const sink of this.sinks) sink(safe);
    this.emit();
  }

  private trim() {
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);
  }

  private emit() {
    for (const cb of this.listeners) cb();
  }

  private sanitizeEntry(e: LogEntry): LogEntry {
    const data = e.data ? this.sanitizeUnknown(e.data, 0) : undefined;
    return {
      ...e,
      message: this.sanitizeString(e.message),
      data: isPlainRecord(data) ? data : undefined,
    };
  }

  private sanitizeString(s: string): string {
    const raw = String(s ?? "");
    const maybeUrl = /^(?:https?|wss?):\/\//.test(raw);
    const step1 = maybeUrl ? redactUrlForLog(raw) : raw;
    const out = shortenHomePathsForLog(redactSecretsInStringForLog(step1), this.homeDir);
    if (out.length > MAX_STRING_CHARS) return out.slice(0, MAX_STRING_CHARS) + "...[truncated]";
    return out;
  }

  private sanitizeUnknown(v: unknown, depth: number): unknown {
    if (depth > 6) return "[truncated]";
    if (v == null) return v;

    if (typeof v === "string") return this.sanitizeString(v);
    if (typeof v === "number" || typeof v === "boolean") return v;

    // Для Error достаём stack/cause, но санитизируем строки.
    if (v instanceof Error) {
      return {
        name: this.sanitizeString(v.name || "Error"),
        message: this.sanitizeString(v.message),
        stack: v.stack ? this.sanitizeString(v.stack) : undefined,
        cause: v.cause != null ? this.sanitizeUnknown(v.cause, depth + 1) : undefined,
      };
    }

    if (Array.isArray(v)) {
      const out = v.slice(0, MAX_ARRAY_ITEMS).map((x) => this.sanitizeUnknown(x, depth + 1));
      if (v.length > MAX_ARRAY_ITEMS) out.push("[truncated]");
      return out;
    }

    if (isPlainRecord(v)) {
      const out: Record<string, unknown> = {};
      const keys = Object.keys(v);
      for (const k of keys.slice(0, MAX_OBJECT_KEYS)) {
        const val = v[k];
        if (typeof val === "string" && isSensitiveKey(k)) {
          out[k] = "***";
          continue;
        }
        out[k] = this.sanitizeUnknown(val, depth + 1);
      }
      if (keys.length > MAX_OBJECT_KEYS) out["[truncated]"] = `${keys.length - MAX_OBJECT_KEYS} keys`;
      return out;
    }

    return this.sanitizeString(String(v));
  }
}

function isPlainRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isSensitiveKey(k: string): boolean {
  // Согласовано с `src/log/redact.ts` (SENSITIVE_KEYS).
  return /^(token|access_token|password|pass|secret|api[_-]?key|key)$/i.test(String(k ?? ""));
}
