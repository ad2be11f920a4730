import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { LogEntry } from "./logService";

const MS_PER_DAY = 24 * 60 * 60_000;

/**
 * Писатель лога демона в `<logsDir>/<YYYY-MM-DD>.log`.
 *
 * Пишет “батчами” с небольшой задержкой, чтобы не трогать диск на каждую запись.
 * Формат: одна запись = одна строка.
 */
export class LogFileWriter {
  private readonly enabled: boolean;
  private logsDirPath: string;
  private retentionDays: number;
  private flushDelayMs: number;
  private flushTimer?: ReturnType<typeof setTimeout>;
  private pending: LogEntry[] = [];
  private flushChain: Promise<void> = Promise.resolve();

  constructor(params: { logsDirPath: string; enabled?: boolean; retentionDays?: number; flushDelayMs?: number }) {
    this.logsDirPath = params.logsDirPath;
    this.enabled = params.enabled ?? true;
    this.retentionDays = normalizeRetentionDays(params.retentionDays ?? 7);
    this.flushDelayMs = Math.max(0, params.flushDelayMs ?? 500);
  }

  /** Настроить срок хранения лог‑файлов (в днях). */
  async setRetentionDays(retentionDays: number): Promise<void> {
    this.retentionDays = normalizeRetentionDays(retentionDays);
    await this.cleanupOldLogFiles();
  }

  /** Поставить запись в очередь на запись в файл лога. */
  enqueue(entry: LogEntry) {
    if (!this.enabled) return;
    if (!this.logsDirPath) return;

    this.pending.push(entry);
    if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = undefined;
        this.flush().catch((e: unknown) => {
          // Логировать некуда (это и есть лог), остаётся stderr.
          process.stderr.write(`[log] не удалось записать лог: ${String(e)}\n`);
        });
      }, this.flushDelayMs);
      // Таймер лога не должен держать процесс (CLI-команды завершаются сами).
      this.flushTimer.unref?.();
    }
  }

  /** Записать накопленное. Вызовы сериализуются, чтобы строки не перемешивались. */
  async flush(): Promise<void> {
    const next = this.flushChain.then(() => this.flushPending());
    this.flushChain = next.catch(() => undefined);
    await next;
  }

  /** Остановить таймер и дописать хвост (при завершении демона). */
  async close(): Promise<void> {
    if (this.flushTimer) clearTimeout(this.flushTimer);
    this.flushTimer = undefined;
    await this.flush();
  }

  /**
   * Очистить старые лог‑файлы согласно `retentionDays`.
   *
   * Правило: храним `retentionDays` дней, включая сегодняшний.
   * Пример: retentionDays=7 → оставляем сегодня + последние 6 дней, всё старше удаляем.
   */
  async cleanupOldLogFiles(nowMs: number = Date.now()): Promise<void> {
    if (!this.logsDirPath) return;
    const keepDays = this.retentionDays;

    let files: string[];
    try {
      files = await fs.readdir(this.logsDirPath);
    } catch {
      // папки ещё нет, удалять нечего
      return;
    }

    const nowUtcMidnight = utcMidnightMs(nowMs);
    for (const name of files) {
      const m = /^(\d{4})-(\d{2})-(\d{2})\.log$/.exec(name);
      if (!m) continue;
      const fileUtcMidnight = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
      const ageDays = Math.floor((nowUtcMidnight - fileUtcMidnight) / MS_PER_DAY);
      if (ageDays >= keepDays) {
        await fs.rm(path.join(this.logsDirPath, name), { force: true });
      }
    }
  }

  private async flushPending(): Promise<void> {
    if (!this.enabled) {
      this.pending = [];
      return;
    }
    const batch = this.pending;
    this.pending = [];
    if (batch.length === 0) return;

    const folder = this.logsDirPath;
    await fs.mkdir(folder, { recursive: true });

    const byDate = new Map<string, LogEntry[]>();
    for (const e of batch) {
      const d = formatDateYmd(new Date(e.ts));
      const arr = byDate.get(d) ?? [];
      arr.push(e);
      byDate.set(d, arr);
    }

    for (const [ymd, entries] of byDate) {
      const text = entries.map(formatLogLine).join("\n") + "\n";
      await fs.appendFile(path.join(folder, `${ymd}.log`), text, { encoding: "utf-8" });
    }

    await this.cleanupOldLogFiles();
  }
}

function normalizeRetentionDays(v: unknown): number {
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n)) return 7;
  return Math.min(365, Math.max(1, Math.floor(n)));
}

function utcMidnightMs(ts: number): number {
  const d = new Date(ts);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

function formatDateYmd(d: Date): string {
  const y = String(d.getFullYear());
  const m = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

/** Строка лога: `<ISO> <LEVEL> <message> [json data]`. Используется и для файла, и для stderr. */
export function formatLogLine(e: LogEntry): string {
  const tsIso = new Date(e.ts).toISOString();
  const level = e.level.toUpperCase();
  const msg = String(e.message ?? "");
  if (!e.data || Object.keys(e.data).length === 0) return `${tsIso} ${level} ${msg}`;
  try {
    return `${tsIso} ${level} ${msg} ${JSON.stringify(e.data)}`;
  } catch {
    return `${tsIso} ${level} ${msg} [unserializable data]`;
  }
}
