import type { GestureOutcome } from "../../application/recording/gestureUseCase";
import { IDLE_SENTINEL } from "../../application/recording/recordingSessionUseCase";
import type { RecorderStatus, RecordingFileInfo } from "../../types";
import type { AppErrorDto } from "../../shared/result";

export function formatStatus(s: RecorderStatus): string {
  return s.active ? `Идёт запись: ${s.fileName}` : "Запись не идёт";
}

export function formatStartResult(fileName: string): string {
  return `Запись начата: ${fileName}`;
}

export function formatStopResult(value: string): string {
  return value === IDLE_SENTINEL ? "Запись не шла" : `Запись остановлена: ${value}`;
}

/** Размер файла для человека: B / KiB / MiB с одним знаком после запятой. */
export function formatBytes(size: number): string {
  const n = Math.max(0, Math.floor(Number(size) || 0));
  if (n < 1024) return `${n} B`;
  if (n < 1024 * 1024) return `${(n / 1024).toFixed(1)} KiB`;
  return `${(n / (1024 * 1024)).toFixed(1)} MiB`;
}

/** Дата в виде `YYYY-MM-DD HH:mm:ss` (UTC, как в ISO); невалидная остаётся как есть. */
export function formatListDate(iso: string): string {
  const t = Date.parse(iso);
  if (Number.isNaN(t)) return iso;
  return new Date(t).toISOString().slice(0, 19).replace("T", " ");
}

export function formatRecordingList(files: readonly RecordingFileInfo[]): string {
  if (files.length === 0) return "Записей нет";
  return files.map((f) => `${formatListDate(f.date)}  ${formatBytes(f.size).padStart(10)}  ${f.name}`).join("\n");
}

export function formatPermission(granted: boolean): string {
  return granted ? "Доступ к микрофону есть" : "Доступ к микрофону не получен";
}

export function formatGestureOutcome(o: GestureOutcome): string {
  switch (o.kind) {
    case "started":
      return formatStartResult(o.fileName);
    case "stopped":
      return formatStopResult(o.fileName);
    case "idle":
      return formatStopResult(IDLE_SENTINEL);
    case "permission_denied":
      return "Нет доступа к микрофону, запись не начата";
    case "failed":
      return formatAppError(o.error);
    case "ignored":
      return `Неизвестное действие жеста: ${o.action || "(пусто)"}`;
  }
}

export function formatAppError(e: AppErrorDto, opts?: { withCause?: boolean }): string {
  const head = `Ошибка [${e.code}]: ${e.message}`;
  if (!opts?.withCause || !e.cause) return head;
  return `${head}\n${e.cause}`;
}
