import type { AppErrorDto, ErrorCode } from "./result";

/**
 * Typed error для тех мест, где мы используем `throw`, но хотим переносить код ошибки/контекст.
 *
 * Важно: `message` в AppErrorDto безопасно показывать пользователю.
 */
export class AppError extends Error {
  readonly dto: AppErrorDto;

  constructor(dto: AppErrorDto) {
    super(dto.message);
    this.name = "AppError";
    this.dto = dto;
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isAppErrorDto(v: unknown): v is AppErrorDto {
  return isRecord(v) && typeof v.message === "string" && typeof v.code === "string";
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError || (isRecord(e) && e.name === "AppError" && isAppErrorDto(e.dto));
}

export function toAppErrorDto(e: unknown, fallback: { code: ErrorCode; message: string; details?: Record<string, unknown> }): AppErrorDto {
  // В другом realm (worker / vm) `instanceof` не сработает, поэтому поддерживаем структурную проверку на dto.
  if (isAppError(e)) return e.dto;
  if (isRecord(e) && isAppErrorDto(e.dto)) return e.dto;

  const msg = isRecord(e) && typeof e.message === "string" ? e.message : "";
  const stack = isRecord(e) && typeof e.stack === "string" ? e.stack : "";
  const code = isRecord(e) && typeof e.code === "string" ? e.code : "";
  const bits = [msg, code ? `code=${code}` : "", stack].filter(Boolean);
  const cause = bits.length ? bits.join("\n") : String(e ?? "unknown error");

  return { code: fallback.code, message: fallback.message, cause, details: fallback.details };
}
