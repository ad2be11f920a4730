import { z } from "zod";
import type { ErrorCode } from "../result";

// Runtime-валидация канала управления демоном (транспорт-агностично).

export const ControlActionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("recorder.requestPermission") }).strict(),
  z.object({ kind: z.literal("recorder.start") }).strict(),
  z.object({ kind: z.literal("recorder.stop") }).strict(),
  z.object({ kind: z.literal("recorder.isActive") }).strict(),
  z.object({ kind: z.literal("recorder.status") }).strict(),
  z.object({ kind: z.literal("recorder.listFiles") }).strict(),
  z.object({ kind: z.literal("recorder.gesture"), action: z.string() }).strict(),
]);

export type ControlAction = z.infer<typeof ControlActionSchema>;

export const ControlRequestSchema = z
  .object({
    id: z.string().min(1),
    ts: z.number().finite(),
    action: ControlActionSchema,
  })
  .strict();

export type ControlRequest = z.infer<typeof ControlRequestSchema>;

const ERROR_CODES = [
  "E_VALIDATION",
  "E_NOT_FOUND",
  "E_SETTINGS",
  "E_FS_IO",
  "E_RECORDING_CONFIG",
  "E_RECORDING_BACKEND",
  "E_DAEMON_UNAVAILABLE",
  "E_TIMEOUT",
  "E_INTERNAL",
] as const satisfies readonly ErrorCode[];

export const AppErrorDtoSchema = z
  .object({
    code: z.enum(ERROR_CODES),
    message: z.string().min(1),
    cause: z.string().optional(),
    details: z.record(z.unknown()).optional(),
  })
  .strict();

export const ControlResponseSchema = z.discriminatedUnion("ok", [
  z.object({ id: z.string().min(1), ok: z.literal(true), value: z.unknown() }).strict(),
  z.object({ id: z.string().min(1), ok: z.literal(false), error: AppErrorDtoSchema }).strict(),
]);

export type ControlResponse = z.infer<typeof ControlResponseSchema>;

/** Достаём `id` из сообщения, которое не прошло схему: чтобы ответить E_VALIDATION, а не молчать. */
export const ControlRequestIdSchema = z.object({ id: z.string().min(1) }).passthrough();

// Значения ответов (клиент проверяет их перед печатью).

export const RecorderStatusSchema = z.discriminatedUnion("active", [
  z.object({ active: z.literal(true), fileName: z.string() }).strict(),
  z.object({ active: z.literal(false), fileName: z.null() }).strict(),
]);

export const RecordingFileInfoSchema = z
  .object({
    name: z.string(),
    path: z.string(),
    size: z.number().nonnegative(),
    date: z.string(),
  })
  .strict();

export const RecordingFileListSchema = z.array(RecordingFileInfoSchema);

export const GestureOutcomeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("started"), fileName: z.string() }).strict(),
  z.object({ kind: z.literal("stopped"), fileName: z.string() }).strict(),
  z.object({ kind: z.literal("idle") }).strict(),
  z.object({ kind: z.literal("permission_denied") }).strict(),
  z.object({ kind: z.literal("failed"), error: AppErrorDtoSchema }).strict(),
  z.object({ kind: z.literal("ignored"), action: z.string() }).strict(),
]);
