import { z } from "zod";

import type { ControlAction } from "../../shared/validation/controlProtocolSchemas";
import { GestureOutcomeSchema, RecorderStatusSchema, RecordingFileListSchema } from "../../shared/validation/controlProtocolSchemas";
import { APP_ERROR } from "../../shared/appErrorCodes";
import { err, ok, type AppErrorDto, type Result } from "../../shared/result";
import type { CliCommand } from "./cliArgs";
import {
  formatAppError,
  formatGestureOutcome,
  formatPermission,
  formatRecordingList,
  formatStartResult,
  formatStatus,
  formatStopResult,
} from "./formatters";

export const EXIT_CODE = { OK: 0, ERROR: 1, USAGE: 2 } as const;

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
};

export type ClientCommand = Exclude<CliCommand, { kind: "daemon" } | { kind: "help" } | { kind: "init-config" }>;

function decode<T>(schema: z.ZodType<T>, value: unknown): Result<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return ok(parsed.data);
  return err({ code: APP_ERROR.VALIDATION, message: "Демон прислал неожиданный ответ", cause: parsed.error.message });
}

function actionFor(command: ClientCommand): ControlAction {
  switch (command.kind) {
    case "status":
      return { kind: "recorder.status" };
    case "start":
      return { kind: "recorder.start" };
    case "stop":
      return { kind: "recorder.stop" };
    case "list":
      return { kind: "recorder.listFiles" };
    case "permission":
      return { kind: "recorder.requestPermission" };
    case "gesture":
      return { kind: "recorder.gesture", action: command.action };
  }
}

function render(command: ClientCommand, value: unknown): Result<string> {
  switch (command.kind) {
    case "status": {
      const r = decode(RecorderStatusSchema, value);
      return r.ok ? ok(formatStatus(r.value)) : r;
    }
    case "start": {
      const r = decode(z.string(), value);
      return r.ok ? ok(formatStartResult(r.value)) : r;
    }
    case "stop": {
      const r = decode(z.string(), value);
      return r.ok ? ok(formatStopResult(r.value)) : r;
    }
    case "list": {
      const r = decode(RecordingFileListSchema, value);
      return r.ok ? ok(formatRecordingList(r.value)) : r;
    }
    case "permission": {
      const r = decode(z.boolean(), value);
      return r.ok ? ok(formatPermission(r.value)) : r;
    }
    case "gesture": {
      const r = decode(GestureOutcomeSchema, value);
      if (!r.ok) return r;
      // Проваленный жест печатаем как ошибку: ярлык ОС видит код выхода.
      if (r.value.kind === "failed") return err(r.value.error);
      return ok(formatGestureOutcome(r.value));
    }
  }
}

/**
 * Выполнить команду CLI через канал управления демоном.
 *
 * Возвращает код выхода: 0 при успехе, 1 при ошибке (демон недоступен, запись не началась и т.п.).
 */
export async function runClientCommand(
  command: ClientCommand,
  deps: { request: (action: ControlAction) => Promise<Result<unknown>>; io: CliIo; verbose?: boolean },
): Promise<number> {
  const fail = (e: AppErrorDto) => {
    deps.io.err(formatAppError(e, { withCause: deps.verbose }));
    return EXIT_CODE.ERROR;
  };

  const res = await deps.request(actionFor(command));
  if (!res.ok) return fail(res.error);

  const text = render(command, res.value);
  if (!text.ok) return fail(text.error);
  deps.io.out(text.value);
  return EXIT_CODE.OK;
}
