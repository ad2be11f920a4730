import { describe, expect, it, vi } from "vitest";
import { runClientCommand, type ClientCommand } from "../../src/presentation/cli/cliRunner";
import { err, ok, type Result } from "../../src/shared/result";
import type { ControlAction } from "../../src/shared/validation/controlProtocolSchemas";

function setup(response: Result<unknown>) {
  const out: string[] = [];
  const errors: string[] = [];
  const request = vi.fn(async (_action: ControlAction) => response);
  const run = (command: ClientCommand, verbose?: boolean) =>
    runClientCommand(command, { request, io: { out: (t) => out.push(t), err: (t) => errors.push(t) }, verbose });
  return { out, errors, request, run };
}

describe("runClientCommand", () => {
  it("status: печатает состояние, код 0", async () => {
    const { out, request, run } = setup(ok({ active: true, fileName: "stealth-20240305_143007.m4a" }));

    expect(await run({ kind: "status" })).toBe(0);
    expect(request).toHaveBeenCalledWith({ kind: "recorder.status" });
    expect(out).toEqual(["Идёт запись: stealth-20240305_143007.m4a"]);
  });

  it("stop: idle печатается как 'Запись не шла'", async () => {
    const { out, run } = setup(ok("idle"));

    expect(await run({ kind: "stop" })).toBe(0);
    expect(out).toEqual(["Запись не шла"]);
  });

  it("gesture: действие уходит демону", async () => {
    const { out, request, run } = setup(ok({ kind: "started", fileName: "a.m4a" }));

    expect(await run({ kind: "gesture", action: "start" })).toBe(0);
    expect(request).toHaveBeenCalledWith({ kind: "recorder.gesture", action: "start" });
    expect(out).toEqual(["Запись начата: a.m4a"]);
  });

  it("gesture failed → ошибка и код 1", async () => {
    const { out, errors, run } = setup(ok({ kind: "failed", error: { code: "E_RECORDING_CONFIG", message: "нет ffmpeg" } }));

    expect(await run({ kind: "gesture", action: "start" })).toBe(1);
    expect(out).toEqual([]);
    expect(errors).toEqual(["Ошибка [E_RECORDING_CONFIG]: нет ffmpeg"]);
  });

  it("ошибка канала → код 1, cause только с verbose", async () => {
    const e = { code: "E_DAEMON_UNAVAILABLE" as const, message: "Демон записи не запущен", cause: "ECONNREFUSED" };
    const quiet = setup(err(e));
    const loud = setup(err(e));

    expect(await quiet.run({ kind: "start" })).toBe(1);
    expect(await loud.run({ kind: "start" }, true)).toBe(1);
    expect(quiet.errors).toEqual(["Ошибка [E_DAEMON_UNAVAILABLE]: Демон записи не запущен"]);
    expect(loud.errors).toEqual(["Ошибка [E_DAEMON_UNAVAILABLE]: Демон записи не запущен\nECONNREFUSED"]);
  });

  it("неожиданная форма ответа → E_VALIDATION", async () => {
    const { errors, run } = setup(ok({ files: [] }));

    expect(await run({ kind: "list" })).toBe(1);
    expect(errors).toEqual(["Ошибка [E_VALIDATION]: Демон прислал неожиданный ответ"]);
  });

  it("permission: boolean → текст", async () => {
    const { out, request, run } = setup(ok(false));

    expect(await run({ kind: "permission" })).toBe(0);
    expect(request).toHaveBeenCalledWith({ kind: "recorder.requestPermission" });
    expect(out).toEqual(["Доступ к микрофону не получен"]);
  });
});
