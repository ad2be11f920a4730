import { describe, expect, it } from "vitest";
import {
  ControlRequestIdSchema,
  ControlRequestSchema,
  ControlResponseSchema,
  GestureOutcomeSchema,
  RecorderStatusSchema,
} from "../../src/shared/validation/controlProtocolSchemas";

describe("controlProtocolSchemas", () => {
  it("ControlRequestSchema: принимает все действия", () => {
    const kinds = [
      "recorder.requestPermission",
      "recorder.start",
      "recorder.stop",
      "recorder.isActive",
      "recorder.status",
      "recorder.listFiles",
    ];
    for (const kind of kinds) {
      expect(ControlRequestSchema.safeParse({ id: "r1", ts: 1, action: { kind } }).success).toBe(true);
    }
    expect(
      ControlRequestSchema.safeParse({ id: "r1", ts: 1, action: { kind: "recorder.gesture", action: "start" } }).success,
    ).toBe(true);
  });

  it("ControlRequestSchema: отклоняет неизвестное действие, пустой id и лишние поля", () => {
    expect(ControlRequestSchema.safeParse({ id: "r1", ts: 1, action: { kind: "recorder.delete" } }).success).toBe(false);
    expect(ControlRequestSchema.safeParse({ id: "", ts: 1, action: { kind: "recorder.start" } }).success).toBe(false);
    expect(ControlRequestSchema.safeParse({ id: "r1", ts: 1, action: { kind: "recorder.start" }, x: 1 }).success).toBe(false);
    expect(ControlRequestSchema.safeParse({ id: "r1", ts: 1, action: { kind: "recorder.gesture" } }).success).toBe(false);
  });

  it("ControlRequestIdSchema: достаёт id из невалидного запроса", () => {
    const r = ControlRequestIdSchema.safeParse({ id: "r7", action: "nope" });
    expect(r.success && r.data.id).toBe("r7");
    expect(ControlRequestIdSchema.safeParse({ action: "nope" }).success).toBe(false);
  });

  it("ControlResponseSchema: ok и ошибка с известным кодом", () => {
    expect(ControlResponseSchema.safeParse({ id: "r1", ok: true, value: 42 }).success).toBe(true);
    expect(
      ControlResponseSchema.safeParse({ id: "r1", ok: false, error: { code: "E_TIMEOUT", message: "долго" } }).success,
    ).toBe(true);
    expect(
      ControlResponseSchema.safeParse({ id: "r1", ok: false, error: { code: "E_WHATEVER", message: "x" } }).success,
    ).toBe(false);
    expect(ControlResponseSchema.safeParse({ id: "r1", ok: false, error: { code: "E_TIMEOUT", message: "" } }).success).toBe(
      false,
    );
  });

  it("RecorderStatusSchema: fileName согласован с active", () => {
    expect(RecorderStatusSchema.safeParse({ active: true, fileName: "a.m4a" }).success).toBe(true);
    expect(RecorderStatusSchema.safeParse({ active: false, fileName: null }).success).toBe(true);
    expect(RecorderStatusSchema.safeParse({ active: false, fileName: "a.m4a" }).success).toBe(false);
  });

  it("GestureOutcomeSchema: failed несёт AppErrorDto", () => {
    expect(
      GestureOutcomeSchema.safeParse({ kind: "failed", error: { code: "E_RECORDING_CONFIG", message: "нет ffmpeg" } }).success,
    ).toBe(true);
    expect(GestureOutcomeSchema.safeParse({ kind: "failed" }).success).toBe(false);
  });
});
