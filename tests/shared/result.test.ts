import { describe, expect, it } from "vitest";
import { err, isErr, isOk, ok, type AppErrorDto, type Result } from "../../src/shared/result";

describe("shared/result", () => {
  it("ok(): возвращает ok=true и value", () => {
    const r = ok("stealth-20240305_143007.m4a");
    expect(r.ok).toBe(true);
    if (!r.ok) throw new Error("expected ok");
    expect(r.value).toBe("stealth-20240305_143007.m4a");
  });

  it("err(): возвращает ok=false и error с cause/details", () => {
    const e: AppErrorDto = { code: "E_RECORDING_CONFIG", message: "boom", cause: "no ffmpeg", details: { attempt: 1 } };
    const r = err<string>(e);
    expect(r.ok).toBe(false);
    if (r.ok) throw new Error("expected err");
    expect(r.error).toEqual(e);
  });

  it("type guards isOk/isErr работают", () => {
    const a: Result<boolean> = ok(true);
    const b: Result<boolean> = err({ code: "E_DAEMON_UNAVAILABLE", message: "t" });

    expect(isOk(a)).toBe(true);
    expect(isErr(a)).toBe(false);
    expect(isOk(b)).toBe(false);
    expect(isErr(b)).toBe(true);
  });
});
