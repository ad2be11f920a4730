import { describe, expect, it } from "vitest";
import { parseCliArgs } from "../../src/presentation/cli/cliArgs";

describe("parseCliArgs", () => {
  it("без команды и с --help → help", () => {
    expect(parseCliArgs([])).toEqual({ ok: true, command: { kind: "help" } });
    expect(parseCliArgs(["--help"])).toEqual({ ok: true, command: { kind: "help" } });
    expect(parseCliArgs(["-h"])).toEqual({ ok: true, command: { kind: "help" } });
  });

  it("простые команды, регистр не важен", () => {
    expect(parseCliArgs(["status"])).toEqual({ ok: true, command: { kind: "status" } });
    expect(parseCliArgs(["START"])).toEqual({ ok: true, command: { kind: "start" } });
    expect(parseCliArgs(["init-config"])).toEqual({ ok: true, command: { kind: "init-config" } });
  });

  it("простая команда с аргументом → ошибка", () => {
    expect(parseCliArgs(["stop", "now"])).toEqual({ ok: false, message: "Команда stop не принимает аргументов" });
  });

  it("gesture: действие передаётся как есть", () => {
    expect(parseCliArgs(["gesture", "start"])).toEqual({ ok: true, command: { kind: "gesture", action: "start" } });
    expect(parseCliArgs(["gesture", "wave"])).toEqual({ ok: true, command: { kind: "gesture", action: "wave" } });
    expect(parseCliArgs(["gesture"])).toEqual({ ok: false, message: "Ожидается: gesture <start|stop>" });
  });

  it("open-url: stealthrecorder:// превращается в жест", () => {
    expect(parseCliArgs(["open-url", "stealthrecorder://stop"])).toEqual({
      ok: true,
      command: { kind: "gesture", action: "stop" },
    });
    expect(parseCliArgs(["open-url", "https://example.com/start"])).toEqual({
      ok: false,
      message: "Не ссылка stealthrecorder://: https://example.com/start",
    });
    expect(parseCliArgs(["open-url"])).toEqual({ ok: false, message: "Ожидается: open-url <url>" });
  });

  it("неизвестная команда", () => {
    expect(parseCliArgs(["record"])).toEqual({ ok: false, message: "Неизвестная команда: record" });
  });
});
