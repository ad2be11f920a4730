import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_SETTINGS, normalizeSettings, readSettingsFile, writeSettingsFile } from "../src/settingsStore";

describe("normalizeSettings", () => {
  it("пустой ввод → defaults", () => {
    expect(normalizeSettings(undefined)).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it("ввод не по схеме (лишние ключи/типы) → defaults целиком", () => {
    expect(normalizeSettings({ recording: { ffmpegPath: 42 } })).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings({ unknownSection: true })).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings("nope")).toEqual(DEFAULT_SETTINGS);
  });

  it("trim строк и пустые строки → defaults", () => {
    const s = normalizeSettings({ recording: { recordingsDir: "  ~/Rec  ", ffmpegPath: "   ", inputDevice: " hw:1 " } });
    expect(s.recording.recordingsDir).toBe("~/Rec");
    expect(s.recording.ffmpegPath).toBe("ffmpeg");
    expect(s.recording.inputDevice).toBe("hw:1");
  });

  it("часовой пояс имени файла: utc/local без учёта регистра, иначе utc", () => {
    expect(normalizeSettings({}).recording.fileNameTimeZone).toBe("utc");
    expect(normalizeSettings({ recording: { fileNameTimeZone: "Local" } }).recording.fileNameTimeZone).toBe("local");
    expect(normalizeSettings({ recording: { fileNameTimeZone: "Europe/Moscow" } }).recording.fileNameTimeZone).toBe("utc");
  });

  it("control: путь с ведущим '/', числа из строк и зажатие в границы", () => {
    const s = normalizeSettings({ control: { path: "rec", port: "48000", requestTimeoutMs: 10 } });
    expect(s.control.path).toBe("/rec");
    expect(s.control.port).toBe(48000);
    expect(s.control.requestTimeoutMs).toBe(1000);
    expect(normalizeSettings({ control: { port: 70000 } }).control.port).toBe(65535);
    expect(normalizeSettings({ control: { port: "abc" } }).control.port).toBe(47613);
  });

  it("log: лимиты и retention", () => {
    const s = normalizeSettings({ log: { maxEntries: 5, retentionDays: "400" } });
    expect(s.log.maxEntries).toBe(10);
    expect(s.log.retentionDays).toBe(365);
    expect(normalizeSettings({ log: { retentionDays: 2.9 } }).log.retentionDays).toBe(2);
  });

  it("debug.enabled", () => {
    expect(normalizeSettings({ debug: { enabled: true } }).debug.enabled).toBe(true);
  });
});

describe("readSettingsFile / writeSettingsFile", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "stealth-settings-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("нет файла → ok(defaults)", async () => {
    const r = await readSettingsFile(path.join(dir, "settings.json"));
    expect(r).toEqual({ ok: true, value: DEFAULT_SETTINGS });
  });

  it("битый JSON → err(E_SETTINGS)", async () => {
    const file = path.join(dir, "settings.json");
    await fs.writeFile(file, "{ not json", "utf-8");
    const r = await readSettingsFile(file);
    expect(r.ok).toBe(false);
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_SETTINGS");
    expect(r.error.message).toBe("Файл настроек повреждён (невалидный JSON)");
    expect(r.error.details).toEqual({ filePath: file });
  });

  it("write → read возвращает те же настройки (папка создаётся)", async () => {
    const file = path.join(dir, "nested", "settings.json");
    const settings = normalizeSettings({ recording: { fileNameTimeZone: "utc", inputDevice: "micA" }, control: { port: 48001 } });

    await writeSettingsFile(file, settings);
    const text = await fs.readFile(file, "utf-8");
    expect(text.endsWith("}\n")).toBe(true);

    expect(await readSettingsFile(file)).toEqual({ ok: true, value: settings });
  });
});
