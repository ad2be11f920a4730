import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RecordingsRepository } from "../../src/recording/recordingsRepository";
import { makeLog } from "../stubs/recordingFakes";

describe("RecordingsRepository", () => {
  let root = "";

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "stealth-rec-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("ensureDir создаёт вложенную папку, pathOf собирает путь", async () => {
    const dir = path.join(root, "a", "b");
    const repo = new RecordingsRepository({ getDir: () => dir, log: makeLog() });

    await repo.ensureDir();
    await repo.ensureDir();

    expect((await fs.stat(dir)).isDirectory()).toBe(true);
    expect(repo.pathOf("stealth-20240305_143007.m4a")).toBe(path.join(dir, "stealth-20240305_143007.m4a"));
  });

  it("exists", async () => {
    const repo = new RecordingsRepository({ getDir: () => root, log: makeLog() });
    await fs.writeFile(path.join(root, "stealth-20240305_143007.m4a"), "");

    expect(await repo.exists("stealth-20240305_143007.m4a")).toBe(true);
    expect(await repo.exists("stealth-20240305_143008.m4a")).toBe(false);
  });

  it("list: только .m4a файлы (без учёта регистра), с размером и датой", async () => {
    const repo = new RecordingsRepository({ getDir: () => root, log: makeLog() });
    await fs.writeFile(path.join(root, "stealth-20240305_143007.m4a"), "abcd");
    await fs.writeFile(path.join(root, "IMPORTED.M4A"), "xy");
    await fs.writeFile(path.join(root, "notes.txt"), "n");
    await fs.mkdir(path.join(root, "folder.m4a"));

    const r = await repo.list();
    expect(r.ok).toBe(true);
    if (!r.ok) throw new Error("expected ok");

    const byName = new Map(r.value.map((f) => [f.name, f]));
    expect([...byName.keys()].sort()).toEqual(["IMPORTED.M4A", "stealth-20240305_143007.m4a"]);
    const f = byName.get("stealth-20240305_143007.m4a");
    expect(f?.size).toBe(4);
    expect(f?.path).toBe(path.join(root, "stealth-20240305_143007.m4a"));
    expect(Number.isNaN(Date.parse(f?.date ?? ""))).toBe(false);
  });

  it("list: пустая папка → ok([])", async () => {
    const repo = new RecordingsRepository({ getDir: () => root, log: makeLog() });
    expect(await repo.list()).toEqual({ ok: true, value: [] });
  });

  it("list: нет папки → err(E_FS_IO)", async () => {
    const dir = path.join(root, "missing");
    const repo = new RecordingsRepository({ getDir: () => dir, log: makeLog() });

    const r = await repo.list();
    expect(r.ok).toBe(false);
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_FS_IO");
    expect(r.error.message).toBe("Не удалось прочитать папку записей");
    expect(r.error.details).toEqual({ dir });
  });

  it("папка берётся из getDir на каждый вызов", async () => {
    let dir = path.join(root, "one");
    const repo = new RecordingsRepository({ getDir: () => dir, log: makeLog() });
    expect(repo.pathOf("x.m4a")).toBe(path.join(root, "one", "x.m4a"));
    dir = path.join(root, "two");
    expect(repo.pathOf("x.m4a")).toBe(path.join(root, "two", "x.m4a"));
  });
});
