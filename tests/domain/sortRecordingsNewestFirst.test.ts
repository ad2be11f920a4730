import { describe, expect, it } from "vitest";
import { sortRecordingsNewestFirst } from "../../src/domain/policies/sortRecordingsNewestFirst";

describe("domain/policies/sortRecordingsNewestFirst", () => {
  it("сортирует по дате по убыванию и не мутирует вход", () => {
    const items = [
      { name: "a", date: "2024-01-01T00:00:00.000Z" },
      { name: "b", date: "2024-03-01T00:00:00.000Z" },
      { name: "c", date: "2024-02-01T00:00:00.000Z" },
    ];
    expect(sortRecordingsNewestFirst(items).map((x) => x.name)).toEqual(["b", "c", "a"]);
    expect(items.map((x) => x.name)).toEqual(["a", "b", "c"]);
  });

  it("одинаковые даты, по имени по убыванию", () => {
    const d = "2024-01-01T00:00:00.000Z";
    const out = sortRecordingsNewestFirst([
      { name: "stealth-1.m4a", date: d },
      { name: "stealth-3.m4a", date: d },
      { name: "stealth-2.m4a", date: d },
    ]);
    expect(out.map((x) => x.name)).toEqual(["stealth-3.m4a", "stealth-2.m4a", "stealth-1.m4a"]);
  });

  it("сравнивает моменты времени, а не строки (разные зоны)", () => {
    const out = sortRecordingsNewestFirst([
      { name: "x", date: "2024-01-01T10:00:00+03:00" },
      { name: "y", date: "2024-01-01T08:30:00Z" },
    ]);
    expect(out.map((i) => i.name)).toEqual(["y", "x"]);
  });

  it("невалидные даты в конце", () => {
    const out = sortRecordingsNewestFirst([
      { name: "bad", date: "not-a-date" },
      { name: "ok", date: "2024-01-01T00:00:00.000Z" },
    ]);
    expect(out.map((x) => x.name)).toEqual(["ok", "bad"]);
  });
});
