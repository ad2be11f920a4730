import { describe, expect, it } from "vitest";
import {
  buildPulseMicCandidates,
  parseInputSourcesFromListShortSources,
  parsePactlDefaultSourceFromInfo,
  parsePactlListShortRows,
} from "../../src/domain/policies/pactl";

describe("domain/policies/pactl", () => {
  it("parses Default Source from pactl info", () => {
    const info = "Server Name: test-server\nDefault Sink: sinkA\nDefault Source: srcB\n";
    expect(parsePactlDefaultSourceFromInfo(info)).toBe("srcB");
    expect(parsePactlDefaultSourceFromInfo("Server Name: test-server\n")).toBe("");
  });

  it("splits list short rows by whitespace and drops blank lines", () => {
    expect(parsePactlListShortRows("1\tmicA\tmodule\n\n  2 micB  module  \n")).toEqual([
      ["1", "micA", "module"],
      ["2", "micB", "module"],
    ]);
  });

  it("input sources skip monitors", () => {
    const sources = ["1\tsinkA.monitor\tmodule\tRUNNING", "2\tmicA\tmodule\tIDLE", "3\tmicB\tmodule\tSUSPENDED"].join("\n");
    expect(parseInputSourcesFromListShortSources(sources)).toEqual(["micA", "micB"]);
    expect(parseInputSourcesFromListShortSources("1\tsinkA.monitor\tmodule\tRUNNING\n")).toEqual([]);
  });

  it("builds mic candidates from default source + aliases", () => {
    expect(buildPulseMicCandidates({ defaultSourceFromInfo: "srcX" })).toEqual(["srcX", "@DEFAULT_SOURCE@", "default"]);
  });

  it("monitor default source is not a mic candidate", () => {
    expect(buildPulseMicCandidates({ defaultSourceFromInfo: "sinkA.monitor" })).toEqual(["@DEFAULT_SOURCE@", "default"]);
    expect(buildPulseMicCandidates({})).toEqual(["@DEFAULT_SOURCE@", "default"]);
  });

  it("dedupes when default source is an alias", () => {
    expect(buildPulseMicCandidates({ defaultSourceFromInfo: "default" })).toEqual(["default", "@DEFAULT_SOURCE@"]);
  });
});
