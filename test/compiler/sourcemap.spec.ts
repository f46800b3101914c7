import { describe, it, expect } from "vitest";
import { buildSourceMap, lookupSpan, parseSourceMap, serializeSourceMap } from "../../src/core/compiler/sourcemap";
import { compileSource } from "../../src/core/compiler/pipeline";
import { unwrap } from "../../src/outcome/matchers";
import { failureOf } from "../helpers/sableHarness";

const mapOf = (src: string, file?: string) => unwrap(compileSource(src, { file })).sourceMap;

describe("source maps", () => {
  it("maps every top-level instruction offset to its span", () => {
    expect(mapOf("let x = 1;\nwrite x;", "m.sable")).toEqual({
      version: 1,
      file: "m.sable",
      entries: [
        { offset: 5, line: 1, column: 9, length: 1 },
        { offset: 14, line: 1, column: 5, length: 1 },
        { offset: 20, line: 2, column: 7, length: 1 },
        { offset: 26, line: 2, column: 1, length: 5 },
        { offset: 27, line: 2, column: 1, length: 5 },
      ],
    });
  });

  it("maps instructions inside function bodies", () => {
    const map = mapOf("def f(a) { a; }");
    expect(map.entries.slice(0, 3)).toEqual([
      { offset: 5, line: 1, column: 5, length: 1 },
      { offset: 24, line: 1, column: 12, length: 1 },
      { offset: 30, line: 1, column: 5, length: 1 },
    ]);
  });

  it("looks up the span at an offset", () => {
    const map = mapOf("let x = 1;\nwrite x;", "m.sable");
    expect(lookupSpan(map, 20)).toEqual({ file: "m.sable", line: 2, column: 7, length: 1 });
    expect(lookupSpan(map, 21)).toBeUndefined();
  });

  it("skips instructions without a span", () => {
    const code = [{ op: "PushNum" as const, value: 1 }, { op: "Halt" as const }];
    expect(buildSourceMap(code, new Map()).entries).toEqual([]);
  });

  it("serializes to JSON and back", () => {
    const map = mapOf("write 1;", "w.sable");
    expect(unwrap(parseSourceMap(serializeSourceMap(map)))).toEqual(map);
  });

  it("rejects malformed maps", () => {
    expect(failureOf(parseSourceMap("{")).failure.reason).toBe("validation-failed");
    expect(failureOf(parseSourceMap('{"version":2,"entries":[]}')).failure.message).toBe(
      "Invalid configuration value for sourceMap: expected { version: 1, entries: [...] }"
    );
    expect(failureOf(parseSourceMap('{"version":1,"entries":[{"offset":1}]}')).failure.message).toBe(
      "Invalid configuration value for sourceMap: malformed entry"
    );
  });
});
