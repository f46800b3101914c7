// src/core/compiler/sourcemap.ts
// Artifact byte offset -> source span

import type { Span } from "../span";
import type { Outcome } from "../../outcome/outcome";
import { done, validationFailed } from "../../outcome/constructors";
import { codeSize, encodedSize } from "./codec";
import { HEADER_SIZE, type Instr, type SourceMap, type SourceMapEntry } from "./types";

/**
 * Walk `code` in encoding order and record the span of every instruction
 * the compiler attributed one to.
 */
export function buildSourceMap(code: readonly Instr[], spans: ReadonlyMap<Instr, Span>, file?: string): SourceMap {
  const entries: SourceMapEntry[] = [];

  const visit = (seq: readonly Instr[], start: number): void => {
    let offset = start;
    for (const instr of seq) {
      const s = spans.get(instr);
      if (s) {
        entries.push({ offset, line: s.line, column: s.column, length: s.length });
      }
      if (instr.op === "Func") {
        visit(instr.body, offset + encodedSize(instr) - codeSize(instr.body));
      }
      offset += encodedSize(instr);
    }
  };

  visit(code, HEADER_SIZE);
  entries.sort((a, b) => a.offset - b.offset);
  return file === undefined ? { version: 1, entries } : { version: 1, file, entries };
}

/**
 * Span of the instruction starting at `offset`, if the map has one.
 */
export function lookupSpan(map: SourceMap, offset: number): Span | undefined {
  const entry = map.entries.find(e => e.offset === offset);
  if (!entry) return undefined;
  const s: Span = { line: entry.line, column: entry.column, length: entry.length };
  if (map.file !== undefined) s.file = map.file;
  return s;
}

export function serializeSourceMap(map: SourceMap): string {
  return JSON.stringify(map, null, 2);
}

function isEntry(v: unknown): v is SourceMapEntry {
  return (
    typeof v === "object" && v !== null &&
    "offset" in v && typeof v.offset === "number" &&
    "line" in v && typeof v.line === "number" &&
    "column" in v && typeof v.column === "number" &&
    "length" in v && typeof v.length === "number"
  );
}

export function parseSourceMap(text: string): Outcome<SourceMap> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    return validationFailed("sourceMap", e instanceof Error ? e.message : String(e));
  }
  if (
    typeof data !== "object" || data === null ||
    !("version" in data) || data.version !== 1 ||
    !("entries" in data) || !Array.isArray(data.entries)
  ) {
    return validationFailed("sourceMap", "expected { version: 1, entries: [...] }");
  }
  const entries: unknown[] = data.entries;
  if (!entries.every(isEntry)) {
    return validationFailed("sourceMap", "malformed entry");
  }
  const map: SourceMap = { version: 1, entries };
  if ("file" in data && typeof data.file === "string") map.file = data.file;
  return done(map);
}
