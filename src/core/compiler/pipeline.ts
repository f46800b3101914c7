// src/core/compiler/pipeline.ts
// Source text -> tokens -> AST -> instructions -> artifact bytes, with pass records

import type { Outcome } from "../../outcome/outcome";
import { done } from "../../outcome/constructors";
import { tokenize } from "../reader/tokenize";
import { parse } from "../reader/parse";
import { compile, countInstructions } from "./bytecode";
import { encodeProgram } from "./codec";
import { buildSourceMap } from "./sourcemap";
import { execute, type VMOptions } from "./vm";
import type { CompiledUnit, SourceMap, VMResult } from "./types";

// ─────────────────────────────────────────────────────────────────
// Pass Records
// ─────────────────────────────────────────────────────────────────

export type PassName = "tokenize" | "parse" | "compile" | "encode";

export type PassRecord = {
  name: PassName;
  durationMs: number;
  metrics: Record<string, number>;
};

export type CompilationResult = {
  /** Encoded artifact */
  bytes: Uint8Array;
  unit: CompiledUnit;
  sourceMap: SourceMap;
  passes: PassRecord[];
};

export type CompileSourceOptions = {
  /** File name recorded in spans and the source map */
  file?: string;
  libraries?: readonly string[];
};

function timed<A>(passes: PassRecord[], name: PassName, fn: () => A, metrics: (a: A) => Record<string, number>): A {
  const start = performance.now();
  const result = fn();
  passes.push({ name, durationMs: performance.now() - start, metrics: metrics(result) });
  return result;
}

// ─────────────────────────────────────────────────────────────────
// Compiler Pipeline
// ─────────────────────────────────────────────────────────────────

/**
 * Compile source text to an artifact. The first failing pass ends the
 * pipeline and its failure is returned unchanged.
 */
export function compileSource(text: string, options: CompileSourceOptions = {}): Outcome<CompilationResult> {
  const { file } = options;
  const passes: PassRecord[] = [];

  const tokens = timed(passes, "tokenize", () => tokenize(text, file), (o): Record<string, number> =>
    o.tag === "Done" ? { tokens: o.value.length } : {}
  );
  if (tokens.tag === "Fail") return tokens;

  const program = timed(passes, "parse", () => parse(tokens.value, file), (o): Record<string, number> =>
    o.tag === "Done" ? { statements: o.value.statements.length } : {}
  );
  if (program.tag === "Fail") return program;

  const unit = timed(
    passes,
    "compile",
    () => compile(program.value, options.libraries ? { file, libraries: options.libraries } : { file }),
    (o): Record<string, number> => (o.tag === "Done" ? { instructions: countInstructions(o.value.code), symbols: o.value.symbols.length } : {})
  );
  if (unit.tag === "Fail") return unit;

  const bytes = timed(passes, "encode", () => encodeProgram(unit.value.code), b => ({ bytes: b.length }));

  return done({
    bytes,
    unit: unit.value,
    sourceMap: buildSourceMap(unit.value.code, unit.value.spans, file),
    passes,
  });
}

/**
 * Compile and execute source text in one go.
 */
export function runSource(
  text: string,
  options: CompileSourceOptions & VMOptions = {}
): Outcome<VMResult> {
  const compiled = compileSource(text, options);
  if (compiled.tag === "Fail") return compiled;
  return execute(compiled.value.bytes, options);
}
