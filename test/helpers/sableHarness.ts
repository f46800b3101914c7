// test/helpers/sableHarness.ts
// Compile-and-run helpers shared by the compiler, VM and CLI specs

import { compileSource, type CompileSourceOptions } from "../../src/core/compiler/pipeline";
import { execute, type VMOptions } from "../../src/core/compiler/vm";
import { unwrap } from "../../src/outcome/matchers";
import type { Outcome, Fail } from "../../src/outcome/outcome";
import type { VMResult } from "../../src/core/compiler/types";

export type RunReport = {
  lines: string[];
  outcome: Outcome<VMResult>;
};

/** Artifact bytes for `src`; throws if it does not compile. */
export function bytesOf(src: string, options: CompileSourceOptions = {}): Uint8Array {
  return unwrap(compileSource(src, options)).bytes;
}

/** Compile and run `src`, collecting every written line. */
export function runSable(src: string, options: VMOptions = {}): RunReport {
  const lines: string[] = [];
  const outcome = execute(bytesOf(src), { ...options, output: line => lines.push(line) });
  return { lines, outcome };
}

/** Lines written by `src`; throws if it fails anywhere. */
export function outputOf(src: string, options: VMOptions = {}): string[] {
  const { lines, outcome } = runSable(src, options);
  unwrap(outcome);
  return lines;
}

export function failureOf<A>(outcome: Outcome<A>): Fail {
  if (outcome.tag !== "Fail") {
    throw new Error(`expected a failure, got ${JSON.stringify(outcome.value)}`);
  }
  return outcome;
}

/** Code of the first diagnostic attached to a failure. */
export function codeOf<A>(outcome: Outcome<A>): string | undefined {
  return failureOf(outcome).failure.diagnostics[0]?.code;
}

/** Artifact bytes with `extra` appended. */
export function withBytes(bytes: Uint8Array, ...extra: number[]): Uint8Array {
  const out = new Uint8Array(bytes.length + extra.length);
  out.set(bytes);
  out.set(extra, bytes.length);
  return out;
}
