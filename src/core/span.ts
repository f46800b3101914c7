// src/core/span.ts
// Source locations shared by tokens, AST nodes and diagnostics.

/**
 * A 1-based source location. `length` counts source characters, not bytes.
 */
export interface Span {
  file?: string;
  line: number;
  column: number;
  length: number;
}

export function span(line: number, column: number, length = 1, file?: string): Span {
  return file === undefined ? { line, column, length } : { file, line, column, length };
}

export function formatSpan(s: Span): string {
  return `${s.file ?? "<input>"}:${s.line}:${s.column}`;
}
