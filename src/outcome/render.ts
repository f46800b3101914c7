// src/outcome/render.ts
// Human-readable rendering of diagnostics against their source text.

import type { Diagnostic } from "./diagnostic";
import type { Failure } from "./failure";

export type SourceText = {
  text: string;
  file?: string;
};

function sourceLine(text: string, line: number): string | undefined {
  const lines = text.split("\n");
  const raw = lines[line - 1];
  return raw === undefined ? undefined : raw.replace(/\r$/, "");
}

/**
 * Render one diagnostic:
 *
 *   error[E0101]: Undefined variable: z
 *    --> main.sable:3:7
 *     |
 *   3 | write z;
 *     |       ^
 */
export function renderDiagnostic(diag: Diagnostic, source?: SourceText): string {
  const out = [`${diag.severity}[${diag.code}]: ${diag.message}`];
  const s = diag.span;
  if (!s) {
    const offset = diag.data?.offset;
    if (typeof offset === "number") {
      out.push(` --> ${source?.file ?? "<artifact>"} @ byte ${offset}`);
    }
    return out.join("\n");
  }

  const file = s.file ?? source?.file ?? "<input>";
  out.push(` --> ${file}:${s.line}:${s.column}`);

  const lineText = source ? sourceLine(source.text, s.line) : undefined;
  if (lineText === undefined) {
    return out.join("\n");
  }

  const gutter = " ".repeat(String(s.line).length);
  const lineChars = Array.from(lineText);
  const start = Math.min(Math.max(s.column - 1, 0), lineChars.length);
  const width = Math.max(1, Math.min(s.length, lineChars.length - start));
  out.push(`${gutter} |`);
  out.push(`${s.line} | ${lineText}`);
  out.push(`${gutter} | ${" ".repeat(start)}${"^".repeat(width)}`);
  return out.join("\n");
}

export function renderFailure(f: Failure, source?: SourceText): string {
  if (f.diagnostics.length === 0) {
    return `error: ${f.message}`;
  }
  return f.diagnostics.map(d => renderDiagnostic(d, source)).join("\n\n");
}
