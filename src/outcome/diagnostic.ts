import type { Span } from "../core/span";

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Source location, for failures in source text */
  span?: Span;
  /** Template parameters; `offset` places artifact failures */
  data?: Record<string, unknown>;
}
