import type { Span } from "../core/span";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
import type { FailureReason } from "./failure";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  reason: FailureReason;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Lexical", reason: "lexical-error", template: "Unexpected character '{char}'" },
  E0002: { code: "E0002", severity: "error", category: "Lexical", reason: "lexical-error", template: "Unterminated string literal" },

  E0010: { code: "E0010", severity: "error", category: "Syntax", reason: "syntax-error", template: "Expected {expected}, found {found}" },
  E0011: { code: "E0011", severity: "error", category: "Syntax", reason: "syntax-error", template: "Unexpected {found}" },
  E0012: { code: "E0012", severity: "error", category: "Syntax", reason: "syntax-error", template: "Nesting deeper than {limit} levels" },

  E0100: { code: "E0100", severity: "error", category: "Type", reason: "type-error", template: "Type mismatch: cannot apply '{op}' to {left} and {right}" },
  E0101: { code: "E0101", severity: "error", category: "Reference", reason: "reference-error", template: "Undefined variable: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Arity", reason: "arity-error", template: "Wrong number of arguments to {name}: expected {expected}, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Reference", reason: "reference-error", template: "Undefined function: {name}" },
  E0104: { code: "E0104", severity: "error", category: "Type", reason: "type-error", template: "Callee must be a function name, got {actual}" },

  E0200: { code: "E0200", severity: "error", category: "Artifact", reason: "artifact-error", template: "Stack underflow in {op}" },
  E0201: { code: "E0201", severity: "error", category: "Artifact", reason: "artifact-error", template: "Unknown opcode {tag}" },
  E0202: { code: "E0202", severity: "error", category: "Artifact", reason: "artifact-error", template: "Truncated {op} instruction" },
  E0203: { code: "E0203", severity: "error", category: "Artifact", reason: "artifact-error", template: "Not a bytecode artifact (bad magic number)" },
  E0204: { code: "E0204", severity: "error", category: "Artifact", reason: "artifact-error", template: "Unsupported artifact version {version}" },
  E0205: { code: "E0205", severity: "error", category: "Artifact", reason: "artifact-error", template: "Artifact ends without Halt" },
  E0206: { code: "E0206", severity: "error", category: "Artifact", reason: "artifact-error", template: "Malformed function {name}: {detail}" },
  E0207: { code: "E0207", severity: "error", category: "Limit", reason: "budget-exceeded", template: "{resource} limit of {limit} exceeded" },
  E0208: { code: "E0208", severity: "error", category: "Artifact", reason: "artifact-error", template: "Return outside of a function" },

  E0300: { code: "E0300", severity: "error", category: "Compile", reason: "compile-error", template: "Unsupported construct: {construct}" },
  E0301: { code: "E0301", severity: "error", category: "Compile", reason: "compile-error", template: "Unknown library: {name}" },
  E0302: { code: "E0302", severity: "error", category: "Compile", reason: "compile-error", template: "Duplicate parameter {name} in function {fn}" },

  E0400: { code: "E0400", severity: "error", category: "Validation", reason: "validation-failed", template: "Invalid configuration value for {field}: {detail}" },
  E0500: { code: "E0500", severity: "error", category: "IO", reason: "io-error", template: "Cannot access {path}: {detail}" },

  W0001: { code: "W0001", severity: "warning", category: "Artifact", reason: "artifact-error", template: "{count} trailing bytes after Halt ignored" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function diagnosticReason(code: DiagnosticCode): FailureReason {
  return DIAGNOSTIC_CODES[code].reason;
}

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const diag: Diagnostic = {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
  if (span) {
    diag.span = span;
  }
  return diag;
}
