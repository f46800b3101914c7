import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "lexical-error"
  | "syntax-error"
  | "compile-error"
  | "artifact-error"
  | "type-error"
  | "reference-error"
  | "arity-error"
  | "budget-exceeded"
  | "validation-failed"
  | "io-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  /** Set for configuration problems the user can correct and retry */
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  const f: Failure = {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
  };
  if (opts?.context) f.context = opts.context;
  return f;
}
