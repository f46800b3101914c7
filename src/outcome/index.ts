// src/outcome/index.ts
// Outcome ADT, failures and diagnostics

export { type Outcome, type Done, type Fail, type OutcomeMeta, isDone } from "./outcome";
export { type Failure, type FailureReason, failure } from "./failure";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode, makeDiagnostic, diagnosticReason } from "./codes";
export {
  done,
  fail,
  diagnosticFail,
  budgetExceeded,
  validationFailed,
  ioFailed,
  type FailureLocation,
} from "./constructors";
export { unwrap } from "./matchers";
export { renderDiagnostic, renderFailure, type SourceText } from "./render";
