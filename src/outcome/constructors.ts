import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic, diagnosticReason, type DiagnosticCode } from "./codes";
import type { Span } from "../core/span";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Where a failure happened: a source span for front-end failures, a byte
 * offset for failures inside an artifact.
 */
export type FailureLocation = { span?: Span; offset?: number };

/**
 * Build a Fail from a registered diagnostic code. The failure reason and the
 * message both come from the code table.
 */
export function diagnosticFail(
  code: DiagnosticCode,
  params: Record<string, string | number> = {},
  where: FailureLocation = {},
  context?: Record<string, unknown>
): Fail {
  const data = where.offset === undefined ? params : { ...params, offset: where.offset };
  const diag = makeDiagnostic(code, data, where.span);
  const meta: OutcomeMeta = {};
  if (where.span) meta.span = where.span;
  if (where.offset !== undefined) meta.offset = where.offset;
  return fail(
    failure(diagnosticReason(code), diag.message, {
      diagnostics: [diag],
      context,
      recoverable: false,
    }),
    meta
  );
}

export function budgetExceeded(resource: string, limit: number, offset?: number): Fail {
  return diagnosticFail("E0207", { resource, limit }, { offset });
}

export function validationFailed(field: string, detail: string): Fail {
  const out = diagnosticFail("E0400", { field, detail }, {}, { field });
  return { ...out, failure: { ...out.failure, recoverable: true } };
}

export function ioFailed(path: string, detail: string): Fail {
  return diagnosticFail("E0500", { path, detail }, {}, { path });
}
