import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic, type DiagnosticCode, type DiagnosticParams } from "./codes";
import type { Span } from "../core/reader/source";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/** A syntax failure carrying one coded diagnostic at `span`. */
export function syntaxError(
  reason: FailureReason,
  code: DiagnosticCode,
  params: DiagnosticParams,
  span?: Span
): Fail {
  const diag = makeDiagnostic(code, params, span);
  const meta: OutcomeMeta = span ? { span } : {};
  return fail(
    failure(reason, diag.message, {
      diagnostics: [diag],
      // a REPL can keep reading after a bad line
      recoverable: reason !== "reader/OutOfMemory",
    }),
    meta
  );
}

export function invalidConfig(errors: string[]): Fail {
  return fail(
    failure("invalid-config", `Invalid configuration: ${errors.join("; ")}`, {
      context: { errors },
      recoverable: false,
    })
  );
}
