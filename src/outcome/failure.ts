import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "reader/UnterminatedString"
  | "reader/UnexpectedEof"
  | "reader/UnbalancedClose"
  | "reader/MismatchedBracket"
  | "reader/NoForm"
  | "reader/OutOfMemory"
  | "io-error"
  | "invalid-config"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
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
  if (opts?.cause) f.cause = opts.cause;
  return f;
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}
