// src/index.ts
// lisp-reader - Public API
//
// Tokenizer, parser and printer for a small Lisp-family language.

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/reader";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export { type Outcome, type Done, type Fail, type OutcomeMeta, isDone, isFail } from "./outcome/outcome";
export { type Failure, type FailureReason, failure, isFailureReason, allDiagnostics } from "./outcome/failure";
export { type Diagnostic, type DiagnosticSeverity, formatDiagnostic } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode, makeDiagnostic } from "./outcome/codes";
export { done, fail } from "./outcome/constructors";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
