// src/core/reader/errors.ts
// Reader error kinds and the error class thrown by tokenize/parse

import { renderTemplate, type DiagnosticCode, type DiagnosticParams } from "../../outcome/codes";

export type ReaderErrorKind =
  | "UnterminatedString"
  | "UnexpectedEof"
  | "UnbalancedClose"
  | "MismatchedBracket"
  | "NoForm"
  | "OutOfMemory";

export const READER_ERROR_CODES: Record<ReaderErrorKind, DiagnosticCode> = {
  UnterminatedString: "E0001",
  UnexpectedEof: "E0002",
  UnbalancedClose: "E0003",
  MismatchedBracket: "E0004",
  NoForm: "E0005",
  OutOfMemory: "E0006",
};

export class ReaderError extends Error {
  constructor(
    public readonly kind: ReaderErrorKind,
    /** Byte offset where the problem was detected. */
    public readonly offset: number,
    public readonly params: DiagnosticParams = {}
  ) {
    super(renderTemplate(READER_ERROR_CODES[kind], params));
    this.name = "ReaderError";
  }

  get code(): DiagnosticCode {
    return READER_ERROR_CODES[this.kind];
  }
}

export function isReaderError(e: unknown): e is ReaderError {
  return e instanceof ReaderError;
}

/**
 * Run `fn`, turning engine allocation/stack exhaustion into `OutOfMemory`.
 * Any other error is rethrown untouched.
 */
export function guardResources<T>(offset: () => number, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof RangeError) {
      throw new ReaderError("OutOfMemory", offset(), { detail: e.message });
    }
    throw e;
  }
}
