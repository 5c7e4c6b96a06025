// test/helpers/reader.ts
// Shared helpers for reader specs

import { toSourceBuffer } from "../../src/core/reader/source";
import { tokenize, type TokenizeOptions } from "../../src/core/reader/tokenize";
import { tokenText } from "../../src/core/reader/token";
import { parse, type ParseResult } from "../../src/core/reader/parse";
import { ReaderError } from "../../src/core/reader/errors";

export function tokenTexts(src: string | Uint8Array, options?: TokenizeOptions): string[] {
  const buf = toSourceBuffer(src);
  return tokenize(buf, options).map((t) => tokenText(t, buf));
}

export function parseSource(src: string, start = 0): ParseResult {
  const buf = toSourceBuffer(src);
  return parse(tokenize(buf), buf, start);
}

export function catchReaderError(fn: () => unknown): ReaderError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ReaderError) return e;
    throw e;
  }
  throw new Error("expected a ReaderError");
}
