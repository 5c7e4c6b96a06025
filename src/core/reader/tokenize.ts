// src/core/reader/tokenize.ts
// Single forward scan over UTF-8 bytes producing token spans.
//
// Each scanner looks at the byte at `pos` and returns the end offset of the
// token it recognises there, or null when the token class does not start at
// `pos`. Scanners never move past the buffer end.

import type { SourceBuffer } from "./source";
import type { Token } from "./token";
import { CH, isAtomByte, isSpecial, isWhitespace } from "./token";
import { ReaderError, guardResources } from "./errors";

/**
 * `line` ends a comment before the next newline; `buffer` lets it run to the
 * end of the input.
 */
export type CommentMode = "line" | "buffer";

export interface TokenizeOptions {
  commentMode?: CommentMode;
}

export function skipWhitespace(buf: SourceBuffer, pos: number): number {
  while (pos < buf.length && isWhitespace(buf[pos])) pos++;
  return pos;
}

/** `~@`, the only two-byte token. */
export function scanMarker(buf: SourceBuffer, pos: number): number | null {
  return buf[pos] === CH.TILDE && buf[pos + 1] === CH.AT ? pos + 2 : null;
}

export function scanSpecial(buf: SourceBuffer, pos: number): number | null {
  return pos < buf.length && isSpecial(buf[pos]) ? pos + 1 : null;
}

/**
 * A backslash consumes the byte after it, so neither `\"` nor `\\` can close
 * the literal. The token spans both quotes.
 */
export function scanString(buf: SourceBuffer, pos: number): number | null {
  if (buf[pos] !== CH.DQUOTE) return null;
  let i = pos + 1;
  while (i < buf.length) {
    const b = buf[i];
    if (b === CH.BACKSLASH) {
      i += 2;
      continue;
    }
    if (b === CH.DQUOTE) return i + 1;
    i++;
  }
  throw new ReaderError("UnterminatedString", pos);
}

export function scanComment(buf: SourceBuffer, pos: number, mode: CommentMode = "line"): number | null {
  if (buf[pos] !== CH.SEMICOLON) return null;
  if (mode === "buffer") return buf.length;
  const nl = buf.indexOf(CH.LF, pos);
  return nl < 0 ? buf.length : nl;
}

export function scanAtom(buf: SourceBuffer, pos: number): number | null {
  if (pos >= buf.length || !isAtomByte(buf[pos])) return null;
  let i = pos + 1;
  while (i < buf.length && isAtomByte(buf[i])) i++;
  return i;
}

export function tokenize(buf: SourceBuffer, options: TokenizeOptions = {}): Token[] {
  const mode = options.commentMode ?? "line";
  const tokens: Token[] = [];
  let pos = 0;

  return guardResources(() => pos, () => {
    while (true) {
      pos = skipWhitespace(buf, pos);
      if (pos >= buf.length) break;

      const end =
        scanMarker(buf, pos) ??
        scanSpecial(buf, pos) ??
        scanString(buf, pos) ??
        scanComment(buf, pos, mode) ??
        scanAtom(buf, pos);

      if (end === null) {
        // no token class starts here
        pos++;
        continue;
      }
      tokens.push({ start: pos, end });
      pos = end;
    }
    return tokens;
  });
}
