// src/core/reader/token.ts
// Tokens are byte spans over the source buffer; they never copy text.

import type { ByteSpan, SourceBuffer } from "./source";
import { decodeBytes } from "./source";

export type Token = ByteSpan;
export type TokenSequence = readonly Token[];

export type TokenKind = "open" | "close" | "macro" | "string" | "comment" | "atom";

export const CH = {
  TAB: 0x09,
  LF: 0x0a,
  CR: 0x0d,
  SPACE: 0x20,
  DQUOTE: 0x22,
  QUOTE: 0x27,
  LPAREN: 0x28,
  RPAREN: 0x29,
  COMMA: 0x2c,
  SEMICOLON: 0x3b,
  AT: 0x40,
  LBRACKET: 0x5b,
  BACKSLASH: 0x5c,
  RBRACKET: 0x5d,
  CARET: 0x5e,
  BACKTICK: 0x60,
  LBRACE: 0x7b,
  RBRACE: 0x7d,
  TILDE: 0x7e,
} as const;

export function isWhitespace(b: number): boolean {
  return b === CH.SPACE || b === CH.COMMA || b === CH.TAB || b === CH.LF || b === CH.CR;
}

export function isOpen(b: number): boolean {
  return b === CH.LPAREN || b === CH.LBRACKET || b === CH.LBRACE;
}

export function isClose(b: number): boolean {
  return b === CH.RPAREN || b === CH.RBRACKET || b === CH.RBRACE;
}

export function isMacroMarker(b: number): boolean {
  return b === CH.QUOTE || b === CH.BACKTICK || b === CH.TILDE || b === CH.CARET || b === CH.AT;
}

export function isSpecial(b: number): boolean {
  return isOpen(b) || isClose(b) || isMacroMarker(b);
}

export function isAtomByte(b: number): boolean {
  return !isWhitespace(b) && !isSpecial(b) && b !== CH.DQUOTE && b !== CH.SEMICOLON;
}

/** The bytes a token denotes, as a view into `buffer`. */
export function tokenBytes(t: Token, buffer: SourceBuffer): Uint8Array {
  return buffer.subarray(t.start, t.end);
}

export function tokenText(t: Token, buffer: SourceBuffer): string {
  return decodeBytes(tokenBytes(t, buffer));
}

export function classifyToken(t: Token, buffer: SourceBuffer): TokenKind {
  const b = buffer[t.start];
  if (b === undefined) {
    throw new Error(`token [${t.start}, ${t.end}) lies outside a ${buffer.length}-byte buffer`);
  }
  if (isOpen(b)) return "open";
  if (isClose(b)) return "close";
  if (isMacroMarker(b)) return "macro";
  if (b === CH.DQUOTE) return "string";
  if (b === CH.SEMICOLON) return "comment";
  return "atom";
}
