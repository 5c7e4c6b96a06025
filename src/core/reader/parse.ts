// src/core/reader/parse.ts
// Recursive descent over a token sequence. The cursor is local to each call.

import type { SourceBuffer } from "./source";
import type { Token, TokenSequence } from "./token";
import { classifyToken, tokenBytes, tokenText } from "./token";
import type { Data, Delimiter } from "./datum";
import { DELIMITERS, list, num, str, sym } from "./datum";
import { unescapeString } from "./escape";
import { decodeBytes } from "./source";
import { ReaderError, guardResources } from "./errors";

export interface ParseResult {
  data: Data;
  /** Tokens used from `start`, including comments skipped before the form. */
  consumed: number;
}

const DELIMITER_OF: Record<string, Delimiter> = {
  "(": "paren",
  "[": "bracket",
  "{": "brace",
};

function macroSymbol(marker: string): string {
  switch (marker) {
    case "'": return "quote";
    case "`": return "quasiquote";
    case "~": return "unquote";
    case "~@": return "splice-unquote";
    case "@": return "deref";
    case "^": return "with-meta";
    default:
      throw new Error(`parse: not a reader macro: ${marker}`);
  }
}

const INTEGER = /^-?[0-9]+$/;

function atomFromText(text: string, t: Token): Data {
  if (INTEGER.test(text)) {
    const n = Number(text);
    // digits past the safe range stay symbols rather than lose precision
    if (Number.isSafeInteger(n)) return num(n === 0 ? 0 : n, t);
  }
  return sym(text, t);
}

function hasFormFrom(tokens: TokenSequence, buffer: SourceBuffer, i: number): boolean {
  for (; i < tokens.length; i++) {
    if (classifyToken(tokens[i], buffer) !== "comment") return true;
  }
  return false;
}

/**
 * Parse the first form at or after `tokens[start]`.
 *
 * Throws `ReaderError` with kind `NoForm` when only comments remain,
 * `UnexpectedEof` for an unclosed list or a reader macro missing its operand,
 * `UnbalancedClose` and `MismatchedBracket` for bad closers.
 */
export function parse(tokens: TokenSequence, buffer: SourceBuffer, start = 0): ParseResult {
  let i = start;

  const eof = (expected: string) => new ReaderError("UnexpectedEof", buffer.length, { expected });
  const lastEnd = () => tokens[i - 1].end;

  function parseForm(expected: string): Data {
    while (true) {
      const t = tokens[i];
      if (!t) throw eof(expected);

      switch (classifyToken(t, buffer)) {
        case "comment":
          i++;
          continue;
        case "open":
          return parseList(t);
        case "close":
          throw new ReaderError("UnbalancedClose", t.start, { close: tokenText(t, buffer) });
        case "macro":
          return parseMacro(t);
        case "string":
          i++;
          return str(unescapeString(decodeBytes(tokenBytes(t, buffer).subarray(1, -1))), t);
        case "atom":
          i++;
          return atomFromText(tokenText(t, buffer), t);
      }
    }
  }

  function parseList(open: Token): Data {
    const delimiter = DELIMITER_OF[tokenText(open, buffer)];
    const [, close] = DELIMITERS[delimiter];
    i++;
    const items: Data[] = [];

    while (true) {
      const t = tokens[i];
      if (!t) throw eof(`'${close}'`);
      const kind = classifyToken(t, buffer);
      if (kind === "comment") {
        i++;
        continue;
      }
      if (kind === "close") {
        const actual = tokenText(t, buffer);
        if (actual !== close) {
          throw new ReaderError("MismatchedBracket", t.start, { expected: close, actual });
        }
        i++;
        return list(items, delimiter, { start: open.start, end: t.end });
      }
      items.push(parseForm(`'${close}'`));
    }
  }

  function parseMacro(marker: Token): Data {
    const text = tokenText(marker, buffer);
    const head = sym(macroSymbol(text), marker);
    i++;

    if (text === "^") {
      const meta = parseForm(`a metadata form after '^'`);
      const target = parseForm(`a form after '^' metadata`);
      return list([head, target, meta], "paren", { start: marker.start, end: lastEnd() });
    }

    const operand = parseForm(`a form after '${text}'`);
    return list([head, operand], "paren", { start: marker.start, end: lastEnd() });
  }

  return guardResources(() => tokens[i]?.start ?? buffer.length, () => {
    if (!hasFormFrom(tokens, buffer, i)) {
      throw new ReaderError("NoForm", buffer.length);
    }
    const data = parseForm("a form");
    return { data, consumed: i - start };
  });
}

/** Every form in the sequence; a trailing run of comments ends the read. */
export function parseAll(tokens: TokenSequence, buffer: SourceBuffer): Data[] {
  const forms: Data[] = [];
  let i = 0;
  while (hasFormFrom(tokens, buffer, i)) {
    const { data, consumed } = parse(tokens, buffer, i);
    forms.push(data);
    i += consumed;
  }
  return forms;
}
