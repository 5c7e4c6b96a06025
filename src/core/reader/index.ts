export type { SourceBuffer, SourceInput, ByteSpan, Span } from "./source";
export { toSourceBuffer, decodeBytes, locate } from "./source";
export type { Token, TokenSequence, TokenKind } from "./token";
export { classifyToken, tokenBytes, tokenText } from "./token";
export type { CommentMode, TokenizeOptions } from "./tokenize";
export { tokenize } from "./tokenize";
export type { Atom, Data, AtomData, ListData, Delimiter } from "./datum";
export { num, sym, str, list, isSym, dataEq } from "./datum";
export type { ParseResult } from "./parse";
export { parse, parseAll } from "./parse";
export { printData } from "./print";
export { escapeString, unescapeString } from "./escape";
export type { ReaderErrorKind } from "./errors";
export { ReaderError, isReaderError, READER_ERROR_CODES } from "./errors";
export type { ReadOptions, RepOptions, Evaluate } from "./read";
export { readStr, readAll, rep, readerFailure } from "./read";
