// src/core/reader/read.ts
// Outcome-returning entry points: read one form, read all forms, read-print.

import type { Data } from "./datum";
import type { SourceBuffer, SourceInput } from "./source";
import { locate, toSourceBuffer } from "./source";
import type { TokenizeOptions } from "./tokenize";
import { tokenize } from "./tokenize";
import { parse, parseAll } from "./parse";
import { printData } from "./print";
import { ReaderError, isReaderError } from "./errors";
import type { Fail, Outcome } from "../../outcome/outcome";
import { done, syntaxError } from "../../outcome/constructors";
import { mapOutcome } from "../../outcome/matchers";

export interface ReadOptions extends TokenizeOptions {
  /** Name reported in diagnostic spans. */
  file?: string;
}

/** Stand-in for the evaluation step between read and print. */
export type Evaluate = (form: Data) => Data;

export interface RepOptions extends ReadOptions {
  evaluate?: Evaluate;
}

export function readerFailure(e: ReaderError, buffer: SourceBuffer, file?: string): Fail {
  const span = locate(buffer, { start: e.offset, end: Math.min(e.offset + 1, buffer.length) }, file);
  return syntaxError(`reader/${e.kind}`, e.code, e.params, span);
}

function guarded<A>(buffer: SourceBuffer, file: string | undefined, fn: () => Outcome<A>): Outcome<A> {
  try {
    return fn();
  } catch (e) {
    if (isReaderError(e)) return readerFailure(e, buffer, file);
    throw e;
  }
}

export function readStr(source: SourceInput, options: ReadOptions = {}): Outcome<Data> {
  const buffer = toSourceBuffer(source);
  return guarded(buffer, options.file, () => {
    const tokens = tokenize(buffer, options);
    const { data, consumed } = parse(tokens, buffer);
    const meta = data.span ? { consumed, span: locate(buffer, data.span, options.file) } : { consumed };
    return done(data, meta);
  });
}

export function readAll(source: SourceInput, options: ReadOptions = {}): Outcome<Data[]> {
  const buffer = toSourceBuffer(source);
  return guarded(buffer, options.file, () => {
    const tokens = tokenize(buffer, options);
    return done(parseAll(tokens, buffer), { consumed: tokens.length });
  });
}

const identity: Evaluate = (form) => form;

/** Read every form of `line`, evaluate and print each; one string per form. */
export function rep(line: SourceInput, options: RepOptions = {}): Outcome<string[]> {
  const evaluate = options.evaluate ?? identity;
  return mapOutcome(readAll(line, options), (forms) => forms.map((form) => printData(evaluate(form), true)));
}
