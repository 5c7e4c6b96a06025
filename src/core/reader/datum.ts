// src/core/reader/datum.ts
// The parsed tree: atoms and lists. Text is owned (decoded out of the source
// buffer while parsing), so a tree outlives the buffer it was read from.

import type { ByteSpan } from "./source";

export type Atom =
  | { readonly tag: "Number"; readonly value: number }
  | { readonly tag: "Symbol"; readonly name: string }
  | { readonly tag: "String"; readonly text: string };

export type Delimiter = "paren" | "bracket" | "brace";

export type AtomData = {
  readonly tag: "Atom";
  readonly atom: Atom;
  readonly span?: ByteSpan;
};

export type ListData = {
  readonly tag: "List";
  readonly items: readonly Data[];
  readonly delimiter: Delimiter;
  readonly span?: ByteSpan;
};

export type Data = AtomData | ListData;

export const DELIMITERS: Record<Delimiter, readonly [open: string, close: string]> = {
  paren: ["(", ")"],
  bracket: ["[", "]"],
  brace: ["{", "}"],
};

const withSpan = <T extends object>(node: T, span?: ByteSpan): T =>
  span ? { ...node, span: { start: span.start, end: span.end } } : node;

export const num = (value: number, span?: ByteSpan): AtomData =>
  withSpan<AtomData>({ tag: "Atom", atom: { tag: "Number", value } }, span);

export const sym = (name: string, span?: ByteSpan): AtomData =>
  withSpan<AtomData>({ tag: "Atom", atom: { tag: "Symbol", name } }, span);

export const str = (text: string, span?: ByteSpan): AtomData =>
  withSpan<AtomData>({ tag: "Atom", atom: { tag: "String", text } }, span);

export const list = (items: readonly Data[], delimiter: Delimiter = "paren", span?: ByteSpan): ListData =>
  withSpan<ListData>({ tag: "List", items, delimiter }, span);

export function isSym(d: Data, name?: string): d is AtomData {
  return d.tag === "Atom" && d.atom.tag === "Symbol" && (name === undefined || d.atom.name === name);
}

function atomEq(a: Atom, b: Atom): boolean {
  switch (a.tag) {
    case "Number":
      return b.tag === "Number" && a.value === b.value;
    case "Symbol":
      return b.tag === "Symbol" && a.name === b.name;
    case "String":
      return b.tag === "String" && a.text === b.text;
  }
}

/** Structural equality; spans are ignored. */
export function dataEq(a: Data, b: Data): boolean {
  switch (a.tag) {
    case "Atom":
      return b.tag === "Atom" && atomEq(a.atom, b.atom);
    case "List": {
      if (b.tag !== "List" || a.delimiter !== b.delimiter) return false;
      if (a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => dataEq(item, b.items[i]));
    }
  }
}
