import type { Atom, Data } from "./datum";
import { DELIMITERS } from "./datum";
import { escapeString } from "./escape";

function printAtom(a: Atom, readably: boolean): string {
  switch (a.tag) {
    case "Number": return String(a.value);
    case "Symbol": return a.name;
    case "String": return readably ? `"${escapeString(a.text)}"` : a.text;
  }
}

/**
 * Render a tree back to source text. With `readably` strings are quoted and
 * escaped so the output reads back to an equal tree.
 */
export function printData(d: Data, readably = true): string {
  switch (d.tag) {
    case "Atom":
      return printAtom(d.atom, readably);
    case "List": {
      const [open, close] = DELIMITERS[d.delimiter];
      return `${open}${d.items.map((item) => printData(item, readably)).join(" ")}${close}`;
    }
  }
}
