// String literal escapes. Unknown escapes drop the backslash.

export function unescapeString(body: string): string {
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const next = body.charAt(++i);
    switch (next) {
      case "n":
        out += "\n";
        break;
      case "t":
        out += "\t";
        break;
      case "":
        // trailing lone backslash; the tokenizer never produces one
        break;
      default:
        out += next;
    }
  }
  return out;
}

export function escapeString(text: string): string {
  let out = "";
  for (const ch of text) {
    switch (ch) {
      case "\\":
        out += "\\\\";
        break;
      case `"`:
        out += `\\"`;
        break;
      case "\n":
        out += "\\n";
        break;
      case "\t":
        out += "\\t";
        break;
      default:
        out += ch;
    }
  }
  return out;
}
