import type { Span } from "../core/reader/source";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Unterminated string literal" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unexpected end of input: expected {expected}" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Unbalanced '{close}' with no matching open" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Mismatched bracket: expected '{expected}', got '{actual}'" },
  E0005: { code: "E0005", severity: "error", category: "Syntax", template: "No form to read" },
  E0006: { code: "E0006", severity: "error", category: "Resource", template: "Out of memory: {detail}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export type DiagnosticParams = Record<string, string | number>;

export function renderTemplate(code: DiagnosticCode, params?: DiagnosticParams): string {
  let message = DIAGNOSTIC_CODES[code].template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }
  return message;
}

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: DiagnosticParams,
  span?: Span
): Diagnostic {
  const def = DIAGNOSTIC_CODES[code];
  const diag: Diagnostic = {
    code: def.code,
    severity: def.severity,
    message: renderTemplate(code, params),
  };
  if (span) diag.span = span;
  if (params) diag.data = { ...params };
  return diag;
}
