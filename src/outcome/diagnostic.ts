import type { Span } from "../core/reader/source";

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
  related?: Diagnostic[];
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.span
    ? `${d.span.file ?? "<input>"}:${d.span.startLine}:${d.span.startCol}: `
    : "";
  return `${where}${d.severity} ${d.code}: ${d.message}`;
}
