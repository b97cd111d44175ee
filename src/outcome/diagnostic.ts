// src/outcome/diagnostic.ts
// Diagnostics reported by the NQL front end

export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

/** `file:line:col: error E0102: message` */
export function formatDiagnostic(d: Diagnostic): string {
  const s = d.span;
  const where = s
    ? `${s.file ?? "<input>"}:${s.startLine ?? 0}:${s.startCol ?? 0}: `
    : "";
  return `${where}${d.severity} ${d.code}: ${d.message}`;
}
