// src/index.ts
// Public API: compile register-machine programs to two-symbol Turing machines.

export * from "./core/errors";
export * from "./core/tm";
export * from "./core/compiler";
export * from "./core/machine";
export * from "./core/lang";
export * from "./core/config";
export { errorDiag, formatDiagnostic } from "./outcome/diagnostic";
export type { Diagnostic, DiagnosticSeverity, Span } from "./outcome/diagnostic";
