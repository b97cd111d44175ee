// src/core/errors.ts
// Error classes raised while building and running machines.
// All of them are fatal: a build that throws leaves no usable machine behind.

import type { Diagnostic, Span } from "../outcome/diagnostic";

// ─────────────────────────────────────────────────────────────────
// Base
// ─────────────────────────────────────────────────────────────────

export class TmError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "TmError";
  }
}

// ─────────────────────────────────────────────────────────────────
// State graph
// ─────────────────────────────────────────────────────────────────

export class RedefinitionError extends TmError {
  constructor(public readonly stateName: string) {
    super(`RedefinitionError: state '${stateName}' is already defined`, "REDEFINITION");
    this.name = "RedefinitionError";
  }
}

export class InvalidTransitionError extends TmError {
  constructor(public readonly stateName: string, public readonly detail: string) {
    super(`InvalidTransitionError: state '${stateName}': ${detail}`, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
  }
}

export class UndefinedStateError extends TmError {
  constructor(public readonly access: string) {
    super(`UndefinedStateError: cannot read ${access} of a state that was never defined`, "UNDEFINED_STATE");
    this.name = "UndefinedStateError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────

export class CycleDetectedError extends TmError {
  constructor(public readonly op: string, public readonly args: readonly unknown[]) {
    super(`CycleDetectedError: re-entrant construction of ${op}(${args.map(a => String(a)).join(", ")})`, "CYCLE_DETECTED");
    this.name = "CycleDetectedError";
  }
}

export class UnresolvedLabelError extends TmError {
  constructor(public readonly label: string, public readonly subprogram: string) {
    super(`UnresolvedLabelError: label '${label}' is not defined in '${subprogram}'`, "UNRESOLVED_LABEL");
    this.name = "UnresolvedLabelError";
  }
}

export class DuplicateLabelError extends TmError {
  constructor(public readonly label: string, public readonly subprogram: string) {
    super(`DuplicateLabelError: label '${label}' is placed twice in '${subprogram}'`, "DUPLICATE_LABEL");
    this.name = "DuplicateLabelError";
  }
}

export class EmptySubprogramError extends TmError {
  constructor(public readonly subprogram: string) {
    super(`EmptySubprogramError: '${subprogram}' has no instructions`, "EMPTY_SUBPROGRAM");
    this.name = "EmptySubprogramError";
  }
}

export class UndefinedSymbolError extends TmError {
  constructor(public readonly symbol: string, public readonly kind: "variable" | "procedure", public readonly span?: Span) {
    super(`UndefinedSymbolError: undefined ${kind} '${symbol}'${span?.startLine !== undefined ? ` at ${span.startLine}:${span.startCol ?? 0}` : ""}`, "UNDEFINED_SYMBOL");
    this.name = "UndefinedSymbolError";
  }
}

export class ArityMismatchError extends TmError {
  constructor(public readonly proc: string, public readonly expected: number, public readonly actual: number, public readonly span?: Span) {
    super(`ArityMismatchError: '${proc}' takes ${expected} argument(s), called with ${actual}`, "ARITY_MISMATCH");
    this.name = "ArityMismatchError";
  }
}

export class SizeMismatchError extends TmError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(`SizeMismatchError: program needs ${actual} PC bits but was built for ${expected}`, "SIZE_MISMATCH");
    this.name = "SizeMismatchError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Simulation
// ─────────────────────────────────────────────────────────────────

export class StepLimitExceededError extends TmError {
  constructor(public readonly limit: number) {
    super(`StepLimitExceededError: machine did not halt within ${limit} steps`, "STEP_LIMIT");
    this.name = "StepLimitExceededError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Front end
// ─────────────────────────────────────────────────────────────────

export class ParseError extends TmError {
  constructor(public readonly diagnostics: readonly Diagnostic[]) {
    super(`ParseError: ${diagnostics.length} error(s)${diagnostics.length > 0 ? `; first: ${diagnostics[0].message}` : ""}`, "PARSE_ERROR");
    this.name = "ParseError";
  }
}
