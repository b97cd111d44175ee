// src/core/compiler/types.ts
// Compiled program pieces and the code-emission vocabulary.

import type { Next } from "../tm/state";

// ─────────────────────────────────────────────────────────────────
// Subroutines and registers
// ─────────────────────────────────────────────────────────────────

/**
 * A compiled subprogram occupying `2^order` consecutive PC slots.
 * `childMap` maps the bit prefix (over this subroutine's own `order` bits)
 * at which each child starts to that child.
 */
export type Subroutine = {
  readonly tag: "Subroutine";
  /** Unique within one builder context */
  readonly id: number;
  readonly entry: Next;
  readonly order: number;
  readonly name: string;
  readonly childMap: ReadonlyMap<string, Subroutine>;
  /** True for a register decrement, whose PC+1 slot is its zero exit */
  readonly isDecrement: boolean;
};

export type Register = {
  readonly name: string;
  /** Position on the tape, in allocation order */
  readonly index: number;
  readonly inc: Subroutine;
  readonly dec: Subroutine;
  readonly init: Subroutine;
};

// ─────────────────────────────────────────────────────────────────
// Pseudo-ops
// ─────────────────────────────────────────────────────────────────

/** Marks the current position; occupies no slots. */
export type Label = { readonly tag: "Label"; readonly name: string };

/** Unconditional branch to a label of the same subprogram; one slot. */
export type Goto = { readonly tag: "Goto"; readonly name: string };

export type Part = Subroutine | Label | Goto;

export function label(name: string): Label {
  return { tag: "Label", name };
}

export function goto(name: string): Goto {
  return { tag: "Goto", name };
}

/** Memo key of a part: subroutines by identity, pseudo-ops by name. */
export function partKey(p: Part): string {
  switch (p.tag) {
    case "Subroutine": return `#${p.id}`;
    case "Label": return `:${p.name}`;
    case "Goto": return `>${p.name}`;
  }
}

// ─────────────────────────────────────────────────────────────────
// Builder configuration
// ─────────────────────────────────────────────────────────────────

/**
 * How a Goto rewrites the PC.
 * - patch: overwrite only the low bits where source and target differ
 * - absolute: overwrite all of the subprogram's bits
 * - relative: add the signed offset with a ripple adder
 */
export type BranchMode = "patch" | "absolute" | "relative";

export const BRANCH_MODES: readonly BranchMode[] = ["patch", "absolute", "relative"];

export type BuilderConfig = {
  /** Width of the program counter */
  pcBits: number;
  branchMode: BranchMode;
  /** Thread goto chains and drop fall-through gotos before layout */
  optimizeBranches: boolean;
};
