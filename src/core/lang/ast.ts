// src/core/lang/ast.ts
// Abstract syntax of NQL, the small imperative language compiled to machines.
//
// Numbers are naturals; `-` is truncated subtraction and `/` floor division.
// Numeric and boolean expressions are separate unions: a comparison takes
// numbers, a connective takes booleans, and conditions must be boolean.

import type { Span } from "../../outcome/diagnostic";

// ─────────────────────────────────────────────────────────────────
// Expressions
// ─────────────────────────────────────────────────────────────────

export type NatExpr =
  | { tag: "Lit"; value: number; span?: Span }
  | { tag: "Var"; name: string; span?: Span }
  | { tag: "Add"; terms: NatExpr[]; span?: Span }
  | { tag: "Monus"; left: NatExpr; right: NatExpr; span?: Span }
  | { tag: "Mul"; left: NatExpr; right: NatExpr; span?: Span }
  | { tag: "Div"; left: NatExpr; right: NatExpr; span?: Span };

export type CompareOp = "<" | "<=" | ">" | ">=" | "==" | "!=";

export const COMPARE_OPS: readonly CompareOp[] = ["<", "<=", ">", ">=", "==", "!="];

export type BoolExpr =
  | { tag: "Compare"; op: CompareOp; left: NatExpr; right: NatExpr; span?: Span }
  | { tag: "Not"; operand: BoolExpr; span?: Span }
  | { tag: "And"; left: BoolExpr; right: BoolExpr; span?: Span }
  | { tag: "Or"; left: BoolExpr; right: BoolExpr; span?: Span };

export type Expr = NatExpr | BoolExpr;

const NAT_TAGS: ReadonlySet<string> = new Set(["Lit", "Var", "Add", "Monus", "Mul", "Div"]);

export function isNatExpr(e: Expr): e is NatExpr {
  return NAT_TAGS.has(e.tag);
}

export function isBoolExpr(e: Expr): e is BoolExpr {
  return !NAT_TAGS.has(e.tag);
}

// ─────────────────────────────────────────────────────────────────
// Statements and declarations
// ─────────────────────────────────────────────────────────────────

export type Stmt =
  | { tag: "Assign"; target: string; value: NatExpr; span?: Span }
  | { tag: "While"; cond: BoolExpr; body: Stmt; span?: Span }
  | { tag: "If"; cond: BoolExpr; then: Stmt; else?: Stmt; span?: Span }
  | { tag: "Call"; proc: string; args: string[]; span?: Span }
  | { tag: "Return"; span?: Span }
  | { tag: "Block"; body: Stmt[]; span?: Span };

export type ProcDecl = {
  name: string;
  params: string[];
  body: Stmt;
  span?: Span;
};

export type Program = {
  /** Global registers, in declaration order */
  globals: string[];
  procs: ProcDecl[];
};

// ─────────────────────────────────────────────────────────────────
// Constructors, for building programs without source text
// ─────────────────────────────────────────────────────────────────

export const lit = (value: number): NatExpr => ({ tag: "Lit", value });
export const v = (name: string): NatExpr => ({ tag: "Var", name });
export const add = (...terms: NatExpr[]): NatExpr => ({ tag: "Add", terms });
export const monus = (left: NatExpr, right: NatExpr): NatExpr => ({ tag: "Monus", left, right });
export const mul = (left: NatExpr, right: NatExpr): NatExpr => ({ tag: "Mul", left, right });
export const div = (left: NatExpr, right: NatExpr): NatExpr => ({ tag: "Div", left, right });

export const compare = (op: CompareOp, left: NatExpr, right: NatExpr): BoolExpr => ({ tag: "Compare", op, left, right });
export const not = (operand: BoolExpr): BoolExpr => ({ tag: "Not", operand });
export const and = (left: BoolExpr, right: BoolExpr): BoolExpr => ({ tag: "And", left, right });
export const or = (left: BoolExpr, right: BoolExpr): BoolExpr => ({ tag: "Or", left, right });

export const assign = (target: string, value: NatExpr): Stmt => ({ tag: "Assign", target, value });
export const whileLoop = (cond: BoolExpr, ...body: Stmt[]): Stmt => ({ tag: "While", cond, body: block(...body) });
export const ifThen = (cond: BoolExpr, then: Stmt, otherwise?: Stmt): Stmt =>
  otherwise ? { tag: "If", cond, then, else: otherwise } : { tag: "If", cond, then };
export const call = (proc: string, ...args: string[]): Stmt => ({ tag: "Call", proc, args });
export const ret = (): Stmt => ({ tag: "Return" });
export const block = (...body: Stmt[]): Stmt => ({ tag: "Block", body });

export const proc = (name: string, params: string[], ...body: Stmt[]): ProcDecl => ({ name, params, body: block(...body) });
export const program = (globals: string[], ...procs: ProcDecl[]): Program => ({ globals, procs });
