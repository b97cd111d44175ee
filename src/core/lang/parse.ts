// src/core/lang/parse.ts
// Recursive-descent parser for NQL.
//
// Precedence, loosest first:
//   !        prefix, applies to the whole expression after it
//   ||       left
//   &&       left
//   < <= > >= == !=   non-associative
//   + -      left
//   * /      left
//   integer | identifier | ( expr )
//
// A syntax error abandons the current declaration; parsing resumes at the
// next `proc` or `global`, so one run reports every broken declaration.

import { ParseError } from "../errors";
import type { Diagnostic, Span } from "../../outcome/diagnostic";
import { errorDiag } from "../../outcome/diagnostic";
import type { BoolExpr, CompareOp, Expr, NatExpr, ProcDecl, Program, Stmt } from "./ast";
import { COMPARE_OPS, isBoolExpr, isNatExpr } from "./ast";
import type { Tok } from "./tokenize";
import { tokenize } from "./tokenize";

export type ParseResult = {
  ok: boolean;
  program: Program;
  diagnostics: Diagnostic[];
};

class Failure extends Error {
  constructor(public readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "Failure";
  }
}

function isCompareOp(s: string): s is CompareOp {
  return COMPARE_OPS.some(op => op === s);
}

export function parseProgram(src: string, file?: string): ParseResult {
  const { tokens: toks, diagnostics } = tokenize(src, file);
  const program: Program = { globals: [], procs: [] };
  let i = 0;

  const peek = (): Tok => toks[Math.min(i, toks.length - 1)];
  const spanOf = (t: Tok): Span => ({ file, startLine: t.line, startCol: t.col });
  const describe = (t: Tok) => (t.tag === "EOF" ? "end of input" : `'${t.text}'`);
  function fail(code: string, message: string, at: Tok): never {
    throw new Failure(errorDiag(code, message, { span: spanOf(at) }));
  }

  const isOp = (text: string): boolean => {
    const t = peek();
    return t.tag === "Op" && t.text === text;
  };
  const isKw = (text: string): boolean => {
    const t = peek();
    return t.tag === "Keyword" && t.text === text;
  };
  const expectOp = (text: string): Tok => {
    const t = peek();
    if (t.tag !== "Op" || t.text !== text) fail("E0102", `expected '${text}', found ${describe(t)}`, t);
    i++;
    return t;
  };
  const expectIdent = (what: string): string => {
    const t = peek();
    if (t.tag !== "Ident") return fail("E0102", `expected ${what}, found ${describe(t)}`, t);
    i++;
    return t.text;
  };

  const nat = (e: Expr, at: Tok): NatExpr => {
    if (isNatExpr(e)) return e;
    return fail("E0103", "expected a numeric expression, found a condition", at);
  };
  const bool = (e: Expr, at: Tok): BoolExpr => {
    if (isBoolExpr(e)) return e;
    return fail("E0103", "expected a condition, found a numeric expression", at);
  };

  // ───────────────────────────────────────────────────────────────
  // Expressions
  // ───────────────────────────────────────────────────────────────

  function expr(): Expr {
    const t = peek();
    if (isOp("!")) {
      i++;
      const operand = expr();
      return { tag: "Not", operand: bool(operand, t), span: spanOf(t) };
    }
    return orExpr();
  }

  function orExpr(): Expr {
    const start = peek();
    let left = andExpr();
    while (isOp("||")) {
      const op = peek();
      i++;
      const right = andExpr();
      left = { tag: "Or", left: bool(left, start), right: bool(right, op), span: spanOf(start) };
    }
    return left;
  }

  function andExpr(): Expr {
    const start = peek();
    let left = relExpr();
    while (isOp("&&")) {
      const op = peek();
      i++;
      const right = relExpr();
      left = { tag: "And", left: bool(left, start), right: bool(right, op), span: spanOf(start) };
    }
    return left;
  }

  function relExpr(): Expr {
    const start = peek();
    const left = addExpr();
    const op = peek();
    if (op.tag !== "Op" || !isCompareOp(op.text)) return left;
    i++;
    const right = addExpr();
    const next = peek();
    if (next.tag === "Op" && isCompareOp(next.text)) {
      fail("E0104", `comparison operators do not chain; parenthesise the comparison before '${next.text}'`, next);
    }
    return { tag: "Compare", op: op.text, left: nat(left, start), right: nat(right, op), span: spanOf(start) };
  }

  function addExpr(): Expr {
    const start = peek();
    let left = mulExpr();
    for (;;) {
      const op = peek();
      if (op.tag !== "Op" || (op.text !== "+" && op.text !== "-")) return left;
      i++;
      const right = nat(mulExpr(), op);
      const l = nat(left, start);
      if (op.text === "-") {
        left = { tag: "Monus", left: l, right, span: spanOf(start) };
      } else {
        left = { tag: "Add", terms: l.tag === "Add" ? [...l.terms, right] : [l, right], span: spanOf(start) };
      }
    }
  }

  function mulExpr(): Expr {
    const start = peek();
    let left = primary();
    for (;;) {
      const op = peek();
      if (op.tag !== "Op" || (op.text !== "*" && op.text !== "/")) return left;
      i++;
      const right = nat(primary(), op);
      const l = nat(left, start);
      left = op.text === "*"
        ? { tag: "Mul", left: l, right, span: spanOf(start) }
        : { tag: "Div", left: l, right, span: spanOf(start) };
    }
  }

  function primary(): Expr {
    const t = peek();
    if (t.tag === "Int") {
      i++;
      return { tag: "Lit", value: t.value, span: spanOf(t) };
    }
    if (t.tag === "Ident") {
      i++;
      return { tag: "Var", name: t.text, span: spanOf(t) };
    }
    if (isOp("(")) {
      i++;
      const e = expr();
      expectOp(")");
      return e;
    }
    return fail("E0102", `expected an expression, found ${describe(t)}`, t);
  }

  // ───────────────────────────────────────────────────────────────
  // Statements
  // ───────────────────────────────────────────────────────────────

  function condition(): BoolExpr {
    expectOp("(");
    const at = peek();
    const e = bool(expr(), at);
    expectOp(")");
    return e;
  }

  function block(): Stmt {
    const open = expectOp("{");
    const body: Stmt[] = [];
    while (!isOp("}")) {
      if (peek().tag === "EOF") fail("E0102", "expected '}', found end of input", peek());
      body.push(stmt());
    }
    i++;
    return { tag: "Block", body, span: spanOf(open) };
  }

  function ifStmt(): Stmt {
    const t = peek();
    i++;
    const cond = condition();
    const then = block();
    if (!isKw("else")) return { tag: "If", cond, then, span: spanOf(t) };
    i++;
    const otherwise = isKw("if") ? ifStmt() : block();
    return { tag: "If", cond, then, else: otherwise, span: spanOf(t) };
  }

  function stmt(): Stmt {
    const t = peek();
    if (isKw("while")) {
      i++;
      const cond = condition();
      return { tag: "While", cond, body: block(), span: spanOf(t) };
    }
    if (isKw("if")) return ifStmt();
    if (isKw("return")) {
      i++;
      expectOp(";");
      return { tag: "Return", span: spanOf(t) };
    }
    if (isOp("{")) return block();
    if (t.tag === "Ident") {
      i++;
      if (isOp("=")) {
        i++;
        const at = peek();
        const value = nat(expr(), at);
        expectOp(";");
        return { tag: "Assign", target: t.text, value, span: spanOf(t) };
      }
      if (isOp("(")) {
        const args = nameList("argument");
        expectOp(";");
        return { tag: "Call", proc: t.text, args, span: spanOf(t) };
      }
      return fail("E0102", `expected '=' or '(' after '${t.text}', found ${describe(peek())}`, peek());
    }
    return fail("E0102", `expected a statement, found ${describe(t)}`, t);
  }

  /** `( a, b, c )` of identifiers */
  function nameList(what: string): string[] {
    expectOp("(");
    const names: string[] = [];
    if (!isOp(")")) {
      names.push(expectIdent(what));
      while (isOp(",")) {
        i++;
        names.push(expectIdent(what));
      }
    }
    expectOp(")");
    return names;
  }

  // ───────────────────────────────────────────────────────────────
  // Declarations
  // ───────────────────────────────────────────────────────────────

  function declaration(): void {
    const t = peek();
    if (isKw("global")) {
      i++;
      const nameTok = peek();
      const name = expectIdent("a global name");
      expectOp(";");
      if (program.globals.includes(name)) fail("E0105", `global '${name}' is already declared`, nameTok);
      program.globals.push(name);
      return;
    }
    if (isKw("proc")) {
      i++;
      const nameTok = peek();
      const name = expectIdent("a procedure name");
      const params = nameList("a parameter name");
      const dup = params.find((p, k) => params.indexOf(p) !== k);
      if (dup !== undefined) fail("E0105", `parameter '${dup}' of '${name}' is declared twice`, nameTok);
      const body = block();
      if (program.procs.some(p => p.name === name)) fail("E0105", `procedure '${name}' is already declared`, nameTok);
      const decl: ProcDecl = { name, params, body, span: spanOf(t) };
      program.procs.push(decl);
      return;
    }
    fail("E0102", `expected 'proc' or 'global', found ${describe(t)}`, t);
  }

  while (peek().tag !== "EOF") {
    const start = i;
    try {
      declaration();
    } catch (e) {
      if (!(e instanceof Failure)) throw e;
      diagnostics.push(e.diagnostic);
      if (i === start) i++;
      while (peek().tag !== "EOF" && !isKw("proc") && !isKw("global")) i++;
    }
  }

  return { ok: diagnostics.length === 0, program, diagnostics };
}

/** Parse, throwing a ParseError that carries every diagnostic. */
export function parseProgramOrThrow(src: string, file?: string): Program {
  const result = parseProgram(src, file);
  if (!result.ok) throw new ParseError(result.diagnostics);
  return result.program;
}
