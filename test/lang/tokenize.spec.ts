// test/lang/tokenize.spec.ts

import { describe, it, expect } from "vitest";
import { tokenize } from "../../src/core/lang/tokenize";

describe("tokenize", () => {
  it("splits operators longest first", () => {
    const { tokens, diagnostics } = tokenize("a <= 10 && !b != c");
    expect(diagnostics).toEqual([]);
    expect(tokens.map(t => `${t.tag}:${t.text}`)).toEqual([
      "Ident:a", "Op:<=", "Int:10", "Op:&&", "Op:!", "Ident:b", "Op:!=", "Ident:c", "EOF:",
    ]);
  });

  it("recognises keywords and keeps other words as identifiers", () => {
    const { tokens } = tokenize("while whiles if else proc global return _x1");
    expect(tokens.map(t => t.tag)).toEqual([
      "Keyword", "Ident", "Keyword", "Keyword", "Keyword", "Keyword", "Keyword", "Ident", "EOF",
    ]);
  });

  it("records 1-based line and column", () => {
    const { tokens } = tokenize("x\n  y = 12;");
    expect(tokens.slice(0, 4).map(t => [t.text, t.line, t.col])).toEqual([
      ["x", 1, 1],
      ["y", 2, 3],
      ["=", 2, 5],
      ["12", 2, 7],
    ]);
    const n = tokens[3];
    expect(n.tag === "Int" ? n.value : -1).toBe(12);
  });

  it("skips block and line comments", () => {
    const { tokens } = tokenize("/* a\n b */ x // y\n z");
    expect(tokens.map(t => t.text)).toEqual(["x", "z", ""]);
    expect(tokens[1].line).toBe(3);
  });

  it("reports stray characters and keeps going", () => {
    const { tokens, diagnostics } = tokenize("a @ b");
    expect(tokens.map(t => t.text)).toEqual(["a", "b", ""]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ code: "E0101", severity: "error", span: { startLine: 1, startCol: 3 } });
  });

  it("reports an unterminated comment", () => {
    const { diagnostics } = tokenize("x /* never closed", "t.nql");
    expect(diagnostics[0]).toMatchObject({ code: "E0106", span: { file: "t.nql", startLine: 1, startCol: 3 } });
  });
});
