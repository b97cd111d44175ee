// src/core/lang/tokenize.ts
// NQL tokenizer. Positions are 1-based line and column.

import type { Diagnostic } from "../../outcome/diagnostic";
import { errorDiag } from "../../outcome/diagnostic";

export const KEYWORDS = ["while", "if", "else", "proc", "global", "return"] as const;
export type Keyword = (typeof KEYWORDS)[number];

/** Longest first, so `<=` wins over `<`. */
const OPERATORS = ["<=", ">=", "==", "!=", "&&", "||", "<", ">", "!", "*", "/", "-", "+", "=", ";", ",", "(", ")", "{", "}"] as const;
export type Operator = (typeof OPERATORS)[number];

type Pos = { line: number; col: number };

export type Tok =
  | ({ tag: "Int"; value: number; text: string } & Pos)
  | ({ tag: "Ident"; text: string } & Pos)
  | ({ tag: "Keyword"; text: Keyword } & Pos)
  | ({ tag: "Op"; text: Operator } & Pos)
  | ({ tag: "EOF"; text: "" } & Pos);

export type TokenizeResult = {
  tokens: Tok[];
  diagnostics: Diagnostic[];
};

function isKeyword(s: string): s is Keyword {
  return KEYWORDS.some(k => k === s);
}

export function tokenize(src: string, file?: string): TokenizeResult {
  const tokens: Tok[] = [];
  const diagnostics: Diagnostic[] = [];
  let i = 0;
  let line = 1;
  let col = 1;

  const advance = (n: number) => {
    for (let k = 0; k < n && i < src.length; k++) {
      if (src[i] === "\n") {
        line++;
        col = 1;
      } else {
        col++;
      }
      i++;
    }
  };
  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";
  const isDigit = (c: string) => c >= "0" && c <= "9";
  const isIdentStart = (c: string) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
  const isIdentPart = (c: string) => isIdentStart(c) || isDigit(c);

  scan: while (i < src.length) {
    const c = src[i];
    const pos: Pos = { line, col };

    if (isWS(c)) { advance(1); continue; }

    // comments
    if (src.startsWith("//", i)) {
      while (i < src.length && src[i] !== "\n") advance(1);
      continue;
    }
    if (src.startsWith("/*", i)) {
      const end = src.indexOf("*/", i + 2);
      if (end < 0) {
        diagnostics.push(errorDiag("E0106", "unterminated comment", { span: { file, startLine: pos.line, startCol: pos.col } }));
        break;
      }
      advance(end + 2 - i);
      continue;
    }

    if (isDigit(c)) {
      let text = "";
      while (i < src.length && isDigit(src[i])) { text += src[i]; advance(1); }
      tokens.push({ tag: "Int", value: Number(text), text, ...pos });
      continue;
    }

    if (isIdentStart(c)) {
      let text = "";
      while (i < src.length && isIdentPart(src[i])) { text += src[i]; advance(1); }
      if (isKeyword(text)) tokens.push({ tag: "Keyword", text, ...pos });
      else tokens.push({ tag: "Ident", text, ...pos });
      continue;
    }

    for (const op of OPERATORS) {
      if (src.startsWith(op, i)) {
        tokens.push({ tag: "Op", text: op, ...pos });
        advance(op.length);
        continue scan;
      }
    }

    diagnostics.push(errorDiag("E0101", `unexpected character '${c}'`, { span: { file, startLine: pos.line, startCol: pos.col } }));
    advance(1);
  }

  tokens.push({ tag: "EOF", text: "", line, col });
  return { tokens, diagnostics };
}
