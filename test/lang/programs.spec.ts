// test/lang/programs.spec.ts
// NQL programs compiled to machines and run to halt

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { runNql } from "../helpers/nql";
import { BRANCH_MODES } from "../../src/core/compiler/types";
import {
  add, assign, call, compare, lit, monus, proc, program, v, whileLoop,
} from "../../src/core/lang/ast";
import { buildProgramMachine, buildSourceMachine, globalValues, loadGlobals } from "../../src/core/lang/program";
import {
  ArityMismatchError, CycleDetectedError, StepLimitExceededError, UndefinedSymbolError,
} from "../../src/core/errors";

const example = (name: string) => fs.readFileSync(path.resolve(process.cwd(), "examples", name), "utf8");

const REORDERED_SQUARES = `
global a;
global b;
proc main() {
  while (b < 5) {
    a = a + 1;
    b = a * a;
  }
}`;

describe("example programs", () => {
  for (const mode of BRANCH_MODES) {
    for (const optimizeBranches of [false, true]) {
      it(`squares ends with a = 4, b = 9 (${mode}, optimize ${optimizeBranches})`, () => {
        const r = runNql(example("squares.nql"), {}, { branchMode: mode, optimizeBranches });
        expect(r.globals).toEqual({ a: 4, b: 9 });
        expect(r.scratch.length).toBeGreaterThan(0);
        expect(r.scratch.every(x => x === 0)).toBe(true);
      });
    }
  }

  it("increments before squaring in the reordered loop", () => {
    expect(runNql(REORDERED_SQUARES).globals).toEqual({ a: 3, b: 9 });
  });

  it("computes gcd by subtraction", () => {
    expect(runNql(example("gcd.nql"), { a: 4, b: 6 }).globals).toEqual({ a: 2, b: 2, g: 2 });
  });

  it("halves and reports parity", () => {
    expect(runNql(example("halve.nql"), { n: 7 }).globals).toEqual({ n: 7, half: 3, odd: 1 });
    expect(runNql(example("halve.nql"), { n: 4 }).globals).toEqual({ n: 4, half: 2, odd: 0 });
  });
});

describe("expressions", () => {
  const evaluate = (expr: string, load: Record<string, number> = {}) =>
    runNql(`global x; global y; global r; proc main() { r = ${expr}; }`, load).globals.r;

  it("evaluates literal arithmetic", () => {
    expect(evaluate("7 / 2")).toBe(3);
    expect(evaluate("3 - 10")).toBe(0);
    expect(evaluate("2 + 3 * 4")).toBe(14);
    expect(evaluate("(2 + 3) * 4")).toBe(20);
  });

  it("reads variables without consuming them", () => {
    const r = runNql("global x; global y; global r; proc main() { r = x * y + x - y; }", { x: 3, y: 2 });
    expect(r.globals).toEqual({ x: 3, y: 2, r: 7 });
  });

  it("truncates subtraction and floors division", () => {
    for (const [x, y] of [[5, 2], [2, 5], [4, 4], [0, 3]]) {
      expect(evaluate("x - y", { x, y })).toBe(Math.max(0, x - y));
      expect(evaluate("x / y", { x, y })).toBe(Math.floor(x / y));
    }
  });
});

describe("conditions", () => {
  const outcome = (cond: string, x: number, y: number) => {
    const r = runNql(`global x; global y; global r; proc main() { if (${cond}) { r = 1; } else { r = 2; } }`, { x, y });
    expect(r.globals.x).toBe(x);
    expect(r.globals.y).toBe(y);
    return r.globals.r;
  };

  const ops: Array<[string, (a: number, b: number) => boolean]> = [
    ["<", (a, b) => a < b],
    ["<=", (a, b) => a <= b],
    [">", (a, b) => a > b],
    [">=", (a, b) => a >= b],
    ["==", (a, b) => a === b],
    ["!=", (a, b) => a !== b],
  ];

  for (const [op, holds] of ops) {
    it(`branches on x ${op} y`, () => {
      for (const x of [0, 1, 2]) {
        for (const y of [0, 1, 2]) {
          expect(outcome(`x ${op} y`, x, y)).toBe(holds(x, y) ? 1 : 2);
        }
      }
    });
  }

  it("combines with && || and !", () => {
    for (const x of [0, 1]) {
      for (const y of [0, 1]) {
        const both = x === 1 && y === 1;
        const either = x === 1 || y === 1;
        expect(outcome("x == 1 && y == 1", x, y)).toBe(both ? 1 : 2);
        expect(outcome("x == 1 || y == 1", x, y)).toBe(either ? 1 : 2);
        expect(outcome("!x == 1 && y == 1", x, y)).toBe(both ? 2 : 1);
        expect(outcome("!x == 1 || y == 1", x, y)).toBe(either ? 2 : 1);
      }
    }
  });
});

describe("statements", () => {
  it("returns early from main", () => {
    const src = "global x; global r; proc main() { r = 1; if (x > 0) { return; } r = 2; }";
    expect(runNql(src, { x: 0 }).globals.r).toBe(2);
    expect(runNql(src, { x: 3 }).globals.r).toBe(1);
  });

  it("binds parameters to the caller's registers", () => {
    const src = `
      global x; global y;
      proc twice(p, q) { q = q + p + p; }
      proc main() { twice(x, y); twice(y, x); }`;
    expect(runNql(src, { x: 1 }).globals).toEqual({ x: 5, y: 2 });
  });

  it("compiles a procedure that only returns, with and without branch threading", () => {
    const src = "global x; proc f() { return; } proc main() { x = 2; f(); }";
    expect(runNql(src).globals).toEqual({ x: 2 });
    expect(runNql(src, {}, { optimizeBranches: true }).globals).toEqual({ x: 2 });
  });

  it("compiles an empty procedure", () => {
    const src = "global x; proc nothing() { } proc main() { nothing(); x = 1; }";
    expect(runNql(src).globals).toEqual({ x: 1 });
  });

  it("builds programs from AST constructors", () => {
    const p = program(
      ["n", "sum"],
      proc("addTo", ["k", "acc"], assign("acc", add(v("acc"), v("k")))),
      proc("main", [],
        whileLoop(compare(">", v("n"), lit(0)),
          call("addTo", "n", "sum"),
          assign("n", monus(v("n"), lit(1)))
        )
      )
    );
    const machine = buildProgramMachine(p);
    loadGlobals(machine, p, { n: 3 });
    machine.run();
    expect(globalValues(machine, p)).toEqual({ n: 0, sum: 6 });
  });

  it("stops a program that never halts at the step limit", () => {
    const machine = buildSourceMachine("proc main() { while (0 == 0) { } }");
    expect(() => machine.run(10_000)).toThrow(StepLimitExceededError);
  });
});

describe("compile errors", () => {
  const compileError = (src: string): unknown => {
    try {
      buildSourceMachine(src);
    } catch (e) {
      return e;
    }
    return undefined;
  };

  it("reports an undeclared variable with its location", () => {
    const e = compileError("proc main() {\n  x = 1;\n}");
    expect(e).toBeInstanceOf(UndefinedSymbolError);
    expect(e).toMatchObject({ symbol: "x", kind: "variable", span: { startLine: 2, startCol: 3 } });
  });

  it("reports an unknown procedure", () => {
    expect(compileError("proc main() { nope(); }")).toMatchObject({ symbol: "nope", kind: "procedure" });
  });

  it("requires a main procedure", () => {
    const e = compileError("proc other() { }");
    expect(e).toBeInstanceOf(UndefinedSymbolError);
    expect(e).toMatchObject({ symbol: "main", kind: "procedure" });
  });

  it("checks argument counts", () => {
    const e = compileError("global a; proc f(x, y) { } proc main() { f(a); }");
    expect(e).toBeInstanceOf(ArityMismatchError);
    expect(e).toMatchObject({ proc: "f", expected: 2, actual: 1 });
  });

  it("rejects recursion as a construction cycle", () => {
    const e = compileError("proc f() { f(); } proc main() { f(); }");
    expect(e).toBeInstanceOf(CycleDetectedError);
    expect(e).toMatchObject({ op: "instantiate", args: ["f"] });
  });

  it("rejects preloading a name that is not a global", () => {
    const p = program(["a"], proc("main", []));
    const machine = buildProgramMachine(p);
    expect(() => loadGlobals(machine, p, { b: 1 })).toThrow(UndefinedSymbolError);
  });
});
