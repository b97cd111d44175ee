// test/compiler/builder.spec.ts
// Memo tables and builder context

import { describe, it, expect } from "vitest";
import { MemoTable, createBuilderContext, gensym, newSubroutine } from "../../src/core/compiler/builder";
import { CycleDetectedError } from "../../src/core/errors";
import { HALT } from "../../src/core/tm/state";

describe("MemoTable", () => {
  it("builds each (op, args) once", () => {
    const table = new MemoTable<{ n: number }>();
    let builds = 0;
    const make = (n: number) => table.lookup("thing", [n], () => {
      builds++;
      return { n };
    });

    const first = make(1);
    expect(make(1)).toBe(first);
    expect(make(2)).not.toBe(first);
    expect(builds).toBe(2);
    expect(table.size).toBe(2);
  });

  it("keeps keys with different argument types apart", () => {
    const table = new MemoTable<string>();
    expect(table.lookup("k", [1], () => "number")).toBe("number");
    expect(table.lookup("k", ["1"], () => "string")).toBe("string");
  });

  it("reports re-entrant construction as a cycle", () => {
    const table = new MemoTable<number>();
    const loop = (): number => table.lookup("loop", [7, "x"], () => loop() + 1);
    let caught: unknown;
    try {
      loop();
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CycleDetectedError);
    expect(caught).toMatchObject({ op: "loop", args: [7, "x"], code: "CYCLE_DETECTED" });
  });

  it("does not cache a failed build", () => {
    const table = new MemoTable<number>();
    expect(() => table.lookup("flaky", [], () => { throw new Error("boom"); })).toThrow("boom");
    expect(table.lookup("flaky", [], () => 42)).toBe(42);
  });
});

describe("createBuilderContext", () => {
  it("fills in defaults", () => {
    const ctx = createBuilderContext();
    expect(ctx.config).toEqual({ pcBits: 30, branchMode: "patch", optimizeBranches: false });
    expect(ctx.registerList).toEqual([]);
  });

  it("applies overrides", () => {
    const ctx = createBuilderContext({ pcBits: 4, branchMode: "relative" });
    expect(ctx.config).toEqual({ pcBits: 4, branchMode: "relative", optimizeBranches: false });
  });

  it("numbers subroutines and labels per context", () => {
    const ctx = createBuilderContext();
    const a = newSubroutine(ctx, { entry: HALT, order: 0, name: "a" });
    const b = newSubroutine(ctx, { entry: HALT, order: 0, name: "b" });
    expect([a.id, b.id]).toEqual([1, 2]);
    expect(a.childMap.size).toBe(0);
    expect(a.isDecrement).toBe(false);

    expect(gensym(ctx)).toBe("L1");
    expect(gensym(ctx)).toBe("L2");
    expect(gensym(createBuilderContext())).toBe("L1");
  });
});
