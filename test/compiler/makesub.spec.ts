// test/compiler/makesub.spec.ts
// Subprogram layout, branch resolution and the goto pre-pass

import { describe, it, expect } from "vitest";
import { createBuilderContext } from "../../src/core/compiler/builder";
import { halt, noop } from "../../src/core/compiler/dispatch";
import { makesub, threadBranches } from "../../src/core/compiler/makesub";
import { register } from "../../src/core/compiler/registers";
import { goto, label } from "../../src/core/compiler/types";
import type { Part, Subroutine } from "../../src/core/compiler/types";
import { DuplicateLabelError, EmptySubprogramError, UnresolvedLabelError } from "../../src/core/errors";
import { HALT } from "../../src/core/tm/state";

function children(sub: Subroutine): Record<string, string> {
  return Object.fromEntries([...sub.childMap.entries()].map(([k, v]) => [k, v.name]));
}

function describeParts(parts: Part[]): string[] {
  return parts.map(p => (p.tag === "Subroutine" ? p.name : `${p.tag === "Label" ? ":" : ">"}${p.name}`));
}

describe("makesub layout", () => {
  it("compiles a lone halt to the halt itself", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    const sub = makesub(ctx, [halt(ctx)], "h");
    expect(sub.order).toBe(0);
    expect(sub.entry).toBe(HALT);
    expect(children(sub)).toEqual({ "": "halt" });
  });

  it("pads with noops to keep children aligned", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    const r = register(ctx, "r");
    const sub = makesub(ctx, [r.inc, noop(ctx, 1)], "aligned");
    expect(sub.order).toBe(2);
    expect(children(sub)).toEqual({ "00": "inc.r", "01": "noop.0", "1": "noop.1" });
  });

  it("rounds the size up to a power of two", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    const r = register(ctx, "r");
    const sub = makesub(ctx, [r.inc, r.inc, r.inc], "three");
    expect(sub.order).toBe(2);
    expect(children(sub)).toEqual({ "00": "inc.r", "01": "inc.r", "10": "inc.r", "11": "noop.0" });
  });

  it("names dispatch states after the subprogram and prefix", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    const r = register(ctx, "r");
    const sub = makesub(ctx, [r.inc, r.dec], "pair");
    expect(sub.entry).not.toBe(HALT);
    if (sub.entry.tag === "TapeState") {
      expect(sub.entry.name).toBe("pair[]");
      expect(sub.entry.move(0)).toBe("R");
      expect(sub.entry.next(0)).toBe(r.inc.entry);
      expect(sub.entry.next(1)).toBe(r.dec.entry);
    }
  });

  it("resolves backward and exiting gotos", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    const r = register(ctx, "r");
    const back = makesub(ctx, [label("top"), r.inc, goto("top")], "back");
    expect(children(back)).toEqual({ "0": "inc.r", "1": "jump.0" });

    const out = makesub(ctx, [goto("end"), r.inc, label("end")], "out");
    expect(children(out)).toEqual({ "0": "jump.0+", "1": "inc.r" });
  });

  it("memoises by name and parts", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    const r = register(ctx, "r");
    const a = makesub(ctx, [r.inc, r.dec], "same");
    expect(makesub(ctx, [r.inc, r.dec], "same")).toBe(a);
    expect(makesub(ctx, [r.inc, r.dec], "other")).not.toBe(a);
    expect(makesub(ctx, [r.dec, r.inc], "same")).not.toBe(a);
  });

  it("rejects unresolved and duplicate labels", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    const r = register(ctx, "r");
    expect(() => makesub(ctx, [r.inc, goto("nowhere")], "bad")).toThrow(UnresolvedLabelError);
    expect(() => makesub(ctx, [label("x"), r.inc, label("x")], "dup")).toThrow(DuplicateLabelError);
  });

  it("rejects programs with no instructions", () => {
    const ctx = createBuilderContext({ pcBits: 8 });
    expect(() => makesub(ctx, [], "empty")).toThrow(EmptySubprogramError);
    expect(() => makesub(ctx, [label("only")], "labels")).toThrow(EmptySubprogramError);
  });
});

describe("threadBranches", () => {
  it("drops a goto to the next instruction", () => {
    const ctx = createBuilderContext();
    const r = register(ctx, "r");
    expect(describeParts(threadBranches([goto("a"), label("b"), label("a"), r.inc]))).toEqual([":b", ":a", "inc.r"]);
  });

  it("keeps the goto that fills a decrement's zero exit", () => {
    const ctx = createBuilderContext();
    const r = register(ctx, "r");
    const parts = [r.dec, goto("z"), label("z"), r.inc];
    expect(describeParts(threadBranches(parts))).toEqual(["dec.r", ">z", ":z", "inc.r"]);
  });

  it("threads chains of gotos to their final target", () => {
    const ctx = createBuilderContext();
    const r = register(ctx, "r");
    const parts = [goto("a"), r.inc, label("a"), goto("b"), r.inc, label("b")];
    expect(describeParts(threadBranches(parts))).toEqual([">b", "inc.r", ":a", "inc.r", ":b"]);
  });

  it("terminates on goto cycles", () => {
    const parts = [label("a"), goto("b"), label("b"), goto("a")];
    expect(describeParts(threadBranches(parts))).toEqual([":a", ">a", ":b", ">b"]);
  });

  it("is applied during layout when enabled", () => {
    const ctx = createBuilderContext({ pcBits: 8, optimizeBranches: true });
    const r = register(ctx, "r");
    const sub = makesub(ctx, [r.inc, goto("next"), label("next"), r.inc], "opt");
    expect(sub.order).toBe(1);
    expect(children(sub)).toEqual({ "0": "inc.r", "1": "inc.r" });
  });
});
