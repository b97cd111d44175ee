// src/core/compiler/registers.ts
// Unary registers on the tape and their inc / dec / init leaves.
//
// Register file layout (after the PC and two zero separator cells):
//
//   r0      r1      r2
//   1^(n0+1) 0 1^(n1+1) 0 1^(n2+1) 0 0 0 ...
//
// A register therefore always holds at least one 1, so a run of two zeros
// only ever appears at the separator (scanning left) or past the last
// register (scanning right). `init` writes the leading 1 of a register that
// does not exist yet; on a tape that already holds the register it rewrites
// that 1 and changes nothing.

import type { BuilderContext } from "./builder";
import { newSubroutine } from "./builder";
import { nextState, nextState2 } from "./dispatch";
import { TapeState, defineState } from "../tm/state";
import type { Register } from "./types";

export type RegisterOp = "inc" | "dec" | "init";

// ─────────────────────────────────────────────────────────────────
// Return scans
// ─────────────────────────────────────────────────────────────────

/**
 * Walk left over the register file to the separator, landing on the last PC
 * bit with PC + `advance` pending.
 */
function returnScan(ctx: BuilderContext, advance: 1 | 2): TapeState {
  return ctx.states.lookup("returnScan", [advance], () => {
    const scan = new TapeState();
    const check = new TapeState();
    scan.define({ name: `return${advance}.scan`, move: "L", next1: scan, next0: check });
    check.define({
      name: `return${advance}.check`,
      move: "L",
      next1: scan,
      next0: advance === 1 ? nextState(ctx) : nextState2(ctx),
    });
    return scan;
  });
}

// ─────────────────────────────────────────────────────────────────
// Operation cores (head on the first cell of the target register)
// ─────────────────────────────────────────────────────────────────

function incrementCore(ctx: BuilderContext): TapeState {
  // Insert a 1 and shift everything up to the end of the file right by one.
  const shift1 = new TapeState();
  const shift0 = new TapeState();
  shift1.define({ name: "inc.shift.1", write: 1, move: "R", next0: shift0, next1: shift1 });
  shift0.define({
    name: "inc.shift.0",
    write: 0,
    move0: "L",
    next0: returnScan(ctx, 1),
    move1: "R",
    next1: shift1,
  });
  return shift1;
}

function decrementCore(ctx: BuilderContext): TapeState {
  const test = new TapeState();
  const probe = new TapeState();
  const seek = new TapeState();
  const cut = new TapeState();
  const hole0 = new TapeState();
  const hole1 = new TapeState();
  const fetch0 = new TapeState();
  const fetch1 = new TapeState();
  const put0 = new TapeState();
  const put1 = new TapeState();
  const retreat = new TapeState();

  test.define({ name: "dec.test", move: "R", next: probe });
  // A lone 1 is zero: leave it and take the PC + 1 exit.
  probe.define({ name: "dec.probe", move0: "L", next0: returnScan(ctx, 1), move1: "R", next1: seek });
  seek.define({ name: "dec.seek", move0: "L", next0: cut, move1: "R", next1: seek });
  cut.define({ name: "dec.cut", write: 0, move: "R", next: hole0 });
  // Close the gap: carry the cell after the hole back into it, one cell at a time.
  hole0.define({ name: "dec.hole.0", move: "R", next: fetch0 });
  hole1.define({ name: "dec.hole.1", move: "R", next: fetch1 });
  fetch0.define({ name: "dec.fetch.0", move: "L", next0: retreat, write1: 0, next1: put1 });
  fetch1.define({ name: "dec.fetch.1", move: "L", write: 0, next0: put0, next1: put1 });
  put0.define({ name: "dec.put.0", write: 0, move: "R", next: hole0 });
  put1.define({ name: "dec.put.1", write: 1, move: "R", next: hole1 });
  retreat.define({ name: "dec.retreat", move: "L", next: returnScan(ctx, 2) });
  return test;
}

function core(ctx: BuilderContext, op: RegisterOp): TapeState {
  return ctx.states.lookup("core", [op], () => {
    switch (op) {
      case "init":
        return defineState({ name: "init.core", write: 1, move: "L", next: returnScan(ctx, 1) });
      case "inc":
        return incrementCore(ctx);
      case "dec":
        return decrementCore(ctx);
    }
  });
}

/** Skip `k` registers, then run the core of `op`. */
function skip(ctx: BuilderContext, k: number, op: RegisterOp): TapeState {
  return ctx.states.lookup("skip", [k, op], () => {
    if (k === 0) return core(ctx, op);
    const s = new TapeState();
    return s.define({ name: `${op}.skip.${k}`, move: "R", next1: s, next0: skip(ctx, k - 1, op) });
  });
}

/** Leaf entry: step over the two separator cells onto register 0. */
function enter(ctx: BuilderContext, index: number, op: RegisterOp): TapeState {
  return ctx.states.lookup("enter", [index, op], () => {
    const second = defineState({ name: `${op}.${index}.enter.1`, move: "R", next: skip(ctx, index, op) });
    return defineState({ name: `${op}.${index}.enter.0`, move: "R", next: second });
  });
}

// ─────────────────────────────────────────────────────────────────
// Allocation
// ─────────────────────────────────────────────────────────────────

/** The register called `name`, allocated on first use. */
export function register(ctx: BuilderContext, name: string): Register {
  return ctx.registers.lookup("register", [name], () => {
    const index = ctx.nextRegisterIndex++;
    const reg: Register = {
      name,
      index,
      inc: newSubroutine(ctx, { entry: enter(ctx, index, "inc"), order: 0, name: `inc.${name}` }),
      dec: newSubroutine(ctx, { entry: enter(ctx, index, "dec"), order: 0, name: `dec.${name}`, isDecrement: true }),
      init: newSubroutine(ctx, { entry: enter(ctx, index, "init"), order: 0, name: `init.${name}` }),
    };
    ctx.registerList.push(reg);
    return reg;
  });
}
