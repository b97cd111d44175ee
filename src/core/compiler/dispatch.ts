// src/core/compiler/dispatch.ts
// PC dispatch and the control primitives built on the carry chain.
//
// Tape layout: cell 0 is left of the PC, cells 1..pcBits hold the PC (MSB
// first). Every instruction ends with the head on some PC bit, entering
// `dispatchOrder(order, carry)`: the chain walks left to cell 0, adding the
// carry into each bit it passes, then steps right into the dispatch root,
// which reads the PC from the MSB down to select the next instruction.

import { SizeMismatchError } from "../errors";
import { HALT, TapeState, defineState } from "../tm/state";
import type { Bit, Next } from "../tm/state";
import type { BuilderContext } from "./builder";
import { newSubroutine } from "./builder";
import type { Subroutine } from "./types";

// ─────────────────────────────────────────────────────────────────
// Bit strings
// ─────────────────────────────────────────────────────────────────

/** `n` as a big-endian bit string of exactly `width` bits ("" for width 0). */
export function makeBits(n: number, width: number): string {
  if (width === 0) return "";
  return n.toString(2).padStart(width, "0").slice(-width);
}

function bitAt(bits: string, i: number): Bit {
  return bits[i] === "1" ? 1 : 0;
}

/** Index of the lowest set bit. */
export function lowestSetBit(n: number): number {
  let k = 0;
  while (n % 2 ** (k + 1) === 0) k++;
  return k;
}

// ─────────────────────────────────────────────────────────────────
// Dispatch root and carry chain
// ─────────────────────────────────────────────────────────────────

/** The state that reads PC bit 0. Defined once the top program is known. */
export function dispatchRoot(ctx: BuilderContext): TapeState {
  return ctx.states.lookup("root", [], () => new TapeState());
}

/**
 * Entered with the head on the PC bit of weight `2^order`; propagates `carry`
 * through the remaining higher bits and re-dispatches.
 */
export function dispatchOrder(ctx: BuilderContext, order: number, carry: boolean): TapeState {
  return ctx.states.lookup("dispatchOrder", [order, carry], () => {
    const { pcBits } = ctx.config;
    if (order > pcBits) throw new SizeMismatchError(pcBits, order);
    if (order === pcBits) {
      return defineState({ name: "!ENTRY", move: "R", next: dispatchRoot(ctx) });
    }
    if (carry) {
      return defineState({
        name: `dispatch.${order}.carry`,
        move: "L",
        write0: 1,
        next0: dispatchOrder(ctx, order + 1, false),
        write1: 0,
        next1: dispatchOrder(ctx, order + 1, true),
      });
    }
    return defineState({ name: `dispatch.${order}`, move: "L", next: dispatchOrder(ctx, order + 1, false) });
  });
}

/** Resume at PC + 1 (head on the last PC bit). */
export function nextState(ctx: BuilderContext): TapeState {
  return dispatchOrder(ctx, 0, true);
}

/** Resume at PC + 2 (head on the last PC bit). */
export function nextState2(ctx: BuilderContext): TapeState {
  return ctx.states.lookup("nextState2", [], () =>
    defineState({ name: "nextstate2", move: "L", next: dispatchOrder(ctx, 1, true) })
  );
}

// ─────────────────────────────────────────────────────────────────
// Fixed subroutines
// ─────────────────────────────────────────────────────────────────

/** `2^order` slots that do nothing but advance the PC past themselves. */
export function noop(ctx: BuilderContext, order: number): Subroutine {
  return ctx.subroutines.lookup("noop", [order], () =>
    newSubroutine(ctx, {
      entry: defineState({ name: `noop.${order}`, move: "L", next: dispatchOrder(ctx, order, true) }),
      order,
      name: `noop.${order}`,
    })
  );
}

export function halt(ctx: BuilderContext): Subroutine {
  return ctx.subroutines.lookup("halt", [], () => newSubroutine(ctx, { entry: HALT, order: 0, name: "halt" }));
}

// ─────────────────────────────────────────────────────────────────
// Branches
// ─────────────────────────────────────────────────────────────────

/**
 * Overwrite the lowest `bits.length` PC bits with `bits`, then dispatch
 * (carrying into the bit above them when `carry` is set).
 */
export function jump(ctx: BuilderContext, bits: string, carry: boolean): Subroutine {
  return ctx.subroutines.lookup("jump", [bits, carry], () => {
    const name = `jump.${bits}${carry ? "+" : ""}`;
    const steps: TapeState[] = [];
    for (let i = 0; i <= bits.length; i++) steps.push(new TapeState());
    const after = (i: number): Next => (i + 1 < steps.length ? steps[i + 1] : dispatchOrder(ctx, bits.length, carry));

    steps[0].define({ name: `${name}.0`, move: "L", next: after(0) });
    for (let i = 0; i < bits.length; i++) {
      steps[i + 1].define({
        name: `${name}.${i + 1}`,
        move: "L",
        write: bitAt(bits, bits.length - 1 - i),
        next: after(i + 1),
      });
    }
    return newSubroutine(ctx, { entry: steps[0], order: 0, name });
  });
}

/** One column of the ripple adder: adds bit `i` (from the LSB) of `bits`. */
function adderBit(ctx: BuilderContext, bits: string, i: number, carry: 0 | 1, propagate: boolean): TapeState {
  return ctx.states.lookup("adderBit", [bits, i, carry, propagate], () => {
    if (i === bits.length) return dispatchOrder(ctx, bits.length, carry === 1 && propagate);
    const k = bitAt(bits, bits.length - 1 - i);
    const s0 = k + carry;
    const s1 = 1 + k + carry;
    return defineState({
      name: `add.${bits}.${i}.${carry}`,
      move: "L",
      write0: s0 % 2 === 1 ? 1 : 0,
      next0: adderBit(ctx, bits, i + 1, s0 >= 2 ? 1 : 0, propagate),
      write1: s1 % 2 === 1 ? 1 : 0,
      next1: adderBit(ctx, bits, i + 1, s1 >= 2 ? 1 : 0, propagate),
    });
  });
}

/**
 * Add `bits` to the low PC bits. The carry out of the top column reaches the
 * higher bits only when `propagate` is set (forward branches).
 */
export function adder(ctx: BuilderContext, bits: string, propagate: boolean): Subroutine {
  return ctx.subroutines.lookup("adder", [bits, propagate], () => {
    const name = `add.${bits}${propagate ? "+" : ""}`;
    const entry = defineState({ name, move: "L", next: adderBit(ctx, bits, 0, 0, propagate) });
    return newSubroutine(ctx, { entry, order: 0, name });
  });
}

/**
 * The one-slot subroutine that moves the PC from slot `pos` to slot `target`
 * of a subprogram of the given order. `target === 2^order` leaves the subprogram.
 */
export function branch(ctx: BuilderContext, pos: number, target: number, order: number): Subroutine {
  const size = 2 ** order;
  if (ctx.config.branchMode === "relative") {
    const delta = target - pos;
    return adder(ctx, makeBits(((delta % size) + size) % size, order), delta >= 0);
  }
  if (target === size) return jump(ctx, makeBits(0, order), true);
  if (ctx.config.branchMode === "absolute") return jump(ctx, makeBits(target, order), false);

  let m = 0;
  while (Math.floor(pos / 2 ** m) !== Math.floor(target / 2 ** m)) m++;
  return jump(ctx, makeBits(target % 2 ** m, m), false);
}

// ─────────────────────────────────────────────────────────────────
// Dispatch trees
// ─────────────────────────────────────────────────────────────────

/**
 * Decision tree over `order` PC bits selecting among the children.
 * Each inner node reads a bit and moves right; a prefix found in
 * `childMap` ends the walk at that child's entry.
 */
export function dispatcher(
  ctx: BuilderContext,
  childMap: ReadonlyMap<string, Subroutine>,
  name: string,
  order: number
): Next {
  const shape = [...childMap.entries()]
    .map(([prefix, sub]) => `${prefix}=${sub.id}`)
    .sort();
  return ctx.targets.lookup("dispatcher", [name, order, ...shape], () => {
    const node = (prefix: string): Next => {
      const child = childMap.get(prefix);
      if (child) return child.entry;
      if (prefix.length >= order) {
        throw new Error(`dispatcher: no child covers prefix '${prefix}' of '${name}'`);
      }
      return defineState({
        name: `${name}[${prefix}]`,
        move: "R",
        next0: node(`${prefix}0`),
        next1: node(`${prefix}1`),
      });
    };
    return node("");
  });
}
