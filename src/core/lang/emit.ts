// src/core/lang/emit.ts
// Lowering of NQL statements and expressions to code-emission sequences.
//
// Every numeric expression is evaluated into a fresh scratch register that the
// caller then drains. Reading a variable is destructive on the machine, so a
// read copies it into the destination and a save register, then moves the
// save back. Scratch registers are shared between procedures: a call is only
// emitted while no scratch register is live.

import { UndefinedSymbolError } from "../errors";
import type { BuilderContext } from "../compiler/builder";
import { gensym } from "../compiler/builder";
import { noop } from "../compiler/dispatch";
import { register } from "../compiler/registers";
import { transfer } from "../compiler/transfer";
import type { Part, Register, Subroutine } from "../compiler/types";
import { goto, label } from "../compiler/types";
import type { Span } from "../../outcome/diagnostic";
import type { BoolExpr, CompareOp, NatExpr, Stmt } from "./ast";

/** Prefix of the registers that hold NQL globals. */
export const GLOBAL_PREFIX = "_G";
export const SCRATCH_PREFIX = "_scratch_";

/** Compiles a call; supplied by the program compiler. */
export type CallResolver = (proc: string, argRegisters: string[], span?: Span) => Subroutine;

/** Which outcomes of comparing l with r branch: [l < r, l == r, l > r]. */
const BRANCH_ON: Record<CompareOp, readonly [boolean, boolean, boolean]> = {
  "<": [true, false, false],
  "<=": [true, true, false],
  ">": [false, false, true],
  ">=": [false, true, true],
  "==": [false, true, false],
  "!=": [true, false, true],
};

export class SubEmitter {
  readonly parts: Part[] = [];
  private scratchCount = 0;
  private readonly live: Register[] = [];
  private readonly free: Register[] = [];
  private returnLabel: string | undefined;

  constructor(
    private readonly ctx: BuilderContext,
    private readonly globals: readonly string[],
    /** Parameter name -> argument register name */
    private readonly bindings: ReadonlyMap<string, string>,
    private readonly resolveCall: CallResolver
  ) {}

  // ─────────────────────────────────────────────────────────────────
  // Emission helpers
  // ─────────────────────────────────────────────────────────────────

  private emit(p: Part): void {
    this.parts.push(p);
  }

  private place(name: string): void {
    this.emit(label(name));
  }

  private jumpTo(name: string): void {
    this.emit(goto(name));
  }

  private fresh(): string {
    return gensym(this.ctx);
  }

  private move(source: Register, ...targets: Register[]): void {
    this.emit(transfer(this.ctx, source, ...targets));
  }

  /** The register a source name refers to. */
  resolve(name: string, span?: Span): Register {
    const bound = this.bindings.get(name);
    if (bound !== undefined) return register(this.ctx, bound);
    if (this.globals.includes(name)) return register(this.ctx, `${GLOBAL_PREFIX}${name}`);
    throw new UndefinedSymbolError(name, "variable", span);
  }

  private temp(): Register {
    let r = this.free.pop();
    if (r === undefined) {
      this.scratchCount++;
      r = register(this.ctx, `${SCRATCH_PREFIX}${this.scratchCount}`);
    }
    this.live.push(r);
    return r;
  }

  /** Release a scratch register; it must be zero again. */
  private release(r: Register): void {
    const k = this.live.indexOf(r);
    if (k >= 0) this.live.splice(k, 1);
    this.free.push(r);
  }

  // ─────────────────────────────────────────────────────────────────
  // Numeric expressions: add the value of `e` to `out`
  // ─────────────────────────────────────────────────────────────────

  nat(e: NatExpr, out: Register): void {
    switch (e.tag) {
      case "Lit":
        for (let k = 0; k < e.value; k++) this.emit(out.inc);
        return;

      case "Var": {
        const save = this.temp();
        const r = this.resolve(e.name, e.span);
        this.move(r, out, save);
        this.move(save, r);
        this.release(save);
        return;
      }

      case "Add":
        for (const term of e.terms) {
          const t = this.temp();
          this.nat(term, t);
          this.move(t, out);
          this.release(t);
        }
        return;

      case "Mul": {
        const l = this.temp();
        this.nat(e.left, l);
        const r = this.temp();
        this.nat(e.right, r);
        const save = this.temp();
        const again = this.fresh();
        const done = this.fresh();
        this.place(again);
        this.emit(l.dec);
        this.jumpTo(done);
        this.move(r, save, out);
        this.move(save, r);
        this.jumpTo(again);
        this.place(done);
        this.move(r);
        this.release(save);
        this.release(l);
        this.release(r);
        return;
      }

      case "Monus": {
        const l = this.temp();
        this.nat(e.left, l);
        const r = this.temp();
        this.nat(e.right, r);
        this.move(l, out);
        const loop = this.fresh();
        const done = this.fresh();
        this.place(loop);
        this.emit(r.dec);
        this.jumpTo(done);
        // Both exits of this decrement continue at the goto.
        this.emit(out.dec);
        this.emit(noop(this.ctx, 0));
        this.jumpTo(loop);
        this.place(done);
        this.release(l);
        this.release(r);
        return;
      }

      case "Div": {
        // Subtract the divisor from the dividend one unit at a time; every
        // complete divisor counts one. A zero divisor never terminates.
        const dividend = this.temp();
        const divisor = this.temp();
        const nextQuotient = this.fresh();
        const nextUnit = this.fresh();
        const exhausted = this.fresh();
        const full = this.fresh();
        this.nat(e.left, dividend);
        this.place(nextQuotient);
        this.nat(e.right, divisor);
        this.place(nextUnit);
        this.emit(divisor.dec);
        this.jumpTo(full);
        this.emit(dividend.dec);
        this.jumpTo(exhausted);
        this.jumpTo(nextUnit);
        this.place(full);
        this.emit(out.inc);
        this.jumpTo(nextQuotient);
        this.place(exhausted);
        this.move(divisor);
        this.release(dividend);
        this.release(divisor);
        return;
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Conditions: branch to `target` when `e` holds (or fails, if inverted)
  // ─────────────────────────────────────────────────────────────────

  test(e: BoolExpr, target: string, invert: boolean): void {
    switch (e.tag) {
      case "Not":
        this.test(e.operand, target, !invert);
        return;

      case "And":
        if (invert) {
          this.test(e.left, target, true);
          this.test(e.right, target, true);
        } else {
          const skip = this.fresh();
          this.test(e.left, skip, true);
          this.test(e.right, target, false);
          this.place(skip);
        }
        return;

      case "Or":
        if (invert) {
          const skip = this.fresh();
          this.test(e.left, skip, false);
          this.test(e.right, target, true);
          this.place(skip);
        } else {
          this.test(e.left, target, false);
          this.test(e.right, target, false);
        }
        return;

      case "Compare":
        this.compare(e.op, e.left, e.right, target, invert);
        return;
    }
  }

  /**
   * Count both operands down together. Whichever empties first decides the
   * ordering; the leftovers are cleared before branching.
   */
  private compare(op: CompareOp, left: NatExpr, right: NatExpr, target: string, invert: boolean): void {
    const [onLess, onEqual, onGreater] = BRANCH_ON[op];
    const l = this.temp();
    this.nat(left, l);
    const r = this.temp();
    this.nat(right, r);

    const step = this.fresh();
    const rightEmpty = this.fresh();
    const leftEmpty = this.fresh();
    const fallThrough = this.fresh();
    const dest = (taken: boolean) => (taken !== invert ? target : fallThrough);

    this.place(step);
    this.emit(r.dec);
    this.jumpTo(rightEmpty);
    this.emit(l.dec);
    this.jumpTo(leftEmpty);
    this.jumpTo(step);

    // r ran out first (or together): l >= r
    this.place(rightEmpty);
    if (onEqual !== onGreater) {
      this.emit(l.dec);
      this.jumpTo(dest(onEqual));
    }
    this.move(l);
    this.jumpTo(dest(onGreater));

    // l ran out first: l < r
    this.place(leftEmpty);
    this.move(r);
    this.jumpTo(dest(onLess));

    this.place(fallThrough);
    this.release(l);
    this.release(r);
  }

  // ─────────────────────────────────────────────────────────────────
  // Statements
  // ─────────────────────────────────────────────────────────────────

  stmt(s: Stmt): void {
    switch (s.tag) {
      case "Assign": {
        const t = this.temp();
        this.nat(s.value, t);
        const r = this.resolve(s.target, s.span);
        this.move(r);
        this.move(t, r);
        this.release(t);
        return;
      }

      case "Block":
        for (const inner of s.body) this.stmt(inner);
        return;

      case "While": {
        const exit = this.fresh();
        const again = this.fresh();
        this.place(again);
        this.test(s.cond, exit, true);
        this.stmt(s.body);
        this.jumpTo(again);
        this.place(exit);
        return;
      }

      case "If": {
        const otherwise = this.fresh();
        const end = this.fresh();
        this.test(s.cond, otherwise, true);
        this.stmt(s.then);
        this.jumpTo(end);
        this.place(otherwise);
        if (s.else) this.stmt(s.else);
        this.place(end);
        return;
      }

      case "Call": {
        if (this.live.length > 0) throw new Error(`call to '${s.proc}' while scratch registers are live`);
        const args = s.args.map(a => this.resolve(a, s.span).name);
        this.emit(this.resolveCall(s.proc, args, s.span));
        return;
      }

      case "Return":
        if (this.returnLabel === undefined) this.returnLabel = this.fresh();
        this.jumpTo(this.returnLabel);
        return;
    }
  }

  /** Close the sequence: place the return label if any return was emitted. */
  finish(): Part[] {
    if (this.returnLabel !== undefined) this.place(this.returnLabel);
    return this.parts;
  }
}
