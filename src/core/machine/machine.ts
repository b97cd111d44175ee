// src/core/machine/machine.ts
// A finished Turing machine: transition table, minimisation and simulator.

import { SizeMismatchError, StepLimitExceededError, UndefinedSymbolError } from "../errors";
import type { BuilderContext } from "../compiler/builder";
import { dispatchOrder, dispatchRoot } from "../compiler/dispatch";
import type { Register, Subroutine } from "../compiler/types";
import { HALT, TapeState, isHalt } from "../tm/state";
import type { Bit, Next } from "../tm/state";
import { Tape } from "../tm/tape";

export const DEFAULT_MAX_STEPS = 100_000_000;

export type MachineStatus = "ready" | "running" | "halted";

/** Called after every simulated step. */
export type StepObserver = (m: Machine) => void;

export class Machine {
  readonly tape = new Tape();
  private entryState: TapeState;
  private current: Next;
  private stepCount = 0;

  constructor(readonly ctx: BuilderContext, readonly top: Subroutine) {
    if (top.order !== ctx.config.pcBits) throw new SizeMismatchError(ctx.config.pcBits, top.order);
    const root = dispatchRoot(ctx);
    if (isHalt(top.entry)) root.define({ name: "halt.entry", move: "R", next: HALT });
    else root.clone(top.entry);
    this.entryState = dispatchOrder(ctx, ctx.config.pcBits, false);
    this.current = this.entryState;
  }

  get pcBits(): number {
    return this.ctx.config.pcBits;
  }

  get entry(): TapeState {
    return this.entryState;
  }

  /** The state about to run, or HALT. */
  get state(): Next {
    return this.current;
  }

  get steps(): number {
    return this.stepCount;
  }

  get status(): MachineStatus {
    if (isHalt(this.current)) return "halted";
    return this.stepCount === 0 ? "ready" : "running";
  }

  get registers(): readonly Register[] {
    return this.ctx.registerList;
  }

  // ─────────────────────────────────────────────────────────────────
  // Graph
  // ─────────────────────────────────────────────────────────────────

  /** States reachable from the entry, depth first, without HALT. */
  reachable(): TapeState[] {
    const seen = new Set<TapeState>();
    const order: TapeState[] = [];
    const stack: Next[] = [this.entryState];
    while (stack.length > 0) {
      const s = stack.pop();
      if (s === undefined || isHalt(s) || seen.has(s)) continue;
      seen.add(s);
      order.push(s);
      stack.push(s.next(1), s.next(0));
    }
    return order;
  }

  /**
   * Merge states with identical transition functions until nothing changes.
   * Returns the number of reachable states removed.
   */
  compress(): number {
    const before = this.reachable().length;
    let changed = true;
    while (changed) {
      changed = false;
      const states = this.reachable();
      const ids = new Map<TapeState, number>();
      states.forEach((s, i) => ids.set(s, i));
      const idOf = (n: Next): number => (isHalt(n) ? -1 : ids.get(n) ?? -2);

      const canonical = new Map<string, TapeState>();
      const replacement = new Map<TapeState, TapeState>();
      for (const s of states) {
        const t0 = s.transition(0);
        const t1 = s.transition(1);
        const key = [idOf(t0.next), idOf(t1.next), t0.write, t1.write, t0.move, t1.move].join(",");
        const first = canonical.get(key);
        if (first) replacement.set(s, first);
        else canonical.set(key, s);
      }
      if (replacement.size === 0) break;

      for (const s of states) {
        for (const b of [0, 1] as const) {
          const n = s.next(b);
          const r = isHalt(n) ? undefined : replacement.get(n);
          if (r) {
            s.redirect(b, r);
            changed = true;
          }
        }
      }
      const r = replacement.get(this.entryState);
      if (r) {
        this.entryState = r;
        if (this.stepCount === 0) this.current = r;
        changed = true;
      }
    }
    return before - this.reachable().length;
  }

  /** One line per reachable state, sorted by name: `NAME = w0 d0 next0 w1 d1 next1`. */
  transitionTable(): string[] {
    const lines = this.reachable().map(s => {
      const t0 = s.transition(0);
      const t1 = s.transition(1);
      return `${s.name} = ${t0.write} ${t0.move} ${t0.next.name} ${t1.write} ${t1.move} ${t1.next.name}`;
    });
    return lines.sort();
  }

  print(): string {
    return this.transitionTable().join("\n");
  }

  /** Every subroutine under the top program, depth first, each once. */
  subroutines(): Subroutine[] {
    const seen = new Set<Subroutine>();
    const stack: Subroutine[] = [this.top];
    const out: Subroutine[] = [];
    while (stack.length > 0) {
      const sub = stack.pop();
      if (sub === undefined || seen.has(sub)) continue;
      seen.add(sub);
      out.push(sub);
      for (const prefix of [...sub.childMap.keys()].sort()) {
        const child = sub.childMap.get(prefix);
        if (child) stack.push(child);
      }
    }
    return out;
  }

  /** Subroutine tree listing: each subroutine's order and the prefix of every child. */
  describeSubroutines(): string {
    const blocks = this.subroutines().map(sub => {
      const lines = [`NAME: ${sub.name} ORDER: ${sub.order}`];
      for (const prefix of [...sub.childMap.keys()].sort()) {
        lines.push(`    ${prefix.padEnd(sub.order)} -> ${sub.childMap.get(prefix)?.name ?? "?"}`);
      }
      return lines.join("\n");
    });
    return blocks.join("\n\n");
  }

  // ─────────────────────────────────────────────────────────────────
  // Simulation
  // ─────────────────────────────────────────────────────────────────

  /** Current state and the visited tape, the head's cell in brackets. */
  traceLine(): string {
    const [lo, hi] = this.tape.bounds();
    const pos = this.tape.position;
    const tape = `${this.tape.render(lo, pos)}[${this.tape.read()}]${this.tape.render(pos + 1, hi)}`;
    return `${this.current.name} ${tape}`;
  }

  /** Run one transition. Returns false once the machine has halted. */
  step(): boolean {
    const s = this.current;
    if (isHalt(s)) return false;
    const t = s.transition(this.tape.read());
    this.tape.write(t.write);
    this.tape.move(t.move);
    this.current = t.next;
    this.stepCount++;
    return true;
  }

  /**
   * Step until HALT. Returns the total number of steps taken.
   * Throws once `maxSteps` steps have run without halting.
   */
  run(maxSteps = DEFAULT_MAX_STEPS, observe?: StepObserver): number {
    while (!isHalt(this.current)) {
      if (this.stepCount >= maxSteps) throw new StepLimitExceededError(maxSteps);
      this.step();
      observe?.(this);
    }
    return this.stepCount;
  }

  // ─────────────────────────────────────────────────────────────────
  // Tape contents
  // ─────────────────────────────────────────────────────────────────

  /** First cell of register 0. */
  private get registerBase(): number {
    return 1 + this.pcBits + 2;
  }

  /** The program counter as currently written on the tape. */
  pc(): number {
    let v = 0;
    for (let i = 0; i < this.pcBits; i++) v = v * 2 + this.tape.get(1 + i);
    return v;
  }

  /**
   * Write initial register values. Registers not named start at zero.
   * Must be called before the first step.
   */
  loadRegisters(values: Readonly<Record<string, number>>): void {
    if (this.stepCount > 0) throw new Error("loadRegisters: machine has already started");
    for (const name of Object.keys(values)) {
      if (!this.registers.some(r => r.name === name)) throw new UndefinedSymbolError(name, "variable");
    }
    let p = this.registerBase;
    const put = (b: Bit) => this.tape.set(p++, b);
    for (const r of this.registers) {
      const v = values[r.name] ?? 0;
      if (!Number.isInteger(v) || v < 0) {
        throw new RangeError(`loadRegisters: '${r.name}' must be a natural number, got ${v}`);
      }
      for (let i = 0; i <= v; i++) put(1);
      put(0);
    }
  }

  /** Decode every register from the tape. Registers never initialised read as 0. */
  registerValues(): Record<string, number> {
    const out: Record<string, number> = {};
    let p = this.registerBase;
    for (const r of this.registers) {
      let ones = 0;
      while (this.tape.get(p) === 1) {
        ones++;
        p++;
      }
      if (ones === 0) {
        out[r.name] = 0;
        continue;
      }
      out[r.name] = ones - 1;
      p++;
    }
    return out;
  }
}
