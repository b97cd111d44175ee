// src/core/tm/state.ts
// Tape states: two-symbol transition functions linked into a graph.
//
// A TapeState is created undefined so that loops can refer to a state before
// its transitions are known; `define` fills it in exactly once.

import { InvalidTransitionError, RedefinitionError, UndefinedStateError } from "../errors";

export type Bit = 0 | 1;
export type Move = "L" | "R";

export type Halt = { readonly tag: "Halt"; readonly name: "HALT" };

/** The halting sentinel. It has no transitions. */
export const HALT: Halt = Object.freeze({ tag: "Halt", name: "HALT" });

export type Next = TapeState | Halt;

export type Transition = {
  write: Bit;
  move: Move;
  next: Next;
};

/**
 * Transition description accepted by `define`.
 * Per-symbol fields (`move0`, `next1`, ...) override the shared ones.
 * A missing write leaves the cell as it was read.
 */
export type StateSpec = {
  name: string;
  move?: Move;
  write?: Bit;
  next?: Next;
  move0?: Move;
  write0?: Bit;
  next0?: Next;
  move1?: Move;
  write1?: Bit;
  next1?: Next;
};

export function isHalt(x: Next): x is Halt {
  return x.tag === "Halt";
}

export class TapeState {
  readonly tag = "TapeState";
  private label: string | undefined;
  private table: [Transition, Transition] | undefined;

  get defined(): boolean {
    return this.table !== undefined;
  }

  get name(): string {
    if (this.label === undefined) throw new UndefinedStateError("name");
    return this.label;
  }

  define(spec: StateSpec): this {
    if (this.table !== undefined) throw new RedefinitionError(this.label ?? spec.name);
    const t0 = resolveTransition(spec, 0, spec.move0, spec.write0, spec.next0);
    const t1 = resolveTransition(spec, 1, spec.move1, spec.write1, spec.next1);
    this.label = spec.name;
    this.table = [t0, t1];
    return this;
  }

  /** Become a copy of another state's transition function (and name). */
  clone(other: TapeState): this {
    const t0 = other.transition(0);
    const t1 = other.transition(1);
    return this.define({
      name: other.name,
      move0: t0.move, write0: t0.write, next0: t0.next,
      move1: t1.move, write1: t1.write, next1: t1.next,
    });
  }

  /** A copy of the transition on `symbol`. */
  transition(symbol: Bit): Transition {
    return { ...this.entry(symbol) };
  }

  private entry(symbol: Bit): Transition {
    if (this.table === undefined) throw new UndefinedStateError(`transition on ${symbol}`);
    return this.table[symbol];
  }

  write(symbol: Bit): Bit {
    return this.entry(symbol).write;
  }

  move(symbol: Bit): Move {
    return this.entry(symbol).move;
  }

  next(symbol: Bit): Next {
    return this.entry(symbol).next;
  }

  /** Point one successor somewhere else. Used only by state minimisation. */
  redirect(symbol: Bit, next: Next): void {
    if (this.table === undefined) throw new UndefinedStateError(`redirect on ${symbol}`);
    this.table[symbol] = { ...this.table[symbol], next };
  }

  toString(): string {
    return this.label ?? "<undefined>";
  }
}

/** Create and define a state in one go. */
export function defineState(spec: StateSpec): TapeState {
  return new TapeState().define(spec);
}

function resolveTransition(
  spec: StateSpec,
  symbol: Bit,
  move: Move | undefined,
  write: Bit | undefined,
  next: Next | undefined
): Transition {
  const m: unknown = move ?? spec.move;
  const w: unknown = write ?? spec.write ?? symbol;
  const n: unknown = next ?? spec.next;

  if (m !== "L" && m !== "R") {
    throw new InvalidTransitionError(spec.name, `move on ${symbol} must be 'L' or 'R', got ${String(m)}`);
  }
  if (w !== 0 && w !== 1) {
    throw new InvalidTransitionError(spec.name, `write on ${symbol} must be 0 or 1, got ${String(w)}`);
  }
  let target: Next;
  if (n instanceof TapeState) target = n;
  else if (n === HALT) target = HALT;
  else throw new InvalidTransitionError(spec.name, `next on ${symbol} must be a state or HALT`);
  return { write: w, move: m, next: target };
}
