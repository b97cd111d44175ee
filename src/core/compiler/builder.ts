// src/core/compiler/builder.ts
// Builder context: memo tables, counters and configuration for one build.
//
// Every structural constructor (dispatch chains, register leaves, subprograms)
// goes through a memo table so that equal requests share one piece of graph.
// A slot is marked pending while its value is being built; reaching a pending
// slot again means the construction recursed into itself.

import { CycleDetectedError } from "../errors";
import type { Next, TapeState } from "../tm/state";
import type { BuilderConfig, Register, Subroutine } from "./types";

// ─────────────────────────────────────────────────────────────────
// Memo tables
// ─────────────────────────────────────────────────────────────────

export type MemoArg = string | number | boolean;

type Slot<T> = { status: "pending" } | { status: "ready"; value: T };

export class MemoTable<T> {
  private readonly slots = new Map<string, Slot<T>>();

  get size(): number {
    return this.slots.size;
  }

  /**
   * Return the value stored for (op, args), building it on first use.
   * If `build` throws, the slot is released so the error is not cached.
   */
  lookup(op: string, args: readonly MemoArg[], build: () => T): T {
    const key = `${op}(${JSON.stringify(args)})`;
    const slot = this.slots.get(key);
    if (slot) {
      if (slot.status === "pending") throw new CycleDetectedError(op, args);
      return slot.value;
    }
    this.slots.set(key, { status: "pending" });
    try {
      const value = build();
      this.slots.set(key, { status: "ready", value });
      return value;
    } catch (e) {
      this.slots.delete(key);
      throw e;
    }
  }
}

// ─────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────

export type BuilderContext = {
  config: BuilderConfig;
  /** Named states: dispatch chain, return scans, register leaves */
  states: MemoTable<TapeState>;
  /** Dispatch trees; a tree over a single halt child is HALT itself */
  targets: MemoTable<Next>;
  subroutines: MemoTable<Subroutine>;
  registers: MemoTable<Register>;
  /** Registers in allocation (= tape) order */
  registerList: Register[];
  nextSubroutineId: number;
  nextRegisterIndex: number;
  nextLabelId: number;
};

export const DEFAULT_BUILDER_CONFIG: BuilderConfig = {
  pcBits: 30,
  branchMode: "patch",
  optimizeBranches: false,
};

export function createBuilderContext(config: Partial<BuilderConfig> = {}): BuilderContext {
  return {
    config: { ...DEFAULT_BUILDER_CONFIG, ...config },
    states: new MemoTable<TapeState>(),
    targets: new MemoTable<Next>(),
    subroutines: new MemoTable<Subroutine>(),
    registers: new MemoTable<Register>(),
    registerList: [],
    nextSubroutineId: 0,
    nextRegisterIndex: 0,
    nextLabelId: 0,
  };
}

export function newSubroutine(
  ctx: BuilderContext,
  init: {
    entry: Next;
    order: number;
    name: string;
    childMap?: ReadonlyMap<string, Subroutine>;
    isDecrement?: boolean;
  }
): Subroutine {
  ctx.nextSubroutineId++;
  return {
    tag: "Subroutine",
    id: ctx.nextSubroutineId,
    entry: init.entry,
    order: init.order,
    name: init.name,
    childMap: init.childMap ?? new Map(),
    isDecrement: init.isDecrement ?? false,
  };
}

/** A label name unique within this build. */
export function gensym(ctx: BuilderContext, prefix = "L"): string {
  ctx.nextLabelId++;
  return `${prefix}${ctx.nextLabelId}`;
}
