// src/core/machine/build.ts
// Two-pass machine construction.
//
// The program counter width depends on the size of the top-level program, and
// the carry chain states depend on the width. The first pass builds with a
// generous width to learn the size; the second rebuilds at exactly that width.

import { SizeMismatchError } from "../errors";
import type { BuilderContext } from "../compiler/builder";
import { createBuilderContext } from "../compiler/builder";
import { makesub } from "../compiler/makesub";
import type { BranchMode, BuilderConfig, Subroutine } from "../compiler/types";
import { Machine } from "./machine";

/** Compiles the main program into the given context (allocating its registers). */
export type CompileMain = (ctx: BuilderContext) => Subroutine;

export type BuildOptions = {
  speculativePcBits?: number;
  branchMode?: BranchMode;
  optimizeBranches?: boolean;
};

export const DEFAULT_SPECULATIVE_PC_BITS = 30;

/** Main program preceded by one `init` per register, in allocation order. */
export function buildTop(ctx: BuilderContext, compileMain: CompileMain): Subroutine {
  const main = compileMain(ctx);
  return makesub(ctx, [...ctx.registerList.map(r => r.init), main], "top");
}

export function buildMachine(compileMain: CompileMain, options: BuildOptions = {}): Machine {
  const shared: Omit<BuilderConfig, "pcBits"> = {
    branchMode: options.branchMode ?? "patch",
    optimizeBranches: options.optimizeBranches ?? false,
  };

  const probe = createBuilderContext({ ...shared, pcBits: options.speculativePcBits ?? DEFAULT_SPECULATIVE_PC_BITS });
  const pcBits = buildTop(probe, compileMain).order;

  const ctx = createBuilderContext({ ...shared, pcBits });
  const top = buildTop(ctx, compileMain);
  if (top.order !== pcBits) throw new SizeMismatchError(pcBits, top.order);
  return new Machine(ctx, top);
}
