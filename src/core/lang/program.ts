// src/core/lang/program.ts
// Whole-program compilation: procedure instantiation and machine building.
//
// Procedures are instantiated per distinct argument-register tuple, so
// `square(a, b)` and `square(b, a)` are two subprograms while repeated calls
// with the same registers share one. Recursion is a construction cycle.

import { ArityMismatchError, UndefinedSymbolError } from "../errors";
import type { BuilderContext } from "../compiler/builder";
import { halt, noop } from "../compiler/dispatch";
import { makesub } from "../compiler/makesub";
import { register } from "../compiler/registers";
import type { Subroutine } from "../compiler/types";
import { buildMachine } from "../machine/build";
import type { BuildOptions, CompileMain } from "../machine/build";
import type { Machine } from "../machine/machine";
import type { Span } from "../../outcome/diagnostic";
import type { Program } from "./ast";
import { GLOBAL_PREFIX, SubEmitter } from "./emit";
import { parseProgramOrThrow } from "./parse";

export const MAIN_PROC = "main";

/** Compile procedure `name` with its parameters bound to `args` (register names). */
export function instantiate(ctx: BuilderContext, program: Program, name: string, args: readonly string[], span?: Span): Subroutine {
  return ctx.subroutines.lookup("instantiate", [name, ...args], () => {
    const decl = program.procs.find(p => p.name === name);
    if (!decl) throw new UndefinedSymbolError(name, "procedure", span);
    if (decl.params.length !== args.length) {
      throw new ArityMismatchError(name, decl.params.length, args.length, span);
    }

    const bindings = new Map(decl.params.map((p, k): [string, string] => [p, args[k]]));
    const emitter = new SubEmitter(ctx, program.globals, bindings, (callee, calleeArgs, callSpan) =>
      instantiate(ctx, program, callee, calleeArgs, callSpan)
    );
    emitter.stmt(decl.body);
    const parts = emitter.finish();
    if (name === MAIN_PROC) parts.push(halt(ctx));
    else if (parts.length === 0) parts.push(noop(ctx, 0));
    return makesub(ctx, parts, `${name}(${args.join(",")})`);
  });
}

/** The main-program callback for the machine builder. Globals get the lowest tape slots. */
export function compileProgram(program: Program): CompileMain {
  return (ctx: BuilderContext) => {
    for (const g of program.globals) register(ctx, `${GLOBAL_PREFIX}${g}`);
    return instantiate(ctx, program, MAIN_PROC, []);
  };
}

export function buildProgramMachine(program: Program, options?: BuildOptions): Machine {
  return buildMachine(compileProgram(program), options);
}

/** Parse and build in one step. Throws ParseError on syntax errors. */
export function buildSourceMachine(src: string, options?: BuildOptions, file?: string): Machine {
  return buildProgramMachine(parseProgramOrThrow(src, file), options);
}

/** Values of the program's globals, by source name. */
export function globalValues(machine: Machine, program: Program): Record<string, number> {
  const regs = machine.registerValues();
  const out: Record<string, number> = {};
  for (const g of program.globals) out[g] = regs[`${GLOBAL_PREFIX}${g}`] ?? 0;
  return out;
}

/** Preload globals (by source name) before running. */
export function loadGlobals(machine: Machine, program: Program, values: Readonly<Record<string, number>>): void {
  const byRegister: Record<string, number> = {};
  for (const [name, value] of Object.entries(values)) {
    if (!program.globals.includes(name)) throw new UndefinedSymbolError(name, "variable");
    byRegister[`${GLOBAL_PREFIX}${name}`] = value;
  }
  machine.loadRegisters(byRegister);
}
