// src/core/machine/index.ts
export { Machine, DEFAULT_MAX_STEPS } from "./machine";
export type { MachineStatus, StepObserver } from "./machine";
export { buildMachine, buildTop, DEFAULT_SPECULATIVE_PC_BITS } from "./build";
export type { CompileMain, BuildOptions } from "./build";
