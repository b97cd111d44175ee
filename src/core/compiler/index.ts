// src/core/compiler/index.ts
export * from "./types";
export { MemoTable, createBuilderContext, newSubroutine, gensym, DEFAULT_BUILDER_CONFIG } from "./builder";
export type { BuilderContext, MemoArg } from "./builder";
export {
  makeBits,
  dispatchRoot,
  dispatchOrder,
  nextState,
  nextState2,
  noop,
  halt,
  jump,
  adder,
  branch,
  dispatcher,
} from "./dispatch";
export { register } from "./registers";
export type { RegisterOp } from "./registers";
export { makesub, threadBranches } from "./makesub";
export { transfer } from "./transfer";
