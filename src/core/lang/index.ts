// src/core/lang/index.ts
export * from "./ast";
export { tokenize, KEYWORDS } from "./tokenize";
export type { Tok, Keyword, Operator, TokenizeResult } from "./tokenize";
export { parseProgram, parseProgramOrThrow } from "./parse";
export type { ParseResult } from "./parse";
export { SubEmitter, GLOBAL_PREFIX, SCRATCH_PREFIX } from "./emit";
export type { CallResolver } from "./emit";
export {
  MAIN_PROC,
  instantiate,
  compileProgram,
  buildProgramMachine,
  buildSourceMachine,
  globalValues,
  loadGlobals,
} from "./program";
