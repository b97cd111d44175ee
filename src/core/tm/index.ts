// src/core/tm/index.ts
export { TapeState, HALT, isHalt, defineState } from "./state";
export type { Bit, Move, Halt, Next, Transition, StateSpec } from "./state";
export { Tape } from "./tape";
