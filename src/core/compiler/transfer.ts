// src/core/compiler/transfer.ts
// Destructive move: empty one register into any number of others.

import type { BuilderContext } from "./builder";
import { makesub } from "./makesub";
import type { Register, Subroutine } from "./types";
import { goto, label } from "./types";

/**
 * Repeatedly decrement `source` and increment every target until `source`
 * is zero. With no targets this clears `source`.
 */
export function transfer(ctx: BuilderContext, source: Register, ...targets: Register[]): Subroutine {
  const name = `transfer(${[source, ...targets].map(r => r.name).join(",")})`;
  return makesub(
    ctx,
    [
      label("again"),
      source.dec,
      goto("zero"),
      ...targets.map(t => t.inc),
      goto("again"),
      label("zero"),
    ],
    name
  );
}
