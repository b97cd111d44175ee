// src/core/compiler/makesub.ts
// Subprogram compiler: lays out a code-emission sequence on power-of-two
// aligned PC slots, resolves its branches and builds its dispatch tree.

import { DuplicateLabelError, EmptySubprogramError, UnresolvedLabelError } from "../errors";
import type { BuilderContext } from "./builder";
import { newSubroutine } from "./builder";
import { branch, dispatcher, lowestSetBit, makeBits, noop } from "./dispatch";
import type { Goto, Part, Subroutine } from "./types";
import { goto, partKey } from "./types";

// ─────────────────────────────────────────────────────────────────
// Branch pre-pass
// ─────────────────────────────────────────────────────────────────

/** Index of the first non-label part at or after `name`, if the label exists. */
function labelTarget(parts: readonly Part[], name: string): number | undefined {
  const at = parts.findIndex(p => p.tag === "Label" && p.name === name);
  if (at < 0) return undefined;
  let j = at;
  while (j < parts.length && parts[j].tag === "Label") j++;
  return j;
}

/**
 * Thread goto-to-goto chains to their final label, then drop gotos whose
 * target is the very next instruction. A goto right after a decrement is
 * kept: it fills the decrement's zero exit.
 */
export function threadBranches(parts: readonly Part[]): Part[] {
  const threaded = parts.map((p): Part => {
    if (p.tag !== "Goto") return p;
    let name = p.name;
    const seen = new Set([name]);
    for (;;) {
      const j = labelTarget(parts, name);
      if (j === undefined || j >= parts.length) break;
      const hop = parts[j];
      if (hop.tag !== "Goto" || seen.has(hop.name)) break;
      name = hop.name;
      seen.add(name);
    }
    return name === p.name ? p : goto(name);
  });

  const out: Part[] = [];
  let previous: Part | undefined;
  threaded.forEach((p, i) => {
    if (p.tag === "Goto" && !(previous?.tag === "Subroutine" && previous.isDecrement)) {
      const following = new Set<string>();
      for (let j = i + 1; j < threaded.length; j++) {
        const q = threaded[j];
        if (q.tag !== "Label") break;
        following.add(q.name);
      }
      if (following.has(p.name)) return;
    }
    if (p.tag !== "Label") previous = p;
    out.push(p);
  });
  return out;
}

// ─────────────────────────────────────────────────────────────────
// Layout
// ─────────────────────────────────────────────────────────────────

type Placed = { part: Subroutine | Goto; offset: number };

/**
 * Compile `parts` into a subroutine named `name`.
 * Equal (name, parts) requests return the same subroutine.
 */
export function makesub(ctx: BuilderContext, parts: readonly Part[], name: string): Subroutine {
  return ctx.subroutines.lookup("makesub", [name, ...parts.map(partKey)], () => compile(ctx, parts, name));
}

function compile(ctx: BuilderContext, input: readonly Part[], name: string): Subroutine {
  let parts = ctx.config.optimizeBranches ? threadBranches(input) : input;
  // Threading can drop every instruction (a body of just `goto L; L:`).
  if (parts.every(p => p.tag === "Label") && input.some(p => p.tag !== "Label")) {
    parts = [...parts, noop(ctx, 0)];
  }

  const labels = new Map<string, number>();
  const placed: Placed[] = [];
  let offset = 0;

  const pad = () => {
    const o = lowestSetBit(offset);
    placed.push({ part: noop(ctx, o), offset });
    offset += 2 ** o;
  };

  for (const p of parts) {
    if (p.tag === "Label") {
      if (labels.has(p.name)) throw new DuplicateLabelError(p.name, name);
      labels.set(p.name, offset);
      continue;
    }
    const size = p.tag === "Goto" ? 1 : 2 ** p.order;
    while (offset % size !== 0) pad();
    placed.push({ part: p, offset });
    offset += size;
  }
  if (offset === 0) throw new EmptySubprogramError(name);

  let order = 0;
  while (offset > 2 ** order) order++;
  while (offset < 2 ** order) pad();

  const childMap = new Map<string, Subroutine>();
  for (const { part, offset: at } of placed) {
    let child: Subroutine;
    if (part.tag === "Goto") {
      const target = labels.get(part.name);
      if (target === undefined) throw new UnresolvedLabelError(part.name, name);
      child = branch(ctx, at, target, order);
    } else {
      child = part;
    }
    childMap.set(makeBits(at / 2 ** child.order, order - child.order), child);
  }

  return newSubroutine(ctx, { entry: dispatcher(ctx, childMap, name, order), order, name, childMap });
}
