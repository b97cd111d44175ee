// test/helpers/nql.ts
// Compile NQL source, preload globals and run to halt

import type { BuildOptions } from "../../src/core/machine/build";
import type { Machine } from "../../src/core/machine/machine";
import { globalValues, loadGlobals, buildProgramMachine } from "../../src/core/lang/program";
import { parseProgramOrThrow } from "../../src/core/lang/parse";
import { SCRATCH_PREFIX } from "../../src/core/lang/emit";

export type NqlRun = {
  machine: Machine;
  globals: Record<string, number>;
  /** Every scratch register's final value */
  scratch: number[];
};

export function runNql(src: string, load: Record<string, number> = {}, options?: BuildOptions): NqlRun {
  const program = parseProgramOrThrow(src);
  const machine = buildProgramMachine(program, options);
  loadGlobals(machine, program, load);
  machine.compress();
  machine.run(5_000_000);
  const scratch = Object.entries(machine.registerValues())
    .filter(([name]) => name.startsWith(SCRATCH_PREFIX))
    .map(([, value]) => value);
  return { machine, globals: globalValues(machine, program), scratch };
}
