// bin/tmc-cli-lib.ts
// Shared CLI utilities for the tmc command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import {
  TmError,
  buildProgramMachine,
  formatDiagnostic,
  globalValues,
  isBranchMode,
  loadConfig,
  loadGlobals,
  parseProgram,
  validateConfig,
} from "../src";
import type { BranchMode, PartialConfig, TmcConfig } from "../src";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  file?: string;
  printAst?: boolean;
  printTm?: boolean;
  printSubs?: boolean;
  runTm?: boolean;
  trace?: boolean;
  compress?: boolean;
  optimize?: boolean;
  branchMode?: BranchMode;
  maxSteps?: number;
  config?: string;
  verbose?: boolean;
  /** Initial values of globals, from `--set name=value` */
  set: Record<string, number>;
  /** Problems found while parsing the arguments */
  errors: string[];
};

export type CliConfig = {
  file?: string;
  printAst: boolean;
  printTm: boolean;
  printSubs: boolean;
  runTm: boolean;
  trace: boolean;
  verbose: boolean;
  preload: Record<string, number>;
  settings: TmcConfig;
};

/** Where command output goes; console by default. */
export type CliOutput = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export const consoleOutput: CliOutput = {
  log: line => console.log(line),
  error: line => console.error(line),
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { set: {}, errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--print-ast") {
      result.printAst = true;
    } else if (arg === "--print-tm") {
      result.printTm = true;
    } else if (arg === "--print-subs") {
      result.printSubs = true;
    } else if (arg === "--run-tm" || arg === "-r") {
      result.runTm = true;
    } else if (arg === "--trace") {
      result.trace = true;
      result.runTm = true;
    } else if (arg === "--compress") {
      result.compress = true;
    } else if (arg === "--no-compress" || arg === "--dont-compress") {
      result.compress = false;
    } else if (arg === "--optimize" || arg === "-O") {
      result.optimize = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--branch-mode") {
      const mode = args[++i];
      if (isBranchMode(mode)) result.branchMode = mode;
      else result.errors.push(`--branch-mode expects patch, absolute or relative, got '${mode ?? ""}'`);
    } else if (arg === "--max-steps") {
      const n = args[++i] ?? "";
      if (/^\d+$/.test(n)) result.maxSteps = parseInt(n, 10);
      else result.errors.push(`--max-steps expects a positive integer, got '${n}'`);
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (arg === "--set") {
      const assignment = args[++i] ?? "";
      const match = assignment.match(/^([A-Za-z_][A-Za-z0-9_]*)=(\d+)$/);
      if (match) result.set[match[1]] = parseInt(match[2], 10);
      else result.errors.push(`--set expects name=value, got '${assignment}'`);
    } else if (arg.startsWith("-")) {
      result.errors.push(`unknown option '${arg}'`);
    } else if (!result.file) {
      // First non-flag argument is the file
      result.file = arg;
    } else {
      result.errors.push(`unexpected argument '${arg}'`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
tmc - compile NQL programs to two-symbol Turing machines

USAGE:
  tmc [options] <file.nql>

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  --print-ast                        Print the parsed program and stop
  --print-tm                         Print the transition table
  --print-subs                       Print the subroutine tree
  -r, --run-tm                       Run the machine and print the globals
  --trace                            Run, printing the state and tape at every step
  --compress / --no-compress         Merge equivalent states (default: on)
  -O, --optimize                     Thread goto chains and drop fall-through gotos
  --branch-mode <mode>               patch (default), absolute or relative
  --max-steps <n>                    Step limit when running
  --set <name>=<value>               Initial value of a global (repeatable)
  -c, --config <file>                Load settings from a JSON file
  --verbose                          Show build and run statistics

ENVIRONMENT:
  TMC_BRANCH_MODE, TMC_OPTIMIZE_BRANCHES, TMC_COMPRESS, TMC_MAX_STEPS,
  TMC_SPECULATIVE_PC_BITS             Defaults for the options above

EXAMPLES:
  tmc --run-tm examples/squares.nql
  tmc --print-tm --optimize examples/squares.nql
  tmc --run-tm --set n=7 examples/halve.nql
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `tmc v${pkg.version}`;
    }
    return "tmc v0.1.0";
  } catch {
    return "tmc v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/** Command-line flags become the highest-priority config layer. */
export function overridesFromArgs(args: CliArgs): PartialConfig {
  return {
    compiler: {
      branchMode: args.branchMode,
      optimizeBranches: args.optimize,
    },
    machine: {
      compress: args.compress,
      maxSteps: args.maxSteps,
    },
  };
}

export function buildConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    file: args.file,
    printAst: args.printAst ?? false,
    printTm: args.printTm ?? false,
    printSubs: args.printSubs ?? false,
    runTm: args.runTm ?? false,
    trace: args.trace ?? false,
    verbose: args.verbose ?? false,
    preload: args.set,
    settings: loadConfig({ configFile: args.config, overrides: overridesFromArgs(args), env }),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compile `source` and perform the requested actions.
 * Returns the process exit code. Build and run errors are reported, not thrown.
 */
export function executeProgram(config: CliConfig, source: string, out: CliOutput = consoleOutput): number {
  const { settings } = config;

  const validation = validateConfig(settings);
  for (const w of validation.warnings) out.error(`warning: ${w}`);
  if (!validation.valid) {
    for (const e of validation.errors) out.error(`error: ${e}`);
    return 1;
  }

  const parsed = parseProgram(source, config.file);
  if (!parsed.ok) {
    for (const d of parsed.diagnostics) out.error(formatDiagnostic(d));
    return 1;
  }
  if (config.printAst) {
    out.log(JSON.stringify(parsed.program, null, 2));
    return 0;
  }

  try {
    const machine = buildProgramMachine(parsed.program, {
      speculativePcBits: settings.compiler.speculativePcBits,
      branchMode: settings.compiler.branchMode,
      optimizeBranches: settings.compiler.optimizeBranches,
    });
    if (config.verbose) {
      out.log(`built: ${machine.pcBits} PC bits, ${machine.registers.length} registers, ${machine.reachable().length} states`);
    }

    if (settings.machine.compress) {
      const removed = machine.compress();
      if (config.verbose) out.log(`compressed: ${removed} states removed, ${machine.reachable().length} remain`);
    }

    if (config.printSubs) out.log(machine.describeSubroutines());
    if (config.printTm) out.log(machine.print());

    if (config.runTm) {
      loadGlobals(machine, parsed.program, config.preload);
      if (config.trace) out.log(machine.traceLine());
      const steps = machine.run(settings.machine.maxSteps, config.trace ? m => out.log(m.traceLine()) : undefined);
      if (config.verbose) out.log(`halted after ${steps} steps`);
      for (const [name, value] of Object.entries(globalValues(machine, parsed.program))) {
        out.log(`${name} = ${value}`);
      }
    }
    return 0;
  } catch (e) {
    if (!(e instanceof TmError)) throw e;
    out.error(`error: ${e.message}`);
    if (config.verbose && e.stack) out.error(e.stack);
    return 1;
  }
}
