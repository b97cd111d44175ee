// src/core/config/config.ts
// Configuration for building and running machines.
// Sources, lowest priority first: defaults, environment, config file, explicit overrides.

import * as fs from "fs";
import * as path from "path";
import type { BranchMode } from "../compiler/types";
import { BRANCH_MODES } from "../compiler/types";
import { DEFAULT_SPECULATIVE_PC_BITS } from "../machine/build";
import { DEFAULT_MAX_STEPS } from "../machine/machine";

// =========================================================================
// Configuration Types
// =========================================================================

export type CompilerConfig = {
  /** PC width used for the sizing pass */
  speculativePcBits: number;
  /** How gotos rewrite the program counter */
  branchMode: BranchMode;
  /** Thread goto chains and drop fall-through gotos */
  optimizeBranches: boolean;
};

export type MachineConfig = {
  /** Minimise the state graph after building */
  compress: boolean;
  /** Simulation step limit */
  maxSteps: number;
};

export type TmcConfig = {
  compiler: CompilerConfig;
  machine: MachineConfig;
};

/** A config layer: any subset of fields. */
export type PartialConfig = {
  compiler?: Partial<CompilerConfig>;
  machine?: Partial<MachineConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  speculativePcBits: DEFAULT_SPECULATIVE_PC_BITS,
  branchMode: "patch",
  optimizeBranches: false,
};

export const DEFAULT_MACHINE_CONFIG: MachineConfig = {
  compress: true,
  maxSteps: DEFAULT_MAX_STEPS,
};

export const DEFAULT_CONFIG: TmcConfig = {
  compiler: DEFAULT_COMPILER_CONFIG,
  machine: DEFAULT_MACHINE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["tmc.config.json", ".tmcrc.json"];

// =========================================================================
// Value coercion
// =========================================================================

function asRecord(v: unknown): Record<string, unknown> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return {};
  return Object.fromEntries(Object.entries(v));
}

function asInt(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "string" && /^\d+$/.test(v.trim())) return parseInt(v, 10);
  return undefined;
}

function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return undefined;
}

export function isBranchMode(v: unknown): v is BranchMode {
  return typeof v === "string" && BRANCH_MODES.some(m => m === v);
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables:
 * `${prefix}_SPECULATIVE_PC_BITS`, `_BRANCH_MODE`, `_OPTIMIZE_BRANCHES`, `_COMPRESS`, `_MAX_STEPS`.
 */
export function configFromEnv(prefix = "TMC", env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const mode = env[`${prefix}_BRANCH_MODE`];
  return {
    compiler: {
      speculativePcBits: asInt(env[`${prefix}_SPECULATIVE_PC_BITS`]),
      branchMode: isBranchMode(mode) ? mode : undefined,
      optimizeBranches: asBool(env[`${prefix}_OPTIMIZE_BRANCHES`]),
    },
    machine: {
      compress: asBool(env[`${prefix}_COMPRESS`]),
      maxSteps: asInt(env[`${prefix}_MAX_STEPS`]),
    },
  };
}

/**
 * Create a config layer from a plain object (e.g. parsed JSON).
 * Accepts camelCase and snake_case keys; unknown or ill-typed values are ignored.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const compiler = asRecord(data.compiler);
  const machine = asRecord(data.machine);
  const mode = compiler.branchMode ?? compiler.branch_mode;
  return {
    compiler: {
      speculativePcBits: asInt(compiler.speculativePcBits ?? compiler.speculative_pc_bits),
      branchMode: isBranchMode(mode) ? mode : undefined,
      optimizeBranches: asBool(compiler.optimizeBranches ?? compiler.optimize_branches),
    },
    machine: {
      compress: asBool(machine.compress),
      maxSteps: asInt(machine.maxSteps ?? machine.max_steps),
    },
  };
}

/** Load a config layer from a JSON file. */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return configFromObject(asRecord(parsed));
}

/**
 * Merge config layers onto the defaults, later ones overriding earlier ones.
 * A field left undefined in a layer keeps the value from below.
 */
export function mergeConfigs(...layers: PartialConfig[]): TmcConfig {
  const result: TmcConfig = {
    compiler: { ...DEFAULT_COMPILER_CONFIG },
    machine: { ...DEFAULT_MACHINE_CONFIG },
  };
  for (const { compiler: c = {}, machine: m = {} } of layers) {
    result.compiler = {
      speculativePcBits: c.speculativePcBits ?? result.compiler.speculativePcBits,
      branchMode: c.branchMode ?? result.compiler.branchMode,
      optimizeBranches: c.optimizeBranches ?? result.compiler.optimizeBranches,
    };
    result.machine = {
      compress: m.compress ?? result.machine.compress,
      maxSteps: m.maxSteps ?? result.machine.maxSteps,
    };
  }
  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): TmcConfig {
  const layers: PartialConfig[] = [configFromEnv("TMC", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map(f => path.join(cwd, f)).find(p => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) layers.push(options.overrides);
  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TmcConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.compiler.speculativePcBits < 1) {
    errors.push("speculativePcBits must be at least 1");
  }
  if (config.machine.maxSteps < 1) {
    errors.push("maxSteps must be at least 1");
  } else if (config.machine.maxSteps < 10_000) {
    warnings.push("maxSteps is very low; most programs need far more steps to halt");
  }
  if (config.compiler.branchMode === "relative" && config.compiler.optimizeBranches) {
    warnings.push("optimizeBranches has little effect on relative branches, which are never shared");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
