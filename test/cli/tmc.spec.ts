// test/cli/tmc.spec.ts
// Tests for the tmc command

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  executeProgram,
  type CliConfig,
  type CliOutput,
} from "../../bin/tmc-cli-lib";

const squares = fs.readFileSync(path.resolve(process.cwd(), "examples", "squares.nql"), "utf8");

function capture(): CliOutput & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return { logs, errors, log: line => logs.push(line), error: line => errors.push(line) };
}

function configFor(argv: string[]): CliConfig {
  return buildConfig(parseCliArgs(argv), {});
}

describe("tmc CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and --version", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should parse the file and print flags", () => {
      const parsed = parseCliArgs(["--print-ast", "--print-tm", "--print-subs", "prog.nql"]);
      expect(parsed).toMatchObject({ file: "prog.nql", printAst: true, printTm: true, printSubs: true });
      expect(parsed.errors).toEqual([]);
    });

    it("should treat --trace as a run", () => {
      expect(parseCliArgs(["--trace"])).toMatchObject({ trace: true, runTm: true });
    });

    it("should parse compression and optimisation flags", () => {
      expect(parseCliArgs(["--compress"]).compress).toBe(true);
      expect(parseCliArgs(["--no-compress"]).compress).toBe(false);
      expect(parseCliArgs(["--dont-compress"]).compress).toBe(false);
      expect(parseCliArgs(["-O"]).optimize).toBe(true);
    });

    it("should parse valued options", () => {
      const parsed = parseCliArgs(["--branch-mode", "absolute", "--max-steps", "500", "-c", "my.json", "--set", "a=3", "--set", "b=12"]);
      expect(parsed).toMatchObject({ branchMode: "absolute", maxSteps: 500, config: "my.json", set: { a: 3, b: 12 } });
      expect(parsed.errors).toEqual([]);
    });

    it("should collect argument errors", () => {
      const parsed = parseCliArgs(["--branch-mode", "sideways", "--max-steps", "lots", "--set", "a", "--bogus", "one.nql", "two.nql"]);
      expect(parsed.errors).toEqual([
        "--branch-mode expects patch, absolute or relative, got 'sideways'",
        "--max-steps expects a positive integer, got 'lots'",
        "--set expects name=value, got 'a'",
        "unknown option '--bogus'",
        "unexpected argument 'two.nql'",
      ]);
      expect(parsed.file).toBe("one.nql");
    });
  });

  describe("Help and version", () => {
    it("should describe usage and every option", () => {
      const help = getHelpText();
      expect(help.startsWith("tmc - compile NQL programs")).toBe(true);
      for (const flag of ["--print-ast", "--print-tm", "--print-subs", "--run-tm", "--compress", "--branch-mode", "--set"]) {
        expect(help).toContain(flag);
      }
    });

    it("should report a version", () => {
      expect(getVersion()).toMatch(/^tmc v\d+\.\d+\.\d+/);
    });
  });

  describe("Configuration building", () => {
    it("should default to compression on and nothing printed", () => {
      const config = configFor(["prog.nql"]);
      expect(config).toMatchObject({ file: "prog.nql", printAst: false, printTm: false, runTm: false, preload: {} });
      expect(config.settings.machine.compress).toBe(true);
      expect(config.settings.compiler.branchMode).toBe("patch");
    });

    it("should let flags override the environment", () => {
      const config = buildConfig(parseCliArgs(["--branch-mode", "relative", "-O"]), {
        TMC_BRANCH_MODE: "absolute",
        TMC_MAX_STEPS: "1234",
      });
      expect(config.settings.compiler).toMatchObject({ branchMode: "relative", optimizeBranches: true });
      expect(config.settings.machine.maxSteps).toBe(1234);
    });
  });

  describe("Program execution", () => {
    it("should run a program and print its globals", () => {
      const out = capture();
      expect(executeProgram(configFor(["--run-tm"]), squares, out)).toBe(0);
      expect(out.logs).toEqual(["a = 4", "b = 9"]);
      expect(out.errors).toEqual([]);
    });

    it("should preload globals from --set", () => {
      const out = capture();
      const src = "global x; global y; proc main() { y = x + x; }";
      expect(executeProgram(configFor(["-r", "--set", "x=5"]), src, out)).toBe(0);
      expect(out.logs).toEqual(["x = 5", "y = 10"]);
    });

    it("should print the AST and stop", () => {
      const out = capture();
      expect(executeProgram(configFor(["--print-ast", "--run-tm"]), "global g; proc main() { }", out)).toBe(0);
      expect(out.logs).toHaveLength(1);
      expect(JSON.parse(out.logs[0])).toMatchObject({ globals: ["g"], procs: [{ name: "main", params: [] }] });
    });

    it("should print the transition table and subroutine tree", () => {
      const out = capture();
      expect(executeProgram(configFor(["--print-subs", "--print-tm"]), squares, out)).toBe(0);
      expect(out.logs).toHaveLength(2);
      expect(out.logs[0]).toContain("NAME: top ORDER: ");
      expect(out.logs[0]).toContain("NAME: main() ORDER: ");
      expect(out.logs[0]).toContain("NAME: square(_Ga,_Gb) ORDER: ");
      for (const line of out.logs[1].split("\n")) {
        expect(line).toMatch(/^.+ = [01] [LR] .+ [01] [LR] .+$/);
      }
    });

    it("should trace every step until HALT", () => {
      const out = capture();
      expect(executeProgram(configFor(["--trace"]), "proc main() { }", out)).toBe(0);
      expect(out.logs.length).toBeGreaterThan(1);
      expect(out.logs[out.logs.length - 1].startsWith("HALT ")).toBe(true);
    });

    it("should report statistics when verbose", () => {
      const out = capture();
      expect(executeProgram(configFor(["--verbose", "-r"]), squares, out)).toBe(0);
      expect(out.logs[0]).toMatch(/^built: \d+ PC bits, \d+ registers, \d+ states$/);
      expect(out.logs[1]).toMatch(/^compressed: \d+ states removed, \d+ remain$/);
      expect(out.logs[2]).toMatch(/^halted after \d+ steps$/);
      expect(out.logs.slice(3)).toEqual(["a = 4", "b = 9"]);
    });

    it("should report syntax errors with their location", () => {
      const out = capture();
      const config = { ...configFor(["--run-tm"]), file: "bad.nql" };
      expect(executeProgram(config, "proc main() { x = ; }", out)).toBe(1);
      expect(out.errors).toEqual(["bad.nql:1:19: error E0102: expected an expression, found ';'"]);
    });

    it("should report compile errors", () => {
      const out = capture();
      expect(executeProgram(configFor(["-r"]), "proc main() { x = 1; }", out)).toBe(1);
      expect(out.errors).toEqual(["error: UndefinedSymbolError: undefined variable 'x' at 1:15"]);
    });

    it("should report a run that exceeds the step limit", () => {
      const out = capture();
      expect(executeProgram(configFor(["-r", "--max-steps", "20000"]), "proc main() { while (0 == 0) { } }", out)).toBe(1);
      expect(out.errors).toEqual(["error: StepLimitExceededError: machine did not halt within 20000 steps"]);
    });

    it("should reject an invalid configuration before compiling", () => {
      const out = capture();
      expect(executeProgram(configFor(["--max-steps", "0"]), squares, out)).toBe(1);
      expect(out.errors).toEqual(["error: maxSteps must be at least 1"]);
    });
  });
});
