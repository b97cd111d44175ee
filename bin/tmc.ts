#!/usr/bin/env npx tsx
// bin/tmc.ts
// Compile NQL programs to two-symbol Turing machines, print and run them.
//
// Run:  npx tsx bin/tmc.ts [options] <file.nql>

import * as fs from "fs";
import * as path from "path";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  executeProgram,
} from "./tmc-cli-lib";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): number {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  if (cliArgs.errors.length > 0) {
    for (const e of cliArgs.errors) console.error(`Error: ${e}`);
    console.error("Run 'tmc --help' for usage.");
    return 2;
  }

  if (!cliArgs.file) {
    console.error("Error: No input file specified");
    return 2;
  }

  // Load environment variables from .env
  loadEnvFile();

  const config = buildConfig(cliArgs);
  const source = fs.readFileSync(cliArgs.file, "utf8");
  return executeProgram(config, source);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

function loadEnvFile(): void {
  const envPath = path.join(process.cwd(), ".env");
  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, "utf8");
    for (const line of envContent.split("\n")) {
      const match = line.match(/^([^=#]+)=(.*)$/);
      if (match && !process.env[match[1].trim()]) {
        process.env[match[1].trim()] = match[2].trim();
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

try {
  process.exitCode = main();
} catch (error) {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
