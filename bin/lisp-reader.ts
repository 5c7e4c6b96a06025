#!/usr/bin/env npx tsx
// bin/lisp-reader.ts
// lisp-reader CLI - read-print loop, file and expression reading
//
// Run:  npx tsx bin/lisp-reader.ts [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  executeSource,
  ReplSession,
  type CliConfig,
  type CliOutput,
} from "./lisp-reader-cli-lib";
import { loadConfig, validateConfig, type LispReaderConfig } from "../src/core/config";
import { invalidConfig } from "../src/outcome/constructors";

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  const cli = buildConfig(cliArgs);
  const config = loadConfig({
    configFile: cli.configFile,
    overrides: cli.verbose ? { repl: { verbose: true } } : undefined,
  });

  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error(invalidConfig(validation.errors).failure.message);
    process.exit(1);
  }
  for (const warning of validation.warnings) {
    console.error(`warning: ${warning}`);
  }

  if (cli.mode === "exec") {
    process.exit(executeMode(cli, config));
  }
  await replMode(config);
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(cli: CliConfig, config: LispReaderConfig): number {
  let source: string;
  if (cli.file) {
    source = fs.readFileSync(cli.file, "utf8");
  } else if (cli.code !== undefined) {
    source = cli.code;
  } else {
    console.error("Error: No code or file specified");
    return 1;
  }

  return executeSource(
    source,
    {
      tokensOnly: cli.tokensOnly,
      verbose: config.repl.verbose,
      reader: config.reader,
      file: cli.file,
    },
    consoleOutput
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

function replMode(config: LispReaderConfig): Promise<void> {
  const session = new ReplSession(config, undefined, (message) => console.error(message));

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: config.repl.prompt,
    historySize: config.repl.historySize,
  });

  rl.prompt();

  rl.on("line", (line) => {
    const step = session.feed(line);
    if (step.output !== undefined) console.log(step.output);
    if (step.error !== undefined) console.error(step.error);
    rl.setPrompt(step.prompt);
    rl.prompt();
  });

  return new Promise((resolve) => {
    rl.on("close", () => {
      console.log("\ngoodbye");
      resolve();
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
