// bin/lisp-reader-cli-lib.ts
// Shared CLI utilities for the lisp-reader command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import {
  readAll,
  rep,
  tokenize,
  tokenText,
  toSourceBuffer,
  printData,
  isReaderError,
  readerFailure,
  type Evaluate,
} from "../src/core/reader";
import type { LispReaderConfig, ReaderConfig } from "../src/core/config";
import type { Fail } from "../src/outcome/outcome";
import { allDiagnostics, isFailureReason } from "../src/outcome/failure";
import { formatDiagnostic } from "../src/outcome/diagnostic";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  tokens?: boolean;
  verbose?: boolean;
  config?: string;
  mode?: "repl" | "exec";
};

export type CliConfig = {
  mode: "repl" | "exec";
  verbose: boolean;
  tokensOnly: boolean;
  code?: string;
  file?: string;
  configFile?: string;
};

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--tokens" || arg === "-t") {
      result.tokens = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
        result.mode = "exec";
      }
    }
    // Ignore unknown flags
  }

  if (!result.mode) {
    result.mode = "repl";
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
lisp-reader - read and print Lisp forms

USAGE:
  lisp-reader [options]               Start the interactive read-print loop
  lisp-reader [options] <file>        Print every form in a file
  lisp-reader --eval <code>           Print every form in <code>

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Read code and exit
  -t, --tokens                       Print token texts instead of forms
  -c, --config <file>                Load settings from a JSON file
  --verbose                          Log token counts and error positions

ENVIRONMENT:
  LISP_READER_COMMENT_MODE           line | buffer
  LISP_READER_PROMPT                 REPL prompt (default "user> ")
  LISP_READER_HISTORY_SIZE           REPL history length (default 10)
  LISP_READER_VERBOSE                1 | true

EXAMPLES:
  lisp-reader                        # Start REPL
  lisp-reader --eval "(+ 1 2)"       # Prints (+ 1 2)
  lisp-reader -t -e "~@(1 2)"        # Prints ["~@","(","1","2",")"]
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

function readPackageVersion(pkgPath: string): string | undefined {
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return undefined;
}

export function getVersion(): string {
  const pkgPath = path.join(__dirname, "..", "package.json");
  const version = fs.existsSync(pkgPath) ? readPackageVersion(pkgPath) : undefined;
  return `lisp-reader v${version ?? "0.1.0"}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): "repl" | "exec" {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval !== undefined || args.file) {
    return "exec";
  }
  return "repl";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const config: CliConfig = {
    mode: detectMode(args),
    verbose: args.verbose ?? false,
    tokensOnly: args.tokens ?? false,
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }
  if (args.file) {
    config.file = args.file;
  }
  if (args.config) {
    config.configFile = args.config;
  }

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE
// ═══════════════════════════════════════════════════════════════════════════════

function reportFailure(f: Fail, io: CliOutput): void {
  const diags = allDiagnostics(f.failure);
  if (diags.length === 0) {
    io.err(`error: ${f.failure.message}`);
    return;
  }
  for (const diag of diags) io.err(formatDiagnostic(diag));
}

/** Token texts of `source` in order, e.g. `["(", "+", "1", "2", ")"]`. */
export function formatTokens(source: string, reader: ReaderConfig, file?: string): string[] | Fail {
  const buffer = toSourceBuffer(source);
  try {
    return tokenize(buffer, reader).map((t) => tokenText(t, buffer));
  } catch (e) {
    if (isReaderError(e)) return readerFailure(e, buffer, file);
    throw e;
  }
}

/**
 * Print every form (or the token list) of `source`. Returns the process exit
 * code.
 */
export function executeSource(
  source: string,
  opts: { tokensOnly: boolean; verbose: boolean; reader: ReaderConfig; file?: string },
  io: CliOutput
): number {
  if (opts.tokensOnly) {
    const tokens = formatTokens(source, opts.reader, opts.file);
    if (!Array.isArray(tokens)) {
      reportFailure(tokens, io);
      return 1;
    }
    if (opts.verbose) {
      io.err(`[reader] ${tokens.length} tokens`);
    }
    io.out(JSON.stringify(tokens));
    return 0;
  }

  const result = readAll(source, { ...opts.reader, file: opts.file });
  if (result.tag === "Fail") {
    reportFailure(result, io);
    return 1;
  }

  if (opts.verbose) {
    io.err(`[reader] ${result.meta.consumed ?? 0} tokens, ${result.value.length} forms`);
  }
  for (const form of result.value) {
    io.out(printData(form));
  }
  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL SESSION
// ═══════════════════════════════════════════════════════════════════════════════

export const CONTINUATION_PROMPT = ".. ";

export type ReplStep = {
  output?: string;
  error?: string;
  /** Prompt to show for the next line */
  prompt: string;
};

/**
 * Line-at-a-time read-print state. Every form on a line is printed. An
 * unclosed list or string keeps the line pending and asks for more input
 * instead of reporting an error.
 */
export class ReplSession {
  private pending = "";

  constructor(
    private readonly config: LispReaderConfig,
    private readonly evaluate?: Evaluate,
    private readonly log: (message: string) => void = () => {}
  ) {}

  get isPending(): boolean {
    return this.pending !== "";
  }

  feed(line: string): ReplStep {
    const src = this.pending ? `${this.pending}\n${line}` : line;
    if (src.trim() === "") {
      return { prompt: this.config.repl.prompt };
    }

    const result = rep(src, { ...this.config.reader, evaluate: this.evaluate });
    if (result.tag === "Done") {
      this.pending = "";
      // blank or comment-only input reads as no forms
      if (result.value.length === 0) return { prompt: this.config.repl.prompt };
      return { output: result.value.join("\n"), prompt: this.config.repl.prompt };
    }

    const f = result.failure;
    if (isFailureReason(f, "reader/UnexpectedEof") || isFailureReason(f, "reader/UnterminatedString")) {
      this.pending = src;
      return { prompt: CONTINUATION_PROMPT };
    }

    this.pending = "";
    if (this.config.repl.verbose) {
      for (const diag of allDiagnostics(f)) this.log(`[reader] ${formatDiagnostic(diag)}`);
    }
    return { error: `error: ${f.message}`, prompt: this.config.repl.prompt };
  }
}
