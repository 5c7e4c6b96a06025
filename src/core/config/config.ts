// src/core/config/config.ts
// Configuration for the reader and the read-print loop

import * as fs from "fs";
import * as path from "path";
import type { CommentMode } from "../reader/tokenize";

// =========================================================================
// Configuration Types
// =========================================================================

export type ReaderConfig = {
  /** Where a `;` comment ends: at the next newline, or at end of input */
  commentMode: CommentMode;
};

export type ReplConfig = {
  /** Prompt shown before each line */
  prompt: string;
  /** Lines kept in the interactive history */
  historySize: number;
  /** Log token counts and error offsets to stderr */
  verbose: boolean;
};

export type LispReaderConfig = {
  reader: ReaderConfig;
  repl: ReplConfig;
};

export type PartialConfig = {
  reader?: Partial<ReaderConfig>;
  repl?: Partial<ReplConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_READER_CONFIG: ReaderConfig = {
  commentMode: "line",
};

export const DEFAULT_REPL_CONFIG: ReplConfig = {
  prompt: "user> ",
  historySize: 10,
  verbose: false,
};

export const DEFAULT_CONFIG: LispReaderConfig = {
  reader: DEFAULT_READER_CONFIG,
  repl: DEFAULT_REPL_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["lisp-reader.config.json"];

// =========================================================================
// Value Parsing
// =========================================================================

export function parseCommentMode(value: unknown): CommentMode | undefined {
  return value === "line" || value === "buffer" ? value : undefined;
}

function parseInteger(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return parseInt(value, 10);
  return undefined;
}

function parseFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false") return false;
  return undefined;
}

function parseText(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables, e.g.
 * `LISP_READER_COMMENT_MODE=buffer`, `LISP_READER_HISTORY_SIZE=50`.
 */
export function configFromEnv(prefix = "LISP_READER", env: NodeJS.ProcessEnv = process.env): LispReaderConfig {
  return {
    reader: {
      commentMode: parseCommentMode(env[`${prefix}_COMMENT_MODE`]) ?? DEFAULT_READER_CONFIG.commentMode,
    },
    repl: {
      prompt: env[`${prefix}_PROMPT`] || DEFAULT_REPL_CONFIG.prompt,
      historySize: parseInteger(env[`${prefix}_HISTORY_SIZE`]) ?? DEFAULT_REPL_CONFIG.historySize,
      verbose: parseFlag(env[`${prefix}_VERBOSE`]) ?? DEFAULT_REPL_CONFIG.verbose,
    },
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return configFromObject(asRecord(data));
}

/**
 * Pick the recognised settings out of a plain object. Keys may be camelCase
 * or snake_case; values of the wrong type are dropped.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const readerData = asRecord(data.reader);
  const replData = asRecord(data.repl);

  const reader: Partial<ReaderConfig> = {};
  const commentMode = parseCommentMode(readerData.commentMode ?? readerData.comment_mode);
  if (commentMode) reader.commentMode = commentMode;

  const repl: Partial<ReplConfig> = {};
  const prompt = parseText(replData.prompt);
  if (prompt !== undefined) repl.prompt = prompt;
  const historySize = parseInteger(replData.historySize ?? replData.history_size);
  if (historySize !== undefined) repl.historySize = historySize;
  const verbose = parseFlag(replData.verbose);
  if (verbose !== undefined) repl.verbose = verbose;

  return { reader, repl };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: LispReaderConfig, ...configs: PartialConfig[]): LispReaderConfig {
  let result: LispReaderConfig = { reader: { ...base.reader }, repl: { ...base.repl } };

  for (const cfg of configs) {
    if (cfg.reader) {
      result = { ...result, reader: { ...result.reader, ...cfg.reader } };
    }
    if (cfg.repl) {
      result = { ...result, repl: { ...result.repl, ...cfg.repl } };
    }
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
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): LispReaderConfig {
  let config = configFromEnv("LISP_READER", options?.env ?? process.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: LispReaderConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.repl.historySize) || config.repl.historySize < 0) {
    errors.push(`historySize must be a non-negative integer, got ${config.repl.historySize}`);
  } else if (config.repl.historySize > 10_000) {
    warnings.push(`Large history: ${config.repl.historySize} lines`);
  }

  if (config.repl.prompt === "") {
    warnings.push("Empty prompt");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
