// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

describe("configFromEnv", () => {
  it("returns defaults when no env vars set", () => {
    const config = configFromEnv("LISP_READER", {});
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("reads every setting under the prefix", () => {
    const config = configFromEnv("LISP_READER", {
      LISP_READER_COMMENT_MODE: "buffer",
      LISP_READER_PROMPT: "> ",
      LISP_READER_HISTORY_SIZE: "0",
      LISP_READER_VERBOSE: "1",
    });
    expect(config.reader.commentMode).toBe("buffer");
    expect(config.repl).toEqual({ prompt: "> ", historySize: 0, verbose: true });
  });

  it("ignores values it cannot parse", () => {
    const config = configFromEnv("X", {
      X_COMMENT_MODE: "paragraph",
      X_HISTORY_SIZE: "many",
      X_VERBOSE: "yes",
    });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("reads process.env by default", () => {
    const saved = process.env.LISP_READER_PROMPT;
    process.env.LISP_READER_PROMPT = "env> ";
    try {
      expect(configFromEnv().repl.prompt).toBe("env> ");
    } finally {
      if (saved === undefined) delete process.env.LISP_READER_PROMPT;
      else process.env.LISP_READER_PROMPT = saved;
    }
  });
});

describe("configFromObject", () => {
  it("accepts camelCase and snake_case keys", () => {
    expect(configFromObject({ reader: { commentMode: "buffer" }, repl: { historySize: 5 } })).toEqual({
      reader: { commentMode: "buffer" },
      repl: { historySize: 5 },
    });
    expect(configFromObject({ reader: { comment_mode: "line" }, repl: { history_size: 7, verbose: true } })).toEqual({
      reader: { commentMode: "line" },
      repl: { historySize: 7, verbose: true },
    });
  });

  it("drops values of the wrong type", () => {
    expect(configFromObject({ reader: { commentMode: 3 }, repl: { prompt: 1, historySize: "x" } })).toEqual({
      reader: {},
      repl: {},
    });
    expect(configFromObject({ reader: "nope" })).toEqual({ reader: {}, repl: {} });
  });
});

describe("mergeConfigs", () => {
  it("lets later configs override earlier ones", () => {
    const merged = mergeConfigs(
      DEFAULT_CONFIG,
      { repl: { prompt: "a> " } },
      { repl: { historySize: 3 }, reader: { commentMode: "buffer" } }
    );
    expect(merged).toEqual({
      reader: { commentMode: "buffer" },
      repl: { prompt: "a> ", historySize: 3, verbose: false },
    });
  });

  it("does not modify the base", () => {
    mergeConfigs(DEFAULT_CONFIG, { repl: { prompt: "changed" } });
    expect(DEFAULT_CONFIG.repl.prompt).toBe("user> ");
  });
});

describe("configFromFile and loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lisp-reader-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads JSON files", () => {
    const file = path.join(dir, "custom.json");
    fs.writeFileSync(file, JSON.stringify({ repl: { prompt: "file> " } }));
    expect(configFromFile(file)).toEqual({ reader: {}, repl: { prompt: "file> " } });
  });

  it("rejects missing files and other formats", () => {
    expect(() => configFromFile(path.join(dir, "missing.json"))).toThrow("Config file not found");
    const yaml = path.join(dir, "config.yaml");
    fs.writeFileSync(yaml, "repl:\n  prompt: x\n");
    expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");
  });

  it("finds the default config file in the working directory", () => {
    fs.writeFileSync(
      path.join(dir, "lisp-reader.config.json"),
      JSON.stringify({ reader: { commentMode: "buffer" } })
    );
    const config = loadConfig({ cwd: dir, env: {} });
    expect(config.reader.commentMode).toBe("buffer");
  });

  it("applies env, then file, then overrides", () => {
    const file = path.join(dir, "explicit.json");
    fs.writeFileSync(file, JSON.stringify({ repl: { prompt: "file> ", historySize: 20 } }));
    const config = loadConfig({
      configFile: file,
      env: { LISP_READER_PROMPT: "env> ", LISP_READER_VERBOSE: "true" },
      overrides: { repl: { historySize: 1 } },
    });
    expect(config.repl).toEqual({ prompt: "file> ", historySize: 1, verbose: true });
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects a negative history size", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { repl: { historySize: -1 } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["historySize must be a non-negative integer, got -1"]);
  });

  it("warns about an empty prompt and a huge history", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { repl: { prompt: "", historySize: 50_000 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["Large history: 50000 lines", "Empty prompt"]);
  });
});
