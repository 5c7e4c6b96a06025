// test/cli/lisp-reader.spec.ts
// Tests for the lisp-reader CLI command

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
  executeSource,
  formatTokens,
  ReplSession,
  CONTINUATION_PROMPT,
  type CliOutput,
} from "../../bin/lisp-reader-cli-lib";
import { DEFAULT_CONFIG, DEFAULT_READER_CONFIG, mergeConfigs } from "../../src/core/config";
import { list, sym, type Data } from "../../src/core/reader/datum";

function captureOutput(): CliOutput & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

describe("lisp-reader CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and --version flags", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should parse --eval with code", () => {
      const parsed = parseCliArgs(["--eval", "(+ 1 2)"]);
      expect(parsed.eval).toBe("(+ 1 2)");
      expect(parsed.mode).toBe("exec");
    });

    it("should parse a file argument and ignore later positionals", () => {
      const parsed = parseCliArgs(["example.lisp", "other.lisp"]);
      expect(parsed.file).toBe("example.lisp");
      expect(parsed.mode).toBe("exec");
    });

    it("should parse --tokens, --verbose and --config", () => {
      const parsed = parseCliArgs(["-t", "--verbose", "-c", "cfg.json", "--unknown"]);
      expect(parsed).toEqual({ tokens: true, verbose: true, config: "cfg.json", mode: "repl" });
    });

    it("should default to REPL mode with no arguments", () => {
      expect(parseCliArgs([]).mode).toBe("repl");
    });
  });

  describe("Mode detection and config building", () => {
    it("detects exec mode from code or file", () => {
      expect(detectMode({ eval: "" })).toBe("exec");
      expect(detectMode({ file: "a.lisp" })).toBe("exec");
      expect(detectMode({})).toBe("repl");
      expect(detectMode({ mode: "repl", file: "a.lisp" })).toBe("repl");
    });

    it("builds a CLI config", () => {
      expect(buildConfig(parseCliArgs(["-e", "x", "-t", "-c", "c.json"]))).toEqual({
        mode: "exec",
        verbose: false,
        tokensOnly: true,
        code: "x",
        configFile: "c.json",
      });
    });
  });

  describe("Help and version", () => {
    it("describes the options", () => {
      const help = getHelpText();
      expect(help.startsWith("lisp-reader - read and print Lisp forms")).toBe(true);
      expect(help).toContain("-t, --tokens");
    });

    it("reports the package version", () => {
      expect(getVersion()).toMatch(/^lisp-reader v\d+\.\d+\.\d+/);
    });
  });

  describe("Execute mode", () => {
    it("prints every form", () => {
      const io = captureOutput();
      const code = executeSource("(+ 1 2) 'x ; c", { tokensOnly: false, verbose: false, reader: DEFAULT_READER_CONFIG }, io);
      expect(code).toBe(0);
      expect(io.stdout).toEqual(["(+ 1 2)", "(quote x)"]);
      expect(io.stderr).toEqual([]);
    });

    it("logs token and form counts when verbose", () => {
      const io = captureOutput();
      executeSource("a (b)", { tokensOnly: false, verbose: true, reader: DEFAULT_READER_CONFIG }, io);
      expect(io.stderr).toEqual(["[reader] 4 tokens, 2 forms"]);
    });

    it("prints token texts", () => {
      const io = captureOutput();
      const code = executeSource("~@(1 2)", { tokensOnly: true, verbose: false, reader: DEFAULT_READER_CONFIG }, io);
      expect(code).toBe(0);
      expect(io.stdout).toEqual(['["~@","(","1","2",")"]']);
    });

    it("reports failures with their position and exit code 1", () => {
      const io = captureOutput();
      const code = executeSource(
        "(a\n]",
        { tokensOnly: false, verbose: false, reader: DEFAULT_READER_CONFIG, file: "bad.lisp" },
        io
      );
      expect(code).toBe(1);
      expect(io.stdout).toEqual([]);
      expect(io.stderr).toEqual(["bad.lisp:2:1: error E0004: Mismatched bracket: expected ')', got ']'"]);
    });

    it("logs the token count in token mode when verbose", () => {
      const io = captureOutput();
      executeSource("(a b)", { tokensOnly: true, verbose: true, reader: DEFAULT_READER_CONFIG }, io);
      expect(io.stderr).toEqual(["[reader] 4 tokens"]);
      expect(io.stdout).toEqual(['["(","a","b",")"]']);
    });

    it("reports unterminated strings in token mode", () => {
      const result = formatTokens('"abc', DEFAULT_READER_CONFIG);
      expect(Array.isArray(result) ? result : result.failure.reason).toBe("reader/UnterminatedString");
    });
  });

  describe("REPL session", () => {
    it("prints each line's form", () => {
      const session = new ReplSession(DEFAULT_CONFIG);
      expect(session.feed("(+ 1 2)")).toEqual({ output: "(+ 1 2)", prompt: "user> " });
      expect(session.feed('"a\\"b"')).toEqual({ output: '"a\\"b"', prompt: "user> " });
    });

    it("prints every form on a line", () => {
      const session = new ReplSession(DEFAULT_CONFIG);
      expect(session.feed("1 2")).toEqual({ output: "1\n2", prompt: "user> " });
      expect(session.feed("(a) 'b ; done")).toEqual({ output: "(a)\n(quote b)", prompt: "user> " });
    });

    it("reports an error that follows a complete form", () => {
      const session = new ReplSession(DEFAULT_CONFIG);
      expect(session.feed("1 )")).toEqual({ error: "error: Unbalanced ')' with no matching open", prompt: "user> " });
      expect(session.isPending).toBe(false);
    });

    it("keeps a line pending when a later form is unclosed", () => {
      const session = new ReplSession(DEFAULT_CONFIG);
      expect(session.feed("(a) (b")).toEqual({ prompt: CONTINUATION_PROMPT });
      expect(session.isPending).toBe(true);
      expect(session.feed("c)")).toEqual({ output: "(a)\n(b c)", prompt: "user> " });
    });

    it("prints nothing for blank and comment-only lines", () => {
      const session = new ReplSession(DEFAULT_CONFIG);
      expect(session.feed("   ")).toEqual({ prompt: "user> " });
      expect(session.feed("; just a comment")).toEqual({ prompt: "user> " });
    });

    it("continues unclosed lists and strings on the next line", () => {
      const session = new ReplSession(DEFAULT_CONFIG);
      expect(session.feed("(a")).toEqual({ prompt: CONTINUATION_PROMPT });
      expect(session.isPending).toBe(true);
      expect(session.feed('"two')).toEqual({ prompt: CONTINUATION_PROMPT });
      expect(session.feed('lines" b)')).toEqual({ output: '(a "two\\nlines" b)', prompt: "user> " });
      expect(session.isPending).toBe(false);
    });

    it("reports other errors and recovers", () => {
      const logged: string[] = [];
      const config = mergeConfigs(DEFAULT_CONFIG, { repl: { verbose: true, prompt: "> " } });
      const session = new ReplSession(config, undefined, (m) => logged.push(m));
      expect(session.feed("(]")).toEqual({ error: "error: Mismatched bracket: expected ')', got ']'", prompt: "> " });
      expect(logged).toEqual(["[reader] <input>:1:2: error E0004: Mismatched bracket: expected ')', got ']'"]);
      expect(session.feed("x")).toEqual({ output: "x", prompt: "> " });
    });

    it("passes forms through the evaluation step", () => {
      const evaluate = (form: Data): Data => list([sym("echo"), form]);
      const session = new ReplSession(DEFAULT_CONFIG, evaluate);
      expect(session.feed("1").output).toBe("(echo 1)");
    });
  });
});
