import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";

import { compile } from "@/lib/compile-engine";
import type { CompileOutcome } from "@/lib/compile-schema";
import {
  formatOutcome,
  parseArgs,
  readCases,
  runExpression,
  runSingleCase,
} from "./compile-expr";

describe("compile-expr CLI options", () => {
  it("defaults to text output with peephole enabled", () => {
    const parsed = parseArgs([]);
    expect(parsed.options).toEqual({ format: "text", peephole: true });
    expect(parsed.targets).toEqual([]);
    expect(parsed.expressions).toEqual([]);
  });

  it("accepts --format in both spellings", () => {
    expect(parseArgs(["--format", "json"]).options.format).toBe("json");
    expect(parseArgs(["--format=json"]).options.format).toBe("json");
  });

  it("keeps every `=` of an inline assignment", () => {
    expect(parseArgs(["--expr=a = b + c"]).expressions).toEqual(["a = b + c"]);
    expect(parseArgs(["--format=json", "--expr=x=y=1"])).toEqual({
      options: { format: "json", peephole: true },
      targets: [],
      expressions: ["x=y=1"],
    });
  });

  it("collects inline expressions and targets", () => {
    const parsed = parseArgs(["--expr", "a = 1", "cases", "--no-peephole"]);
    expect(parsed.expressions).toEqual(["a = 1"]);
    expect(parsed.targets).toEqual(["cases"]);
    expect(parsed.options.peephole).toBe(false);
  });

  it("rejects unknown flags and bad values", () => {
    expect(() => parseArgs(["--format", "xml"])).toThrow("--format");
    expect(() => parseArgs(["--verbose"])).toThrow("未知のフラグです: --verbose");
    expect(() => parseArgs(["--expr"])).toThrow("--expr");
  });
});

describe("compile-expr output", () => {
  it("formats a successful compilation", () => {
    expect(formatOutcome("A = B + C", compile("A = B + C"))).toEqual([
      "\n=== A = B + C ===",
      "tokens     : id1 ASSIGN id2 PLUS id3",
      "identifiers: A=id1, B=id2, C=id3",
      "ast        : (id1 = (id2 + id3))",
      "warnings   : none",
      "tac        :",
      "  t1 = id2 + id3",
      "  id1 = t1",
      "optimized  : (id1 = (id2 + id3))",
      "opt tac    :",
      "  id1 = id2 + id3",
      "value      : (contains variables)",
    ]);
  });

  it("prints the value and warnings of a constant expression", () => {
    const lines = formatOutcome("1/0", compile("1/0"));
    expect(lines).toContain("  Warning: Division by zero detected");
    expect(lines[lines.length - 1]).toBe("value      : Infinity");
  });

  it("formats a failed compilation", () => {
    expect(formatOutcome("1 +", compile("1 +"))).toEqual([
      "\n=== 1 + ===",
      "error.type : UnexpectedEndOfInput",
      "error.msg  : Unexpected end of input",
    ]);
  });

  it("skips blank lines and comments in case files", () => {
    expect(readCases("# header\n\n  a + b  \r\n# x\n1/0\n")).toEqual([
      "a + b",
      "1/0",
    ]);
  });
});

describe("compile-expr runner", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "expr-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("compiles every case in a file and passes the options through", async () => {
    const file = path.join(dir, "case.expr");
    await fs.writeFile(file, "# cases\n1 + 2\n\nx * 1\n", "utf8");

    const calls: unknown[] = [];
    const compileStub = (
      source: string,
      opts: Parameters<typeof runSingleCase>[1],
    ): CompileOutcome => {
      calls.push({ source, opts });
      return compile(source, { peephole: opts.peephole });
    };

    const ok = await runSingleCase(
      file,
      { format: "text", peephole: false },
      compileStub,
    );

    expect(ok).toBe(true);
    expect(calls).toEqual([
      { source: "1 + 2", opts: { format: "text", peephole: false } },
      { source: "x * 1", opts: { format: "text", peephole: false } },
    ]);
  });

  it("reports failure when any case does not compile", async () => {
    const file = path.join(dir, "broken.expr");
    await fs.writeFile(file, "1 + 2\n1 $ 2\n", "utf8");

    const ok = await runSingleCase(file, { format: "text", peephole: true });
    expect(ok).toBe(false);
  });
});

describe("compile-expr JSON output", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints JSON when requested", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const ok = runExpression("2 * 3", { format: "json", peephole: true });

    expect(ok).toBe(true);
    expect(log).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      source: "2 * 3",
      ok: true,
      result: {
        threeAddressCode: ["t1 = 2 * 3"],
        optimizedThreeAddressCode: ["t1 = 6"],
        value: 6,
      },
    });
  });

  it("writes non-finite values as strings", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    runExpression("1/0", { format: "json", peephole: true });

    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      source: "1/0",
      ok: true,
      result: { value: "Infinity" },
    });
  });
});
