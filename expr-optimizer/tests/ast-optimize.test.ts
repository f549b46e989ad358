import { describe, it, expect } from "vitest";
import {
  type AstNode,
  binop,
  evaluate,
  formatAst,
  ident,
  num,
  parse,
  tokenize,
  unary,
} from "@/expr-ast";
import { optimize } from "..";

const parseSource = (source: string) => parse(tokenize(source).tokens);
const optimized = (source: string) => formatAst(optimize(parseSource(source)));

describe("constant folding", () => {
  it("folds fully constant expressions", () => {
    expect(optimized("(10 - 4) / 2")).toBe("3");
    expect(optimized("sqrt(16) + 2 * 3")).toBe("10");
    expect(optimized("2 ^ 3 ^ 2")).toBe("512");
  });

  it("folds constant sub-trees next to variables", () => {
    expect(optimized("x + 2 * 3")).toBe("(id1 + 6)");
  });

  it("keeps a division by literal zero", () => {
    expect(optimized("1/0")).toBe("(1 / 0)");
    expect(optimized("x / (2 - 2)")).toBe("(id1 / 0)");
  });

  it("never folds an assignment", () => {
    expect(optimized("a = 2 + 3")).toBe("(id1 = 5)");
    expect(formatAst(optimize(binop("=", num(1), num(2))))).toBe("(1 = 2)");
  });
});

describe("algebraic identities", () => {
  it.each([
    ["x + 0", "id1"],
    ["0 + x", "id1"],
    ["x - 0", "id1"],
    ["x * 0", "0"],
    ["0 * x", "0"],
    ["x * 1", "id1"],
    ["1 * x", "id1"],
    ["x / 1", "id1"],
    ["x ^ 0", "1"],
    ["x ^ 1", "id1"],
  ])("%s simplifies to %s", (source, expected) => {
    expect(optimized(source)).toBe(expected);
  });

  it("applies identities to already optimized children", () => {
    expect(optimized("5 + 3 * 0")).toBe("5");
    expect(optimized("x * (3 - 2)")).toBe("id1");
    expect(optimized("y = x * 0 + z")).toBe("(id1 = id3)");
  });

  it("leaves non-matching shapes alone", () => {
    expect(optimized("0 - x")).toBe("(0 - id1)");
    expect(optimized("1 / x")).toBe("(1 / id1)");
    expect(optimized("0 ^ x")).toBe("(0 ^ id1)");
  });
});

describe("sqrt folding", () => {
  it("folds sqrt of a literal", () => {
    expect(formatAst(optimize(unary("sqrt", num(9))))).toBe("3");
  });

  it("keeps sqrt of a variable", () => {
    expect(optimized("sqrt(x + 0)")).toBe("sqrt(id1)");
  });
});

describe("optimizer properties", () => {
  const constantSources = [
    "2+3*4",
    "(10 - 4) / 2",
    "sqrt(16) + 2 * 3",
    "sqrt(13-(6-1)^2) - 10",
    "1.5 * 4 - 2 ^ 0.5",
  ];

  it.each(constantSources)("preserves the value of %s", (source) => {
    const ast = parseSource(source);
    const before = evaluate(ast);
    const after = evaluate(optimize(ast));
    if (Number.isNaN(before)) {
      expect(Number.isNaN(after)).toBe(true);
    } else {
      expect(after).toBeCloseTo(before, 12);
    }
  });

  it.each([...constantSources, "x * 1 + y * 0", "a = (b + 0) * (c ^ 1)", "1/0"])(
    "is idempotent on %s",
    (source) => {
      const once = optimize(parseSource(source));
      expect(formatAst(optimize(once))).toBe(formatAst(once));
    },
  );

  it("does not mutate the input tree", () => {
    const ast: AstNode = binop("*", ident("x", 1), binop("+", num(1), num(0)));
    const snapshot = JSON.stringify(ast);
    const result = optimize(ast);
    expect(JSON.stringify(ast)).toBe(snapshot);
    expect(result).not.toBe(ast);
    expect(formatAst(result)).toBe("id1");
  });
});
