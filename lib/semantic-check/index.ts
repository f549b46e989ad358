import type { AstNode } from "@/expr-ast";

export const DIVISION_BY_ZERO_WARNING = "Warning: Division by zero detected";
export const COMPLEX_POWER_WARNING =
  "Warning: Negative base with fractional exponent may produce complex numbers";
export const NEGATIVE_SQRT_WARNING =
  "Warning: Square root of negative number may produce complex numbers";

/**
 * AST を前順に走査して警告を集める。ノード自身の警告を子より先に、左を右より先に出す。
 * 警告はコンパイルを止めない。
 */
export function semanticCheck(ast: AstNode): string[] {
  const warnings: string[] = [];
  visit(ast, warnings);
  return warnings;
}

function visit(node: AstNode, warnings: string[]): void {
  switch (node.kind) {
    case "number":
    case "identifier":
      return;
    case "binop": {
      const { op, left, right } = node;
      if (op === "/" && right.kind === "number" && right.value === 0) {
        warnings.push(DIVISION_BY_ZERO_WARNING);
      }
      if (
        op === "^" &&
        left.kind === "number" &&
        right.kind === "number" &&
        left.value < 0 &&
        !Number.isInteger(right.value)
      ) {
        warnings.push(COMPLEX_POWER_WARNING);
      }
      visit(left, warnings);
      visit(right, warnings);
      return;
    }
    case "unary":
      if (
        node.op === "sqrt" &&
        node.operand.kind === "number" &&
        node.operand.value < 0
      ) {
        warnings.push(NEGATIVE_SQRT_WARNING);
      }
      visit(node.operand, warnings);
      return;
  }
}
