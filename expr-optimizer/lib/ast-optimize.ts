import type { AstNode, BinaryOp } from "@/expr-ast";
import { applyBinary, applyUnary } from "@/expr-ast";

const isLiteral = (node: AstNode, value: number): boolean =>
  node.kind === "number" && node.value === value;

/**
 * 子を先に最適化してから定数畳み込みと代数的簡約を行い、新しい木を返す。
 * 元の木は変更しない。
 */
export function optimize(node: AstNode): AstNode {
  switch (node.kind) {
    case "number":
    case "identifier":
      return { ...node };
    case "binop": {
      const left = optimize(node.left);
      const right = optimize(node.right);
      if (left.kind === "number" && right.kind === "number") {
        const folded = foldConstants(node.op, left.value, right.value);
        if (folded !== undefined) return { kind: "number", value: folded };
        return { kind: "binop", op: node.op, left, right };
      }
      return (
        simplifyIdentity(node.op, left, right) ?? {
          kind: "binop",
          op: node.op,
          left,
          right,
        }
      );
    }
    case "unary": {
      const operand = optimize(node.operand);
      if (operand.kind === "number") {
        return { kind: "number", value: applyUnary(node.op, operand.value) };
      }
      return { kind: "unary", op: node.op, operand };
    }
  }
}

function foldConstants(
  op: BinaryOp,
  left: number,
  right: number,
): number | undefined {
  // 代入とリテラル 0 による除算は畳み込まない
  if (op === "=") return undefined;
  if (op === "/" && right === 0) return undefined;
  return applyBinary(op, left, right);
}

function simplifyIdentity(
  op: BinaryOp,
  left: AstNode,
  right: AstNode,
): AstNode | undefined {
  switch (op) {
    case "+":
      if (isLiteral(right, 0)) return left;
      if (isLiteral(left, 0)) return right;
      return undefined;
    case "-":
      if (isLiteral(right, 0)) return left;
      return undefined;
    case "*":
      if (isLiteral(right, 0) || isLiteral(left, 0)) {
        return { kind: "number", value: 0 };
      }
      if (isLiteral(right, 1)) return left;
      if (isLiteral(left, 1)) return right;
      return undefined;
    case "/":
      if (isLiteral(right, 1)) return left;
      return undefined;
    case "^":
      if (isLiteral(right, 0)) return { kind: "number", value: 1 };
      if (isLiteral(right, 1)) return left;
      return undefined;
    case "=":
      return undefined;
  }
}
