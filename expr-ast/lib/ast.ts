import type { AstNode, BinaryOp, UnaryOp } from "../types/ast";

// --- 構築ヘルパ ---

export const num = (value: number): AstNode => ({ kind: "number", value });

export const ident = (name: string, index: number): AstNode => ({
  kind: "identifier",
  name,
  index,
});

export const binop = (op: BinaryOp, left: AstNode, right: AstNode): AstNode => ({
  kind: "binop",
  op,
  left,
  right,
});

export const unary = (op: UnaryOp, operand: AstNode): AstNode => ({
  kind: "unary",
  op,
  operand,
});

// --- 検査・評価 ---

export function hasVariables(node: AstNode): boolean {
  switch (node.kind) {
    case "number":
      return false;
    case "identifier":
      return true;
    case "binop":
      return hasVariables(node.left) || hasVariables(node.right);
    case "unary":
      return hasVariables(node.operand);
  }
}

export function applyBinary(op: BinaryOp, left: number, right: number): number {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return left / right;
    case "^":
      return Math.pow(left, right);
    case "=":
      // 代入式の値は右辺
      return right;
  }
}

export function applyUnary(op: UnaryOp, operand: number): number {
  switch (op) {
    case "sqrt":
      return Math.sqrt(operand);
  }
}

/**
 * 変数を 0 とみなして数値に畳み込む。例外は投げず、ゼロ除算などは IEEE 754 の結果になる。
 */
export function evaluate(node: AstNode): number {
  switch (node.kind) {
    case "number":
      return node.value;
    case "identifier":
      return 0;
    case "binop":
      return applyBinary(node.op, evaluate(node.left), evaluate(node.right));
    case "unary":
      return applyUnary(node.op, evaluate(node.operand));
  }
}

// --- 文字列化 ---

export function formatNumber(value: number): string {
  return String(value);
}

export function formatAst(node: AstNode): string {
  switch (node.kind) {
    case "number":
      return formatNumber(node.value);
    case "identifier":
      return `id${node.index}`;
    case "binop":
      return `(${formatAst(node.left)} ${node.op} ${formatAst(node.right)})`;
    case "unary":
      return `${node.op}(${formatAst(node.operand)})`;
  }
}
