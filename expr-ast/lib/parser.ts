import type { AstNode } from "../types/ast";
import type { Token, TokenKind } from "../types/token";
import { CompileError } from "./errors";
import { formatToken } from "./lexer";

type TokenCursor = {
  tokens: readonly Token[];
  index: number;
};

/**
 * トークン列を再帰下降で AST に変換する。
 * 優先順位は低い順に 代入(右結合) < 加減(左結合) < 乗除(左結合) < 累乗(右結合) < sqrt。
 * ルートの式を読み終えた後に残ったトークンは読まずに捨てる。
 */
export function parse(tokens: readonly Token[]): AstNode {
  const cursor: TokenCursor = { tokens, index: 0 };
  return parseAssignment(cursor);
}

// --- 内部実装 ---

function peekKind(cursor: TokenCursor): TokenKind | undefined {
  return cursor.tokens[cursor.index]?.kind;
}

function maybeToken(cursor: TokenCursor, kind: TokenKind): boolean {
  if (peekKind(cursor) === kind) {
    cursor.index += 1;
    return true;
  }
  return false;
}

function parseAssignment(cursor: TokenCursor): AstNode {
  const left = parseExpr(cursor);
  if (maybeToken(cursor, "assign")) {
    const right = parseAssignment(cursor);
    return { kind: "binop", op: "=", left, right };
  }
  return left;
}

function parseExpr(cursor: TokenCursor): AstNode {
  return parseAddSub(cursor);
}

function parseAddSub(cursor: TokenCursor): AstNode {
  let left = parseMulDiv(cursor);

  while (true) {
    const kind = peekKind(cursor);
    if (kind !== "plus" && kind !== "minus") break;
    cursor.index += 1;
    const right = parseMulDiv(cursor);
    left = { kind: "binop", op: kind === "plus" ? "+" : "-", left, right };
  }

  return left;
}

function parseMulDiv(cursor: TokenCursor): AstNode {
  let left = parsePower(cursor);

  while (true) {
    const kind = peekKind(cursor);
    if (kind !== "multiply" && kind !== "divide") break;
    cursor.index += 1;
    const right = parsePower(cursor);
    left = { kind: "binop", op: kind === "multiply" ? "*" : "/", left, right };
  }

  return left;
}

function parsePower(cursor: TokenCursor): AstNode {
  const base = parseUnary(cursor);
  if (maybeToken(cursor, "power")) {
    const exponent = parsePower(cursor);
    return { kind: "binop", op: "^", left: base, right: exponent };
  }
  return base;
}

function parseUnary(cursor: TokenCursor): AstNode {
  if (maybeToken(cursor, "sqrt")) {
    // sqrt は直後の primary だけを引数に取る
    const operand = parsePrimary(cursor);
    return { kind: "unary", op: "sqrt", operand };
  }
  return parsePrimary(cursor);
}

function parsePrimary(cursor: TokenCursor): AstNode {
  const token = cursor.tokens[cursor.index];
  if (!token) {
    throw new CompileError(
      { kind: "UnexpectedEndOfInput" },
      { tokenIndex: cursor.index },
    );
  }
  cursor.index += 1;

  switch (token.kind) {
    case "number":
      return { kind: "number", value: token.value };
    case "identifier":
      return { kind: "identifier", name: token.name, index: token.index };
    case "lparen": {
      const expr = parseExpr(cursor);
      // 閉じ括弧が無くてもエラーにせずそのまま続行する
      maybeToken(cursor, "rparen");
      return expr;
    }
    default:
      throw new CompileError(
        { kind: "UnexpectedToken", token: formatToken(token) },
        { tokenIndex: cursor.index - 1 },
      );
  }
}

