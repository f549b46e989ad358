import type { IdentifierTable, Token } from "../types/token";
import { formatNumber } from "./ast";
import { CompileError } from "./errors";

export type LexResult = {
  tokens: Token[];
  identifiers: IdentifierTable;
};

// 1 文字で確定する記号
const SYMBOLS: Record<string, Token> = {
  "+": { kind: "plus" },
  "-": { kind: "minus" },
  "*": { kind: "multiply" },
  "/": { kind: "divide" },
  "^": { kind: "power" },
  "(": { kind: "lparen" },
  ")": { kind: "rparen" },
  "=": { kind: "assign" },
};

const NUMBER_LITERAL = /^[0-9]+(\.[0-9]*)?$/;

// 文字クラスは Unicode の性質で判定する (数字以外の数値文字は数値リテラルの検査で弾く)
const isWhitespace = (ch: string) => /^\s$/u.test(ch);
const isDigit = (ch: string) => /^\p{N}$/u.test(ch);
const isNumberBody = (ch: string) => /^[\p{N}.]$/u.test(ch);
const isIdentStart = (ch: string) => /^[\p{Alphabetic}_]$/u.test(ch);
const isIdentBody = (ch: string) => /^[\p{Alphabetic}\p{N}_]$/u.test(ch);

// サロゲートペアを分割しないよう、位置 i から 1 コードポイント分を取り出す
const charAt = (input: string, i: number): string => {
  const code = input.codePointAt(i);
  return code === undefined ? "" : String.fromCodePoint(code);
};

/**
 * 入力を左から走査してトークン列と識別子表を作る。
 * 識別子は初出順に 1 からインデックスを振り、同名は同じインデックスを共有する。
 * エラーの position は入力文字列 (UTF-16) 上のオフセット。
 */
export function tokenize(input: string): LexResult {
  const tokens: Token[] = [];
  const table = new Map<string, number>();
  let i = 0;

  const internIdentifier = (name: string): number => {
    const existing = table.get(name);
    if (existing !== undefined) return existing;
    const index = table.size + 1;
    table.set(name, index);
    return index;
  };

  while (i < input.length) {
    const ch = charAt(input, i);
    if (isWhitespace(ch)) {
      i += ch.length;
      continue;
    }

    const symbol = SYMBOLS[ch];
    if (symbol) {
      tokens.push({ ...symbol });
      i += 1;
      continue;
    }

    if (isDigit(ch)) {
      let j = i + ch.length;
      while (j < input.length && isNumberBody(charAt(input, j))) {
        j += charAt(input, j).length;
      }
      const text = input.slice(i, j);
      if (!NUMBER_LITERAL.test(text)) {
        throw new CompileError(
          { kind: "InvalidNumber", text },
          { position: i },
        );
      }
      tokens.push({ kind: "number", value: Number(text) });
      i = j;
      continue;
    }

    if (isIdentStart(ch)) {
      let j = i + ch.length;
      while (j < input.length && isIdentBody(charAt(input, j))) {
        j += charAt(input, j).length;
      }
      const name = input.slice(i, j);
      if (name.toLowerCase() === "sqrt") {
        // 予約語は識別子表に登録しない
        tokens.push({ kind: "sqrt" });
      } else {
        tokens.push({ kind: "identifier", name, index: internIdentifier(name) });
      }
      i = j;
      continue;
    }

    throw new CompileError({ kind: "InvalidToken", char: ch }, { position: i });
  }

  const identifiers = Array.from(table, ([name, index]) => ({ name, index }));
  identifiers.sort((a, b) => a.index - b.index);
  return { tokens, identifiers };
}

export function formatToken(token: Token): string {
  switch (token.kind) {
    case "number":
      return `NUMBER(${formatNumber(token.value)})`;
    case "identifier":
      return `id${token.index}`;
    case "plus":
      return "PLUS";
    case "minus":
      return "MINUS";
    case "multiply":
      return "MUL";
    case "divide":
      return "DIV";
    case "power":
      return "POW";
    case "lparen":
      return "LPAREN";
    case "rparen":
      return "RPAREN";
    case "sqrt":
      return "SQRT";
    case "assign":
      return "ASSIGN";
  }
}
