// 字句解析が生成するトークンの型定義

export type Token =
  | { kind: "number"; value: number }
  | { kind: "identifier"; name: string; index: number }
  | { kind: "plus" }
  | { kind: "minus" }
  | { kind: "multiply" }
  | { kind: "divide" }
  | { kind: "power" }
  | { kind: "lparen" }
  | { kind: "rparen" }
  | { kind: "sqrt" }
  | { kind: "assign" };

export type TokenKind = Token["kind"];

export type IdentifierEntry = {
  name: string;
  /** 初出順に 1 から振られるインデックス */
  index: number;
};

// index 昇順に並んだ読み取り専用の識別子表
export type IdentifierTable = readonly IdentifierEntry[];
