// 式 AST の型定義

export type BinaryOp = "+" | "-" | "*" | "/" | "^" | "=";
export type UnaryOp = "sqrt";

export type AstNode =
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "identifier"; readonly name: string; readonly index: number }
  | {
      readonly kind: "binop";
      readonly op: BinaryOp;
      readonly left: AstNode;
      readonly right: AstNode;
    }
  | { readonly kind: "unary"; readonly op: UnaryOp; readonly operand: AstNode };

export type NumberNode = Extract<AstNode, { kind: "number" }>;
export type IdentifierNode = Extract<AstNode, { kind: "identifier" }>;
export type BinaryNode = Extract<AstNode, { kind: "binop" }>;
export type UnaryNode = Extract<AstNode, { kind: "unary" }>;
