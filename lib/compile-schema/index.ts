import type {
  AstNode,
  CompileErrorKind,
  IdentifierTable,
  Token,
} from "@/expr-ast";

export const COMPILE_SCHEMA_VERSION = "1.0.0" as const;

export type CompilationResult = {
  /** 互換性管理のためのスキーマバージョン */
  schemaVersion: typeof COMPILE_SCHEMA_VERSION;
  /** 表示用のトークン列 */
  tokens: readonly Token[];
  /** index 昇順の識別子表 */
  identifiers: IdentifierTable;
  ast: AstNode;
  /** 前順走査で検出した警告 */
  semanticWarnings: readonly string[];
  threeAddressCode: readonly string[];
  optimizedAst: AstNode;
  optimizedThreeAddressCode: readonly string[];
  /** 変数を含まない場合のみ、AST の評価値 */
  value?: number;
};

export type CompileErrorInfo = {
  type: CompileErrorKind;
  /** UI にそのまま表示できるメッセージ */
  message: string;
  /** InvalidToken の文字、InvalidNumber の字句、UnexpectedToken の表示形 */
  text?: string;
  position?: number;
  tokenIndex?: number;
};

export type CompileOutcome =
  | { ok: true; result: CompilationResult }
  | { ok: false; error: CompileErrorInfo };
