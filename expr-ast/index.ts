export * from "./types/token";
export * from "./types/ast";
export { tokenize, formatToken, type LexResult } from "./lib/lexer";
export { parse } from "./lib/parser";
export {
  CompileError,
  describeCompileError,
  type CompileErrorDetail,
  type CompileErrorKind,
  type ErrorLocation,
} from "./lib/errors";
export {
  num,
  ident,
  binop,
  unary,
  hasVariables,
  evaluate,
  applyBinary,
  applyUnary,
  formatAst,
  formatNumber,
} from "./lib/ast";
