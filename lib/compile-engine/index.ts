import {
  CompileError,
  type CompileErrorDetail,
  evaluate,
  hasVariables,
  parse,
  tokenize,
} from "@/expr-ast";
import { generateThreeAddressCode } from "@/tac-builder";
import { optimize, peepholeOptimize } from "@/expr-optimizer";
import { semanticCheck } from "@/lib/semantic-check";
import {
  COMPILE_SCHEMA_VERSION,
  type CompilationResult,
  type CompileErrorInfo,
  type CompileOutcome,
} from "@/lib/compile-schema";
import { type CompileOptions, normalizeOptions } from "./options";

export type { CompileOptions };
export { normalizeOptions };

function detailText(detail: CompileErrorDetail): string | undefined {
  switch (detail.kind) {
    case "InvalidToken":
      return detail.char;
    case "InvalidNumber":
      return detail.text;
    case "UnexpectedToken":
      return detail.token;
    case "UnexpectedEndOfInput":
      return undefined;
  }
}

function buildErrorInfo(err: CompileError): CompileErrorInfo {
  const info: CompileErrorInfo = { type: err.detail.kind, message: err.message };
  const text = detailText(err.detail);
  if (text !== undefined) info.text = text;
  if (err.location.position !== undefined) info.position = err.location.position;
  if (err.location.tokenIndex !== undefined) {
    info.tokenIndex = err.location.tokenIndex;
  }
  return info;
}

function runPipeline(
  input: string,
  options: CompileOptions,
): CompilationResult {
  const { peephole } = normalizeOptions(options);
  const { tokens, identifiers } = tokenize(input);
  if (tokens.length === 0) {
    throw new CompileError({ kind: "UnexpectedEndOfInput" }, { tokenIndex: 0 });
  }

  const ast = parse(tokens);
  const semanticWarnings = semanticCheck(ast);
  const threeAddressCode = generateThreeAddressCode(ast);

  // 最適化後の木から一時変数番号を振り直して生成する
  const optimizedAst = optimize(ast);
  const generated = generateThreeAddressCode(optimizedAst);
  const optimizedThreeAddressCode = peephole
    ? peepholeOptimize(generated)
    : generated;

  const result: CompilationResult = {
    schemaVersion: COMPILE_SCHEMA_VERSION,
    tokens,
    identifiers,
    ast,
    semanticWarnings,
    threeAddressCode,
    optimizedAst,
    optimizedThreeAddressCode,
  };
  if (!hasVariables(ast)) result.value = evaluate(ast);
  return result;
}

/**
 * 字句解析 → 構文解析 → 意味検査 → 三番地コード生成 → 最適化 を一括で実行するファサード。
 * 字句・構文エラーは error フィールドで返し、部分的な結果は返さない。
 */
export function compile(
  input: string,
  options: CompileOptions = {},
): CompileOutcome {
  try {
    return { ok: true, result: runPipeline(input, options) };
  } catch (err) {
    if (err instanceof CompileError) {
      return { ok: false, error: buildErrorInfo(err) };
    }
    throw err;
  }
}
