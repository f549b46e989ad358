#!/usr/bin/env tsx
import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { formatAst, formatToken } from "../expr-ast";
import { compile } from "../lib/compile-engine";
import type {
  CompilationResult,
  CompileErrorInfo,
  CompileOutcome,
} from "../lib/compile-schema";

export type OutputFormat = "text" | "json";

const DEFAULT_TARGET = "expr_case";
const DEFAULT_FORMAT: OutputFormat = "text";
const CASE_EXTENSION = ".expr";

type CliOptions = {
  format: OutputFormat;
  peephole: boolean;
};

type ParsedArgs = {
  options: CliOptions;
  targets: string[];
  expressions: string[];
};

type CompileFn = (source: string, options: CliOptions) => CompileOutcome;

const defaultCompile: CompileFn = (source, opts) =>
  compile(source, { peephole: opts.peephole });

async function main() {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
    return;
  }
  const { options, targets, expressions } = parsed;

  let hadFailure = false;
  for (const source of expressions) {
    if (!runExpression(source, options)) hadFailure = true;
  }

  if (expressions.length === 0 || targets.length > 0) {
    const targetList = targets.length > 0 ? targets : [DEFAULT_TARGET];
    const files = await collectExprFiles(targetList);
    if (files.length === 0) {
      console.error("式ファイルが見つかりませんでした。");
      process.exitCode = 1;
      return;
    }
    for (const filePath of files) {
      const ok = await runSingleCase(filePath, options);
      if (!ok) hadFailure = true;
    }
  }

  if (hadFailure) {
    process.exitCode = 1;
  }
}

function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = {
    format: DEFAULT_FORMAT,
    peephole: true,
  };
  const targets: string[] = [];
  const expressions: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      targets.push(arg);
      continue;
    }

    // 値側にも `=` が現れる (代入式) ので最初の `=` でだけ分割する
    const at = arg.indexOf("=");
    const [flag, maybeValue]: [string, string | undefined] =
      at === -1 ? [arg, undefined] : [arg.slice(0, at), arg.slice(at + 1)];

    switch (flag) {
      case "--format": {
        const value = maybeValue ?? argv[++i];
        if (value === "text" || value === "json") {
          options.format = value;
          break;
        }
        throw new Error(
          `--format は 'text' | 'json' を指定してください (got: ${value ?? ""})`,
        );
      }
      case "--expr": {
        const value = maybeValue ?? argv[++i];
        if (value === undefined) {
          throw new Error("--expr には式を指定してください");
        }
        expressions.push(value);
        break;
      }
      case "--no-peephole": {
        options.peephole = false;
        break;
      }
      case "--help": {
        printUsage();
        process.exit(0);
        break;
      }
      default:
        throw new Error(`未知のフラグです: ${flag}`);
    }
  }

  return { options, targets, expressions };
}

function printUsage() {
  console.log(`式コンパイラ実行スクリプト
Usage: tsx scripts/compile-expr.ts [options] [file|dir ...]

Options:
  --expr <source>        指定した式をコンパイルする (複数指定可)
  --format <text|json>   出力形式 (default: text)
  --no-peephole          最適化後の三番地コードにピープホール最適化をかけない
  --help                 このヘルプを表示

引数を省略すると expr_case/ 以下の全 .expr を実行します。
.expr ファイルは 1 行 1 式で、空行と # で始まる行は無視します。`);
}

async function collectExprFiles(targets: string[]): Promise<string[]> {
  const collected = new Set<string>();
  for (const raw of targets) {
    const resolved = path.resolve(raw);
    try {
      const stats = await fs.stat(resolved);
      if (stats.isDirectory()) {
        await collectFromDir(resolved, collected);
      } else if (stats.isFile() && resolved.endsWith(CASE_EXTENSION)) {
        collected.add(resolved);
      }
    } catch (err) {
      console.error(`パスを解決できませんでした: ${raw}`);
      console.error(err);
    }
  }
  return Array.from(collected).sort();
}

async function collectFromDir(dir: string, acc: Set<string>) {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  await Promise.all(
    entries.map(async (entry) => {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await collectFromDir(fullPath, acc);
      } else if (entry.isFile() && entry.name.endsWith(CASE_EXTENSION)) {
        acc.add(fullPath);
      }
    }),
  );
}

function readCases(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

async function runSingleCase(
  filePath: string,
  options: CliOptions,
  compileFn: CompileFn = defaultCompile,
): Promise<boolean> {
  const relPath = path.relative(process.cwd(), filePath) || filePath;
  console.log(`\n### ${relPath}`);

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    console.error("ファイルを読み込めませんでした", err);
    return false;
  }

  let ok = true;
  for (const source of readCases(content)) {
    if (!runExpression(source, options, compileFn)) ok = false;
  }
  return ok;
}

function runExpression(
  source: string,
  options: CliOptions,
  compileFn: CompileFn = defaultCompile,
): boolean {
  const outcome = compileFn(source, options);
  if (options.format === "json") {
    console.log(JSON.stringify({ source, ...outcome }, keepNonFinite, 2));
  } else {
    for (const line of formatOutcome(source, outcome)) console.log(line);
  }
  return outcome.ok;
}

// JSON は Infinity / NaN を null にしてしまうので文字列で残す
function keepNonFinite(_key: string, value: unknown): unknown {
  return typeof value === "number" && !Number.isFinite(value)
    ? String(value)
    : value;
}

function formatOutcome(source: string, outcome: CompileOutcome): string[] {
  const lines = [`\n=== ${source} ===`];
  if (!outcome.ok) {
    lines.push(...formatError(outcome.error));
    return lines;
  }
  lines.push(...formatResult(outcome.result));
  return lines;
}

function formatResult(result: CompilationResult): string[] {
  const identifiers = result.identifiers
    .map(({ name, index }) => `${name}=id${index}`)
    .join(", ");
  const lines = [
    `tokens     : ${result.tokens.map(formatToken).join(" ")}`,
    `identifiers: ${identifiers || "none"}`,
    `ast        : ${formatAst(result.ast)}`,
  ];
  if (result.semanticWarnings.length === 0) {
    lines.push("warnings   : none");
  } else {
    lines.push("warnings   :");
    lines.push(...result.semanticWarnings.map((w) => `  ${w}`));
  }
  lines.push("tac        :");
  lines.push(...result.threeAddressCode.map((l) => `  ${l}`));
  lines.push(`optimized  : ${formatAst(result.optimizedAst)}`);
  lines.push("opt tac    :");
  lines.push(...result.optimizedThreeAddressCode.map((l) => `  ${l}`));
  lines.push(
    `value      : ${
      result.value === undefined ? "(contains variables)" : String(result.value)
    }`,
  );
  return lines;
}

function formatError(error: CompileErrorInfo): string[] {
  return [`error.type : ${error.type}`, `error.msg  : ${error.message}`];
}

const isEntryPoint =
  process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}

export { parseArgs, runSingleCase, runExpression, formatOutcome, readCases };
