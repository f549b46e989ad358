import type { AstNode } from "@/expr-ast";
import { formatNumber } from "@/expr-ast";

/** 一度の生成パス全体で共有する一時変数カウンタ */
export type TempCounter = {
  next: number;
};

export type TacFragment = {
  lines: string[];
  /** この部分式の値を表すオペランド (リテラル / idN / tN) */
  result: string;
};

export const createTempCounter = (start = 1): TempCounter => ({ next: start });

function allocTemp(counter: TempCounter): string {
  const name = `t${counter.next}`;
  counter.next += 1;
  return name;
}

/**
 * AST を後順に線形化する。子のコードが親の行より先に、左の子が右の子より先に並ぶ。
 */
export function toThreeAddressCode(
  node: AstNode,
  counter: TempCounter,
): TacFragment {
  switch (node.kind) {
    case "number":
      return { lines: [], result: formatNumber(node.value) };
    case "identifier":
      return { lines: [], result: `id${node.index}` };
    case "binop": {
      const left = toThreeAddressCode(node.left, counter);
      const right = toThreeAddressCode(node.right, counter);
      const lines = [...left.lines, ...right.lines];
      if (node.op === "=") {
        lines.push(`${left.result} = ${right.result}`);
        return { lines, result: left.result };
      }
      const temp = allocTemp(counter);
      lines.push(`${temp} = ${left.result} ${node.op} ${right.result}`);
      return { lines, result: temp };
    }
    case "unary": {
      const operand = toThreeAddressCode(node.operand, counter);
      const temp = allocTemp(counter);
      return {
        lines: [...operand.lines, `${temp} = ${node.op}(${operand.result})`],
        result: temp,
      };
    }
  }
}

/**
 * 新しいカウンタで 1 回分の三番地コードを生成する。
 * 根が葉の場合は値を一時変数に代入する 1 行を出力する。
 */
export function generateThreeAddressCode(ast: AstNode): string[] {
  const counter = createTempCounter();
  const { lines, result } = toThreeAddressCode(ast, counter);
  if (lines.length === 0) {
    return [`${allocTemp(counter)} = ${result}`];
  }
  return lines;
}
