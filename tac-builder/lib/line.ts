// 三番地コード 1 行の分解ヘルパ

export type TacLine = {
  dest: string;
  rhs: string;
};

const TEMP_NAME = /^t\d+$/;
const TEMP_TOKEN = /\bt\d+\b/g;

export const isTemp = (operand: string): boolean => TEMP_NAME.test(operand);

export function splitLine(line: string): TacLine | undefined {
  const match = line.trim().match(/^(\S+)\s+=\s+(.+)$/);
  if (!match) return undefined;
  const [, dest, rhs] = match;
  return { dest, rhs: rhs.trim() };
}

export const joinLine = ({ dest, rhs }: TacLine): string => `${dest} = ${rhs}`;

/** 右辺に現れる一時変数名を出現順に列挙する (重複あり) */
export function tempsIn(rhs: string): string[] {
  return rhs.match(TEMP_TOKEN) ?? [];
}
