import { isTemp, joinLine, splitLine, tempsIn } from "@/tac-builder";

/**
 * `t = <expr>; x = t` の形で t が他で使われていない場合に `x = <expr>` へ畳む。
 * 複数回参照される一時変数や、単独の一時変数以外の右辺はそのまま残す。
 */
export function peepholeOptimize(lines: readonly string[]): string[] {
  const parsed = lines.map(splitLine);
  const definitions = new Map<string, string>();
  const usage = new Map<string, number>();

  // 1. 定義と使用回数の収集
  for (const line of parsed) {
    if (!line) continue;
    if (isTemp(line.dest)) definitions.set(line.dest, line.rhs);
    for (const temp of tempsIn(line.rhs)) {
      usage.set(temp, (usage.get(temp) ?? 0) + 1);
    }
  }

  const usedOnce = (temp: string) => usage.get(temp) === 1;
  const substitutable = (rhs: string) =>
    isTemp(rhs) && definitions.has(rhs) && usedOnce(rhs);

  // `t2 = t1` のような連鎖は元の式まで辿る
  const resolve = (rhs: string): string => {
    const seen = new Set<string>();
    let current = rhs;
    while (substitutable(current) && !seen.has(current)) {
      seen.add(current);
      current = definitions.get(current) ?? current;
    }
    return current;
  };

  // 2. 直後の行が単純コピーしている定義行を除去対象にする
  const skip = new Set<number>();
  for (let i = 0; i + 1 < parsed.length; i += 1) {
    const current = parsed[i];
    const next = parsed[i + 1];
    if (!current || !next) continue;
    if (isTemp(current.dest) && next.rhs === current.dest && usedOnce(current.dest)) {
      skip.add(i);
    }
  }

  // 隣接していないコピーでも、置換した一時変数の定義行は消費済みとして落とす
  const consumed = new Set<string>();
  parsed.forEach((line, i) => {
    if (line && !skip.has(i) && substitutable(line.rhs)) consumed.add(line.rhs);
  });

  // 3. 置換しながら組み立て
  const optimized: string[] = [];
  parsed.forEach((line, i) => {
    if (skip.has(i)) return;
    if (!line) {
      optimized.push(lines[i]);
      return;
    }
    if (consumed.has(line.dest)) return;
    if (substitutable(line.rhs)) {
      optimized.push(joinLine({ dest: line.dest, rhs: resolve(line.rhs) }));
      return;
    }
    optimized.push(lines[i]);
  });

  return optimized;
}
