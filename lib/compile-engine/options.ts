export type CompileOptions = {
  /** 最適化後の三番地コードにピープホール最適化をかけるか (default: true) */
  peephole?: boolean;
};

export type NormalizedCompileOptions = Required<CompileOptions>;

export function normalizeOptions(
  options: CompileOptions = {},
): NormalizedCompileOptions {
  const peephole = options.peephole ?? true;
  if (typeof peephole !== "boolean") {
    throw new Error(
      `peephole は boolean で指定してください (got: ${String(peephole)})`,
    );
  }
  return { peephole };
}
