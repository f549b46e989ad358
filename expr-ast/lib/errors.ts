export type CompileErrorDetail =
  | { kind: "InvalidToken"; char: string }
  | { kind: "InvalidNumber"; text: string }
  | { kind: "UnexpectedToken"; token: string }
  | { kind: "UnexpectedEndOfInput" };

export type CompileErrorKind = CompileErrorDetail["kind"];

export type ErrorLocation = {
  /** 入力文字列中の位置 (字句エラー) */
  position?: number;
  /** トークン列中の位置 (構文エラー) */
  tokenIndex?: number;
};

export function describeCompileError(detail: CompileErrorDetail): string {
  switch (detail.kind) {
    case "InvalidToken":
      return `Invalid token: ${detail.char}`;
    case "InvalidNumber":
      return `Invalid number: ${detail.text}`;
    case "UnexpectedToken":
      return `Unexpected token: ${detail.token}`;
    case "UnexpectedEndOfInput":
      return "Unexpected end of input";
  }
}

export class CompileError extends Error {
  readonly detail: CompileErrorDetail;
  readonly location: ErrorLocation;

  constructor(detail: CompileErrorDetail, location: ErrorLocation = {}) {
    super(describeCompileError(detail));
    this.name = "CompileError";
    this.detail = detail;
    this.location = location;
  }
}
