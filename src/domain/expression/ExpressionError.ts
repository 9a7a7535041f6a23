export type EvalErrorKind =
  | "DivisionByZero"
  | "UnsupportedConstruct"
  | "ParseError"
  | "NonFiniteResult";

export class ExpressionError extends Error {
  constructor(
    readonly kind: EvalErrorKind,
    message: string,
    readonly position?: number
  ) {
    super(message);
    this.name = "ExpressionError";
  }
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
