export type BinaryOperator = "+" | "-" | "*" | "/" | "^";

export const BINARY_OPERATORS: readonly BinaryOperator[] = ["+", "-", "*", "/", "^"];

export interface NumberLiteral {
  readonly kind: "number";
  readonly value: number;
}

export interface BinaryExpression {
  readonly kind: "binary";
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

// The only two node kinds. Names, calls and unary operators have no representation.
export type Expression = NumberLiteral | BinaryExpression;

export function literal(value: number): NumberLiteral {
  return Object.freeze({ kind: "number", value });
}

export function binary(
  operator: BinaryOperator,
  left: Expression,
  right: Expression
): BinaryExpression {
  return Object.freeze({ kind: "binary", operator, left, right });
}

export function isBinaryOperator(value: string): value is BinaryOperator {
  return (BINARY_OPERATORS as readonly string[]).includes(value);
}
