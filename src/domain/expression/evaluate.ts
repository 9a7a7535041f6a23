import type { BinaryOperator, Expression } from "./Expression";
import type { Result } from "./ExpressionError";
import { ExpressionError } from "./ExpressionError";
import { parseExpression } from "./Parser";

function apply(operator: BinaryOperator, left: number, right: number): number {
  switch (operator) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      if (right === 0) {
        throw new ExpressionError("DivisionByZero", "Division by zero");
      }
      return left / right;
    case "^":
      if (left === 0 && right < 0) {
        throw new ExpressionError("DivisionByZero", "Zero cannot be raised to a negative power");
      }
      return Math.pow(left, right);
  }
}

export function evaluateTree(node: Expression): number {
  if (node.kind === "number") {
    if (!Number.isFinite(node.value)) {
      throw new ExpressionError("NonFiniteResult", "Number literal is too large");
    }
    return node.value;
  }

  const value = apply(node.operator, evaluateTree(node.left), evaluateTree(node.right));
  if (!Number.isFinite(value)) {
    throw new ExpressionError(
      "NonFiniteResult",
      `'${node.operator}' produced a value that is not a finite number`
    );
  }
  return value;
}

export function evaluate(expression: string): Result<number, ExpressionError> {
  try {
    return { ok: true, value: evaluateTree(parseExpression(expression)) };
  } catch (err) {
    if (err instanceof ExpressionError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
