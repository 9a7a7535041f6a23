export type { BinaryOperator, BinaryExpression, Expression, NumberLiteral } from "./Expression";
export { ExpressionError } from "./ExpressionError";
export type { EvalErrorKind, Result } from "./ExpressionError";
export { tokenize } from "./Lexer";
export { parseExpression, MAX_EXPRESSION_LENGTH, MAX_NESTING_DEPTH } from "./Parser";
export { evaluate, evaluateTree } from "./evaluate";
