import type { Expression } from "./Expression";
import { binary, literal } from "./Expression";
import { ExpressionError } from "./ExpressionError";
import type { Token } from "./Lexer";
import { tokenize } from "./Lexer";

export const MAX_EXPRESSION_LENGTH = 1000;
export const MAX_NESTING_DEPTH = 64;

function describe(token: Token | undefined): string {
  if (!token) return "end of expression";
  switch (token.type) {
    case "number":
      return `number ${token.value}`;
    case "operator":
      return `'${token.operator}'`;
    case "lparen":
      return "'('";
    case "rparen":
      return "')'";
  }
}

class Parser {
  private pos = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expression {
    if (!this.tokens.length) {
      throw new ExpressionError("ParseError", "Expression is empty");
    }
    const expr = this.parseSum();
    const extra = this.peek();
    if (extra) {
      throw new ExpressionError(
        "ParseError",
        `Unexpected ${describe(extra)} at position ${extra.position}`,
        extra.position
      );
    }
    return expr;
  }

  // sum := product (("+" | "-") product)*
  private parseSum(): Expression {
    let left = this.parseProduct();
    for (let next = this.peek(); next?.type === "operator"; next = this.peek()) {
      if (next.operator !== "+" && next.operator !== "-") break;
      this.pos++;
      left = binary(next.operator, left, this.parseProduct());
    }
    return left;
  }

  // product := power (("*" | "/") power)*
  private parseProduct(): Expression {
    let left = this.parsePower();
    for (let next = this.peek(); next?.type === "operator"; next = this.peek()) {
      if (next.operator !== "*" && next.operator !== "/") break;
      this.pos++;
      left = binary(next.operator, left, this.parsePower());
    }
    return left;
  }

  // power := primary ("^" power)?
  private parsePower(): Expression {
    const base = this.parsePrimary();
    const next = this.peek();
    if (next?.type === "operator" && next.operator === "^") {
      this.pos++;
      return binary("^", base, this.parsePower());
    }
    return base;
  }

  private parsePrimary(): Expression {
    const token = this.peek();
    if (!token) {
      throw new ExpressionError("ParseError", "Expression ended where a number was expected");
    }

    if (token.type === "number") {
      this.pos++;
      return literal(token.value);
    }

    if (token.type === "lparen") {
      this.pos++;
      if (++this.depth > MAX_NESTING_DEPTH) {
        throw new ExpressionError(
          "ParseError",
          `Parentheses nested deeper than ${MAX_NESTING_DEPTH} levels`,
          token.position
        );
      }
      const inner = this.parseSum();
      const closing = this.peek();
      if (closing?.type !== "rparen") {
        throw new ExpressionError(
          "ParseError",
          `Missing ')' for '(' at position ${token.position}`,
          token.position
        );
      }
      this.pos++;
      this.depth--;
      return inner;
    }

    if (token.type === "operator" && (token.operator === "-" || token.operator === "+")) {
      throw new ExpressionError(
        "UnsupportedConstruct",
        `Unary '${token.operator}' at position ${token.position} is not supported; write it as a subtraction from 0`,
        token.position
      );
    }

    throw new ExpressionError(
      "ParseError",
      `Expected a number or '(' but found ${describe(token)} at position ${token.position}`,
      token.position
    );
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }
}

export function parseExpression(source: string): Expression {
  if (source.length > MAX_EXPRESSION_LENGTH) {
    throw new ExpressionError(
      "ParseError",
      `Expression is longer than ${MAX_EXPRESSION_LENGTH} characters`
    );
  }
  return new Parser(tokenize(source)).parse();
}
