import type { BinaryOperator } from "./Expression";
import { isBinaryOperator } from "./Expression";
import { ExpressionError } from "./ExpressionError";

export type Token =
  | { type: "number"; value: number; position: number }
  | { type: "operator"; operator: BinaryOperator; position: number }
  | { type: "lparen"; position: number }
  | { type: "rparen"; position: number };

const DIGIT = /[0-9]/;
const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;
const WHITESPACE = /\s/;

function describeCharacter(ch: string): string {
  switch (ch) {
    case ";":
      return "statement separator ';'";
    case "=":
      return "assignment or comparison '='";
    case "<":
    case ">":
    case "!":
      return `comparison operator '${ch}'`;
    case "&":
    case "|":
    case "~":
      return `boolean or bitwise operator '${ch}'`;
    case '"':
    case "'":
    case "`":
      return "string literal";
    default:
      return `character '${ch}'`;
  }
}

/**
 * Splits an arithmetic expression into tokens. Only numbers, parentheses,
 * whitespace and the five binary operators are accepted; everything else is
 * rejected here, before any parsing happens.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (WHITESPACE.test(ch)) {
      pos++;
      continue;
    }

    if (DIGIT.test(ch) || (ch === "." && DIGIT.test(source[pos + 1] ?? ""))) {
      const start = pos;
      while (pos < source.length && DIGIT.test(source[pos])) pos++;
      if (source[pos] === ".") {
        pos++;
        while (pos < source.length && DIGIT.test(source[pos])) pos++;
      }
      if (source[pos] === ".") {
        throw new ExpressionError(
          "ParseError",
          `Malformed number "${source.slice(start, pos + 1)}" at position ${start}`,
          start
        );
      }
      tokens.push({ type: "number", value: Number(source.slice(start, pos)), position: start });
      continue;
    }

    if (ch === "(") {
      tokens.push({ type: "lparen", position: pos++ });
      continue;
    }

    if (ch === ")") {
      tokens.push({ type: "rparen", position: pos++ });
      continue;
    }

    if (isBinaryOperator(ch)) {
      tokens.push({ type: "operator", operator: ch, position: pos++ });
      continue;
    }

    if (IDENTIFIER_START.test(ch)) {
      const start = pos;
      while (pos < source.length && IDENTIFIER_PART.test(source[pos])) pos++;
      const name = source.slice(start, pos);
      let lookahead = pos;
      while (lookahead < source.length && WHITESPACE.test(source[lookahead])) lookahead++;
      const what =
        source[lookahead] === "(" ? `function call "${name}(...)"` : `name "${name}"`;
      throw new ExpressionError(
        "UnsupportedConstruct",
        `Unsupported ${what} at position ${start}; only numbers and + - * / ^ are allowed`,
        start
      );
    }

    throw new ExpressionError(
      "UnsupportedConstruct",
      `Unsupported ${describeCharacter(ch)} at position ${pos}`,
      pos
    );
  }

  return tokens;
}
