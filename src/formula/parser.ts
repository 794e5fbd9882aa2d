/**
 * Table Formula Parser
 *
 * Grammar (usual precedence, left associative):
 *   expr    := term (("+" | "-") term)*
 *   term    := unary (("*" | "/") unary)*
 *   unary   := "-" unary | primary
 *   primary := number | "{" column name "}" | "(" expr ")"
 *
 * Column names are matched against table headers case-insensitively.
 */

import { FormulaError } from "../errors";
import { normalizeHeader } from "../markdown/tables";

export type BinaryOperator = "+" | "-" | "*" | "/";

export type FormulaNode =
  | { kind: "number"; value: number }
  | { kind: "column"; name: string; key: string }
  | { kind: "negate"; operand: FormulaNode }
  | { kind: "binary"; op: BinaryOperator; left: FormulaNode; right: FormulaNode };

type Token =
  | { type: "number"; value: number; pos: number }
  | { type: "column"; name: string; pos: number }
  | { type: "op"; value: BinaryOperator; pos: number }
  | { type: "paren"; value: "(" | ")"; pos: number };

function tokenize(src: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < src.length) {
    const ch = src[i] ?? "";

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "{") {
      const close = src.indexOf("}", i + 1);
      if (close === -1) {
        throw new FormulaError({ message: `Unterminated column reference at ${i}`, formula: src, position: i });
      }
      const name = src.slice(i + 1, close).trim();
      if (!name) {
        throw new FormulaError({ message: `Empty column reference at ${i}`, formula: src, position: i });
      }
      tokens.push({ type: "column", name, pos: i });
      i = close + 1;
      continue;
    }

    const number = /^(?:\d+(?:\.\d+)?|\.\d+)/.exec(src.slice(i));
    if (number) {
      tokens.push({ type: "number", value: Number(number[0]), pos: i });
      i += number[0].length;
      continue;
    }

    if (ch === "+" || ch === "-" || ch === "*" || ch === "/") {
      tokens.push({ type: "op", value: ch, pos: i });
      i++;
      continue;
    }

    if (ch === "(" || ch === ")") {
      tokens.push({ type: "paren", value: ch, pos: i });
      i++;
      continue;
    }

    throw new FormulaError({ message: `Unexpected character '${ch}' at ${i}`, formula: src, position: i });
  }

  return tokens;
}

export function parseFormula(src: string): FormulaNode {
  const tokens = tokenize(src);
  let index = 0;

  const peek = (): Token | undefined => tokens[index];

  const fail = (message: string, token: Token | undefined): never => {
    const position = token?.pos ?? src.length;
    throw new FormulaError({ message: `${message} at ${position}`, formula: src, position });
  };

  function parseExpr(): FormulaNode {
    let left = parseTerm();
    for (let token = peek(); token?.type === "op" && (token.value === "+" || token.value === "-"); token = peek()) {
      index++;
      left = { kind: "binary", op: token.value, left, right: parseTerm() };
    }
    return left;
  }

  function parseTerm(): FormulaNode {
    let left = parseUnary();
    for (let token = peek(); token?.type === "op" && (token.value === "*" || token.value === "/"); token = peek()) {
      index++;
      left = { kind: "binary", op: token.value, left, right: parseUnary() };
    }
    return left;
  }

  function parseUnary(): FormulaNode {
    const token = peek();
    if (token?.type === "op" && token.value === "-") {
      index++;
      return { kind: "negate", operand: parseUnary() };
    }
    return parsePrimary();
  }

  function parsePrimary(): FormulaNode {
    const token = peek();
    if (!token) return fail("Unexpected end of formula", token);
    index++;

    switch (token.type) {
      case "number":
        return { kind: "number", value: token.value };
      case "column":
        return { kind: "column", name: token.name, key: normalizeHeader(token.name) };
      case "paren": {
        if (token.value === ")") return fail("Unexpected ')'", token);
        const inner = parseExpr();
        const close = peek();
        if (close?.type !== "paren" || close.value !== ")") return fail("Expected ')'", close);
        index++;
        return inner;
      }
      case "op":
        return fail(`Unexpected operator '${token.value}'`, token);
    }
  }

  const ast = parseExpr();
  if (index < tokens.length) {
    fail("Unexpected token", peek());
  }
  return ast;
}
