import type { BinaryOperator, ComparisonOperator } from "../ast/nodes.js";

export const KEYWORDS: ReadonlySet<string> = new Set([
  "and",
  "break",
  "continue",
  "del",
  "elif",
  "else",
  "for",
  "if",
  "in",
  "not",
  "or",
  "pass",
  "while",
  "True",
  "False",
  "None",
]);

/** Longest operators first so the lexer can take the first match */
export const OPERATORS: readonly string[] = [
  "**=",
  "//=",
  "**",
  "//",
  "==",
  "!=",
  "<=",
  ">=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "+",
  "-",
  "*",
  "/",
  "%",
  "<",
  ">",
  "=",
  "(",
  ")",
  "[",
  "]",
  ",",
  ":",
  ".",
];

export const OPENING_BRACKETS: ReadonlyMap<string, string> = new Map([
  ["(", ")"],
  ["[", "]"],
]);

export const CLOSING_BRACKETS: ReadonlySet<string> = new Set([")", "]"]);

export const AUGMENTED_ASSIGNMENT_OPS: ReadonlySet<string> = new Set([
  "+=",
  "-=",
  "*=",
  "/=",
  "//=",
  "%=",
  "**=",
]);

export const COMPARISON_OPS: ReadonlySet<string> = new Set([
  "==",
  "!=",
  "<",
  ">",
  "<=",
  ">=",
]);

export const isDigit = (char: string) => char >= "0" && char <= "9";

export const isIdentifierStart = (char: string) =>
  (char >= "a" && char <= "z") || (char >= "A" && char <= "Z") || char === "_";

export const isIdentifierChar = (char: string) =>
  isIdentifierStart(char) || isDigit(char);

export const isQuote = (char: string) => char === "'" || char === '"';

const BINARY_OPERATORS: ReadonlySet<string> = new Set([
  "+",
  "-",
  "*",
  "/",
  "//",
  "%",
  "**",
]);

export const isBinaryOperator = (value: string): value is BinaryOperator =>
  BINARY_OPERATORS.has(value);

export const isComparisonOperator = (
  value: string
): value is ComparisonOperator => COMPARISON_OPS.has(value);
