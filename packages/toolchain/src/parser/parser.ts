import type { Token, TokenKind } from "./token.js";
import { tokenize } from "./lexer.js";
import {
  AUGMENTED_ASSIGNMENT_OPS,
  isBinaryOperator,
  isComparisonOperator,
} from "./grammar.js";
import { failWith } from "../diagnostics/index.js";
import type { SourceLocation } from "../syntax/location.js";
import type {
  ComparisonOperator,
  Expr,
  ExprContext,
  If,
  Module,
  Stmt,
} from "../ast/nodes.js";

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

const unescapeString = (raw: string): string => {
  const body = raw.slice(1, -1);
  let result = "";
  for (let i = 0; i < body.length; i += 1) {
    const char = body[i];
    if (char !== "\\") {
      result += char;
      continue;
    }
    const next = body[i + 1];
    const escaped = ESCAPES[next];
    result += escaped ?? `\\${next}`;
    i += 1;
  }
  return result;
};

/** Whole numbers past the safe integer range keep every digit as a `bigint` */
const numberValue = (text: string): number | bigint => {
  const value = Number(text);
  return /^[0-9]+$/.test(text) && !Number.isSafeInteger(value) ? BigInt(text) : value;
};

const isAdditive = (value: string): value is "+" | "-" =>
  value === "+" || value === "-";

const isMultiplicative = (value: string): value is "*" | "/" | "//" | "%" =>
  value === "*" || value === "/" || value === "//" || value === "%";

const describeTarget = (expr: Expr): string => {
  switch (expr.kind) {
    case "Constant":
      return "literal";
    case "Call":
      return "function call";
    case "Compare":
      return "comparison";
    default:
      return "expression";
  }
};

/**
 * Recursive descent parser over the lexer's token stream. Comments are
 * dropped up front; every other token, layout tokens included, drives the
 * grammar.
 */
export class Parser {
  private readonly tokens: Token[];
  private position = 0;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens.filter((token) => token.kind !== "comment");
  }

  parseModule(): Module {
    const start = this.peek().location;
    const body: Stmt[] = [];
    while (!this.checkKind("eof")) {
      body.push(this.parseStatement());
    }
    return { kind: "Module", body, location: start.spanTo(this.peek().location) };
  }

  private parseStatement(): Stmt {
    const token = this.peek();
    if (token.isSymbol("if")) return this.parseIf();
    if (token.isSymbol("while")) return this.parseWhile();
    if (token.isSymbol("for")) return this.parseFor();

    const statement = this.parseSimpleStatement();
    this.expectKind("newline", "end of line");
    return statement;
  }

  private parseSimpleStatement(): Stmt {
    const token = this.peek();

    if (token.isSymbol("pass")) {
      this.advance();
      return { kind: "Pass", location: token.location };
    }

    if (token.isSymbol("break")) {
      this.advance();
      return { kind: "Break", location: token.location };
    }

    if (token.isSymbol("continue")) {
      this.advance();
      return { kind: "Continue", location: token.location };
    }

    if (token.isSymbol("del")) {
      this.advance();
      const targets = this.parseExprList();
      const list = targets.kind === "Tuple" ? targets.elts : [targets];
      return {
        kind: "Delete",
        targets: list.map((target) => this.toTarget(target, "del")),
        location: token.location.spanTo(targets.location),
      };
    }

    const first = this.parseExprList();

    if (this.check("=")) {
      const chain: Expr[] = [first];
      while (this.match("=")) {
        chain.push(this.parseExprList());
      }
      const value = chain[chain.length - 1];
      const targets = chain
        .slice(0, -1)
        .map((target) => this.toTarget(target, "store"));
      return {
        kind: "Assign",
        targets,
        value,
        location: first.location.spanTo(value.location),
      };
    }

    const next = this.peek();
    if (next.kind === "op" && AUGMENTED_ASSIGNMENT_OPS.has(next.value)) {
      this.advance();
      if (
        first.kind !== "Name" &&
        first.kind !== "Subscript" &&
        first.kind !== "Attribute"
      ) {
        return failWith({
          code: "PS0002",
          params: { target: describeTarget(first) },
          span: first.location.toSpan(),
        });
      }
      const op = next.value.slice(0, -1);
      if (!isBinaryOperator(op)) return this.unexpected("assignment operator");
      const value = this.parseExprList();
      return {
        kind: "AugAssign",
        target: { ...first, ctx: "store" },
        op,
        value,
        location: first.location.spanTo(value.location),
      };
    }

    return { kind: "Expr", value: first, location: first.location };
  }

  private parseIf(): If {
    const keyword = this.advance();
    const test = this.parseExpr();
    const body = this.parseBlock(keyword.value);
    let orelse: Stmt[] = [];

    if (this.check("elif")) {
      orelse = [this.parseIf()];
    } else if (this.check("else")) {
      const elseKeyword = this.advance();
      orelse = this.parseBlock(elseKeyword.value);
    }

    return { kind: "If", test, body, orelse, location: keyword.location };
  }

  private parseWhile(): Stmt {
    const keyword = this.advance();
    const test = this.parseExpr();
    const body = this.parseBlock(keyword.value);
    return { kind: "While", test, body, location: keyword.location };
  }

  private parseFor(): Stmt {
    const keyword = this.advance();
    const target = this.toTarget(this.parseExprList(), "store");
    this.expect("in", "'in'");
    const iter = this.parseExprList();
    const body = this.parseBlock(keyword.value);
    return { kind: "For", target, iter, body, location: keyword.location };
  }

  private parseBlock(keyword: string): Stmt[] {
    this.expect(":", "':'");

    if (!this.checkKind("newline")) {
      const statement = this.parseSimpleStatement();
      this.expectKind("newline", "end of line");
      return [statement];
    }

    this.advance();
    if (!this.checkKind("indent")) {
      return failWith({
        code: "PS0003",
        params: { keyword },
        span: this.peek().location.toSpan(),
      });
    }
    this.advance();

    const body: Stmt[] = [];
    while (!this.checkKind("dedent") && !this.checkKind("eof")) {
      body.push(this.parseStatement());
    }
    this.expectKind("dedent", "dedent");
    return body;
  }

  private toTarget(expr: Expr, ctx: ExprContext): Expr {
    switch (expr.kind) {
      case "Name":
      case "Subscript":
      case "Attribute":
        return { ...expr, ctx };
      case "Tuple":
      case "List":
        return {
          ...expr,
          ctx,
          elts: expr.elts.map((elt) => this.toTarget(elt, ctx)),
        };
      default:
        return failWith({
          code: "PS0002",
          params: { target: describeTarget(expr) },
          span: expr.location.toSpan(),
        });
    }
  }

  private parseExprList(): Expr {
    const first = this.parseExpr();
    if (!this.check(",")) return first;

    const elts: Expr[] = [first];
    let end = first.location;
    while (this.check(",")) {
      end = this.advance().location;
      if (!this.canStartExpr()) break;
      const next = this.parseExpr();
      elts.push(next);
      end = next.location;
    }

    return {
      kind: "Tuple",
      elts,
      ctx: "load",
      location: first.location.spanTo(end),
    };
  }

  private parseExpr(): Expr {
    return this.parseOr();
  }

  private parseOr(): Expr {
    const first = this.parseAnd();
    if (!this.check("or")) return first;
    const values: Expr[] = [first];
    while (this.match("or")) {
      values.push(this.parseAnd());
    }
    const last = values[values.length - 1];
    return {
      kind: "BoolOp",
      op: "or",
      values,
      location: first.location.spanTo(last.location),
    };
  }

  private parseAnd(): Expr {
    const first = this.parseNot();
    if (!this.check("and")) return first;
    const values: Expr[] = [first];
    while (this.match("and")) {
      values.push(this.parseNot());
    }
    const last = values[values.length - 1];
    return {
      kind: "BoolOp",
      op: "and",
      values,
      location: first.location.spanTo(last.location),
    };
  }

  private parseNot(): Expr {
    if (this.check("not")) {
      const keyword = this.advance();
      const operand = this.parseNot();
      return {
        kind: "UnaryOp",
        op: "not",
        operand,
        location: keyword.location.spanTo(operand.location),
      };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parseArith();
    const ops: ComparisonOperator[] = [];
    const comparators: Expr[] = [];

    let operator = this.peekOperator(isComparisonOperator);
    while (operator) {
      this.advance();
      ops.push(operator);
      comparators.push(this.parseArith());
      operator = this.peekOperator(isComparisonOperator);
    }

    if (ops.length === 0) return left;
    const last = comparators[comparators.length - 1];
    return {
      kind: "Compare",
      left,
      ops,
      comparators,
      location: left.location.spanTo(last.location),
    };
  }

  private parseArith(): Expr {
    let left = this.parseTerm();
    let op = this.peekOperator(isAdditive);
    while (op) {
      this.advance();
      const right = this.parseTerm();
      left = {
        kind: "BinOp",
        left,
        op,
        right,
        location: left.location.spanTo(right.location),
      };
      op = this.peekOperator(isAdditive);
    }
    return left;
  }

  private parseTerm(): Expr {
    let left = this.parseFactor();
    let op = this.peekOperator(isMultiplicative);
    while (op) {
      this.advance();
      const right = this.parseFactor();
      left = {
        kind: "BinOp",
        left,
        op,
        right,
        location: left.location.spanTo(right.location),
      };
      op = this.peekOperator(isMultiplicative);
    }
    return left;
  }

  private parseFactor(): Expr {
    if (this.check("-") || this.check("+")) {
      const operator = this.advance();
      const operand = this.parseFactor();
      return {
        kind: "UnaryOp",
        op: operator.value === "-" ? "-" : "+",
        operand,
        location: operator.location.spanTo(operand.location),
      };
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const base = this.parsePrimary();
    if (!this.match("**")) return base;
    const exponent = this.parseFactor();
    return {
      kind: "BinOp",
      left: base,
      op: "**",
      right: exponent,
      location: base.location.spanTo(exponent.location),
    };
  }

  private parsePrimary(): Expr {
    let expr = this.parseAtom();

    while (true) {
      if (this.match("(")) {
        const args: Expr[] = [];
        while (!this.check(")")) {
          args.push(this.parseExpr());
          if (!this.match(",")) break;
        }
        const close = this.expect(")", "')'");
        expr = {
          kind: "Call",
          func: expr,
          args,
          location: expr.location.spanTo(close.location),
        };
        continue;
      }

      if (this.match("[")) {
        const slice = this.parseExprList();
        const close = this.expect("]", "']'");
        expr = {
          kind: "Subscript",
          value: expr,
          slice,
          ctx: "load",
          location: expr.location.spanTo(close.location),
        };
        continue;
      }

      if (this.match(".")) {
        const name = this.expectKind("name", "attribute name");
        expr = {
          kind: "Attribute",
          value: expr,
          attr: name.value,
          ctx: "load",
          location: expr.location.spanTo(name.location),
        };
        continue;
      }

      return expr;
    }
  }

  private parseAtom(): Expr {
    const token = this.peek();

    if (token.kind === "name") {
      this.advance();
      return { kind: "Name", id: token.value, ctx: "load", location: token.location };
    }

    if (token.kind === "number") {
      this.advance();
      return { kind: "Constant", value: numberValue(token.value), location: token.location };
    }

    if (token.kind === "string") {
      let value = "";
      let end: SourceLocation = token.location;
      while (this.checkKind("string")) {
        const part = this.advance();
        value += unescapeString(part.value);
        end = part.location;
      }
      return { kind: "Constant", value, location: token.location.spanTo(end) };
    }

    if (token.isSymbol("True") || token.isSymbol("False") || token.isSymbol("None")) {
      this.advance();
      const value = token.value === "None" ? null : token.value === "True";
      return { kind: "Constant", value, location: token.location };
    }

    if (token.isSymbol("(")) {
      this.advance();
      if (this.check(")")) {
        const close = this.advance();
        return {
          kind: "Tuple",
          elts: [],
          ctx: "load",
          location: token.location.spanTo(close.location),
        };
      }
      const inner = this.parseExprList();
      this.expect(")", "')'");
      return inner;
    }

    if (token.isSymbol("[")) {
      this.advance();
      const elts: Expr[] = [];
      while (!this.check("]")) {
        elts.push(this.parseExpr());
        if (!this.match(",")) break;
      }
      const close = this.expect("]", "']'");
      return {
        kind: "List",
        elts,
        ctx: "load",
        location: token.location.spanTo(close.location),
      };
    }

    return this.unexpected("expression");
  }

  private canStartExpr(): boolean {
    const token = this.peek();
    switch (token.kind) {
      case "name":
      case "number":
      case "string":
        return true;
      case "keyword":
        return ["True", "False", "None", "not"].includes(token.value);
      case "op":
        return ["(", "[", "-", "+"].includes(token.value);
      default:
        return false;
    }
  }

  private peekOperator<T extends string>(
    accepts: (value: string) => value is T
  ): T | undefined {
    const token = this.peek();
    if (token.kind !== "op" || !accepts(token.value)) return undefined;
    return token.value;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.position, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (this.position < this.tokens.length - 1) {
      this.position += 1;
    }
    return token;
  }

  private check(value: string): boolean {
    return this.peek().isSymbol(value);
  }

  private checkKind(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private match(value: string): boolean {
    if (!this.check(value)) return false;
    this.advance();
    return true;
  }

  private expect(value: string, expected: string): Token {
    if (!this.check(value)) return this.unexpected(expected);
    return this.advance();
  }

  private expectKind(kind: TokenKind, expected: string): Token {
    if (!this.checkKind(kind)) return this.unexpected(expected);
    return this.advance();
  }

  private unexpected(expected: string): never {
    const token = this.peek();
    return failWith({
      code: "PS0001",
      params: { expected, found: token.describe() },
      span: token.location.toSpan(),
    });
  }
}

export const parseTokens = (tokens: readonly Token[]): Module =>
  new Parser(tokens).parseModule();

export const parse = (source: string, filePath = "<input>"): Module =>
  parseTokens(tokenize(source, filePath));
