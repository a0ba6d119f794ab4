import { Token, type TokenKind } from "./token.js";
import { SourceCursor } from "./source-cursor.js";
import {
  CLOSING_BRACKETS,
  KEYWORDS,
  OPENING_BRACKETS,
  OPERATORS,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isQuote,
} from "./grammar.js";
import {
  failWith,
  type DiagnosticCode,
  type DiagnosticParams,
} from "../diagnostics/index.js";
import type { SourceLocation } from "../syntax/location.js";

/**
 * Indentation-aware lexer. Produces the full token stream for a source
 * text, including comments and the layout tokens (NEWLINE, INDENT, DEDENT
 * and a final EOF) the parser relies on. Newlines inside brackets are
 * implicit line joins and produce no layout tokens.
 */
export class Lexer {
  private readonly cursor: SourceCursor;
  private readonly indents: number[] = [0];
  private readonly brackets: Token[] = [];
  private readonly tokens: Token[] = [];
  private atLineStart = true;
  private lineHasContent = false;

  constructor(cursor: SourceCursor) {
    this.cursor = cursor;
  }

  tokenize(): Token[] {
    const cursor = this.cursor;

    while (!cursor.done) {
      if (this.atLineStart && this.brackets.length === 0) {
        this.consumeIndentation();
        continue;
      }

      const char = cursor.peek();

      if (char === " " || char === "\r") {
        cursor.advance();
        continue;
      }

      if (char === "\t") {
        this.fail("LX0003", {}, cursor.location());
      }

      if (char === "\n") {
        this.consumeNewline();
        continue;
      }

      if (char === "#") {
        this.consumeComment();
        continue;
      }

      if (isDigit(char) || (char === "." && isDigit(cursor.peek(1)))) {
        this.consumeNumber();
        continue;
      }

      if (isIdentifierStart(char)) {
        this.consumeName();
        continue;
      }

      if (isQuote(char)) {
        this.consumeString();
        continue;
      }

      this.consumeOperator();
    }

    this.finish();
    return this.tokens;
  }

  private consumeIndentation() {
    const cursor = this.cursor;
    const start = cursor.location();
    let width = 0;

    while (cursor.peek() === " " || cursor.peek() === "\t") {
      if (cursor.peek() === "\t") {
        this.fail("LX0003", {}, cursor.location());
      }
      cursor.advance();
      width += 1;
    }

    const next = cursor.peek();
    const blank =
      next === "" || next === "\n" || next === "\r" || next === "#";
    if (blank) {
      if (next === "#") {
        this.consumeComment();
      }
      if (cursor.peek() === "\r") cursor.advance();
      if (cursor.peek() === "\n") cursor.advance();
      return;
    }

    this.atLineStart = false;
    const current = this.indents[this.indents.length - 1];

    if (width > current) {
      this.indents.push(width);
      const location = start.clone();
      location.setEndToStartOf(cursor.location());
      this.push("indent", " ".repeat(width), location);
      return;
    }

    while (width < this.indents[this.indents.length - 1]) {
      this.indents.pop();
      this.push("dedent", "", cursor.location());
    }

    if (width !== this.indents[this.indents.length - 1]) {
      this.fail("LX0004", {}, cursor.location());
    }
  }

  private consumeNewline() {
    const cursor = this.cursor;
    const location = cursor.location();
    cursor.advance();

    if (this.brackets.length > 0) return;

    if (this.lineHasContent) {
      location.setEndToStartOf(cursor.location());
      this.push("newline", "\n", location);
    }
    this.lineHasContent = false;
    this.atLineStart = true;
  }

  private consumeComment() {
    const cursor = this.cursor;
    const token = this.startToken("comment");
    token.addChar(cursor.takeWhile((char) => char !== "\n" && char !== "\r"));
    this.endToken(token, false);
  }

  private consumeNumber() {
    const cursor = this.cursor;
    const token = this.startToken("number");

    token.addChar(cursor.takeWhile(isDigit));

    if (cursor.peek() === "." && isDigit(cursor.peek(1))) {
      token.addChar(cursor.advance());
      token.addChar(cursor.takeWhile(isDigit));
    } else if (cursor.peek() === "." && token.hasChars) {
      token.addChar(cursor.advance());
    }

    const exponentSign = cursor.peek(1) === "+" || cursor.peek(1) === "-";
    const exponentDigit = exponentSign ? cursor.peek(2) : cursor.peek(1);
    if (
      (cursor.peek() === "e" || cursor.peek() === "E") &&
      isDigit(exponentDigit)
    ) {
      token.addChar(cursor.advance());
      if (exponentSign) token.addChar(cursor.advance());
      token.addChar(cursor.takeWhile(isDigit));
    }

    this.endToken(token);
  }

  private consumeName() {
    const cursor = this.cursor;
    const token = this.startToken("name");
    token.addChar(cursor.takeWhile(isIdentifierChar));
    const kind: TokenKind = KEYWORDS.has(token.value) ? "keyword" : "name";
    this.endToken(this.retag(token, kind));
  }

  private consumeString() {
    const cursor = this.cursor;
    const token = this.startToken("string");
    const quote = cursor.advance();
    token.addChar(quote);

    while (true) {
      const next = cursor.peek();
      if (next === "" || next === "\n" || next === "\r") {
        this.fail("LX0002", {}, token.location);
      }

      token.addChar(cursor.advance());
      if (next === "\\") {
        if (cursor.done || cursor.peek() === "\n") {
          this.fail("LX0002", {}, token.location);
        }
        token.addChar(cursor.advance());
        continue;
      }

      if (next === quote) break;
    }

    this.endToken(token);
  }

  private consumeOperator() {
    const cursor = this.cursor;
    const operator = OPERATORS.find((candidate) => cursor.startsWith(candidate));

    if (!operator) {
      this.fail("LX0001", { char: cursor.peek() }, cursor.location());
    }

    const token = this.startToken("op");
    token.addChar(cursor.take(operator.length));

    if (OPENING_BRACKETS.has(operator)) {
      this.brackets.push(token);
    } else if (CLOSING_BRACKETS.has(operator)) {
      const opening = this.brackets.pop();
      if (!opening || OPENING_BRACKETS.get(opening.value) !== operator) {
        this.fail("LX0005", { bracket: operator }, token.location);
      }
    }

    this.endToken(token);
  }

  private finish() {
    const unclosed = this.brackets[this.brackets.length - 1];
    if (unclosed) {
      this.fail("LX0005", { bracket: unclosed.value }, unclosed.location);
    }

    const end = this.cursor.location();
    if (this.lineHasContent) {
      this.push("newline", "", end);
    }

    while (this.indents.length > 1) {
      this.indents.pop();
      this.push("dedent", "", end.clone());
    }

    this.push("eof", "", end.clone());
  }

  private startToken(kind: TokenKind): Token {
    return new Token({ kind, location: this.cursor.location() });
  }

  private retag(token: Token, kind: TokenKind): Token {
    if (token.kind === kind) return token;
    return new Token({ kind, location: token.location, value: token.value });
  }

  private endToken(token: Token, significant = true) {
    token.location.setEndToStartOf(this.cursor.location());
    this.tokens.push(token);
    if (significant) this.lineHasContent = true;
  }

  private push(kind: TokenKind, value: string, location: SourceLocation) {
    this.tokens.push(new Token({ kind, value, location }));
  }

  private fail<K extends DiagnosticCode>(
    code: K,
    params: DiagnosticParams<K>,
    location: SourceLocation
  ): never {
    return failWith({ code, params, span: location.toSpan() });
  }
}

export const tokenize = (source: string, filePath = "<input>"): Token[] =>
  new Lexer(new SourceCursor(source, filePath)).tokenize();
