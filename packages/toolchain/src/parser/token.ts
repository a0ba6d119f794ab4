import type { SourceLocation } from "../syntax/location.js";
import { formatConstant } from "../ast/format.js";

export type TokenKind =
  | "name"
  | "keyword"
  | "number"
  | "string"
  | "op"
  | "comment"
  | "newline"
  | "indent"
  | "dedent"
  | "eof";

/** Tokens that carry layout rather than text written on a line */
export const LAYOUT_TOKEN_KINDS: ReadonlySet<TokenKind> = new Set([
  "newline",
  "indent",
  "dedent",
  "eof",
]);

export class Token {
  readonly kind: TokenKind;
  readonly location: SourceLocation;
  value = "";

  constructor(opts: { kind: TokenKind; location: SourceLocation; value?: string }) {
    const { kind, value, location } = opts;
    this.kind = kind;
    this.value = value ?? "";
    this.location = location;
  }

  get length() {
    return this.value.length;
  }

  get hasChars() {
    return !!this.value.length;
  }

  get isLayout() {
    return LAYOUT_TOKEN_KINDS.has(this.kind);
  }

  addChar(string: string) {
    this.value += string;
  }

  is(string?: string) {
    return this.value === string;
  }

  /** Whether this is the operator or keyword `value` */
  isSymbol(value: string) {
    return (this.kind === "op" || this.kind === "keyword") && this.value === value;
  }

  describe(): string {
    switch (this.kind) {
      case "newline":
        return "end of line";
      case "indent":
        return "indent";
      case "dedent":
        return "dedent";
      case "eof":
        return "end of input";
      default:
        return `'${this.value}'`;
    }
  }
}

const TOKEN_KIND_NAMES: Record<TokenKind, string> = {
  name: "NAME",
  keyword: "KEYWORD",
  number: "NUMBER",
  string: "STRING",
  op: "OP",
  comment: "COMMENT",
  newline: "NEWLINE",
  indent: "INDENT",
  dedent: "DEDENT",
  eof: "ENDMARKER",
};

/** `<KIND> '<text>'`, with the text quoted the way a string constant is */
export const formatToken = (token: Token): string =>
  `${TOKEN_KIND_NAMES[token.kind]} ${formatConstant(token.value)}`;
