import { describe, expect, it } from "vitest";
import { DiagnosticError } from "../../diagnostics/index.js";
import { tokenize } from "../lexer.js";
import { formatToken } from "../token.js";

const kinds = (source: string) =>
  tokenize(source).map((token) => `${token.kind}:${token.value}`);

const lexerError = (source: string) => {
  let caught: unknown;
  try {
    tokenize(source, "/proj/snippet.tern");
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(DiagnosticError);
  if (!(caught instanceof DiagnosticError)) {
    throw new Error("expected a diagnostic error");
  }
  return caught.diagnostic;
};

describe("lexer", () => {
  it("tokenizes a simple assignment", () => {
    expect(kinds("a = 1\n")).toEqual([
      "name:a",
      "op:=",
      "number:1",
      "newline:\n",
      "eof:",
    ]);
  });

  it("records the line and column of each token", () => {
    const tokens = tokenize("a = 1\nbb = 22\n");
    const numbers = tokens.filter((token) => token.kind === "number");
    expect(numbers.map((token) => token.location.line)).toEqual([1, 2]);
    expect(numbers.map((token) => token.location.column)).toEqual([4, 5]);
    expect(numbers[1].location.startIndex).toBe(11);
    expect(numbers[1].location.endIndex).toBe(13);
  });

  it("emits indent and dedent tokens around blocks", () => {
    expect(kinds("if x:\n    y = 1\nz = 2\n")).toEqual([
      "keyword:if",
      "name:x",
      "op::",
      "newline:\n",
      "indent:    ",
      "name:y",
      "op:=",
      "number:1",
      "newline:\n",
      "dedent:",
      "name:z",
      "op:=",
      "number:2",
      "newline:\n",
      "eof:",
    ]);
  });

  it("closes open blocks at the end of input", () => {
    expect(kinds("while x:\n    x = 0")).toEqual([
      "keyword:while",
      "name:x",
      "op::",
      "newline:\n",
      "indent:    ",
      "name:x",
      "op:=",
      "number:0",
      "newline:",
      "dedent:",
      "eof:",
    ]);
  });

  it("joins lines inside brackets", () => {
    expect(kinds("f(1,\n  2)\n")).toEqual([
      "name:f",
      "op:(",
      "number:1",
      "op:,",
      "number:2",
      "op:)",
      "newline:\n",
      "eof:",
    ]);
  });

  it("keeps comments without treating comment lines as statements", () => {
    expect(kinds("# hi\nx = 1  # trailing\n")).toEqual([
      "comment:# hi",
      "name:x",
      "op:=",
      "number:1",
      "comment:# trailing",
      "newline:\n",
      "eof:",
    ]);
  });

  it("takes the longest operator and reads number forms", () => {
    expect(kinds("x **= 2.5e3 // .5\n")).toEqual([
      "name:x",
      "op:**=",
      "number:2.5e3",
      "op://",
      "number:.5",
      "newline:\n",
      "eof:",
    ]);
  });

  it("reads strings with escapes as single tokens", () => {
    expect(kinds("s = 'it\\'s' + \"ok\"\n")).toEqual([
      "name:s",
      "op:=",
      "string:'it\\'s'",
      "op:+",
      'string:"ok"',
      "newline:\n",
      "eof:",
    ]);
  });

  it("formats tokens for display", () => {
    const tokens = tokenize("print('hi')\n");
    expect(tokens.map(formatToken)).toEqual([
      "NAME 'print'",
      "OP '('",
      "STRING \"'hi'\"",
      "OP ')'",
      "NEWLINE '\\n'",
      "ENDMARKER ''",
    ]);
  });

  it("rejects tabs", () => {
    const diagnostic = lexerError("if x:\n\ty = 1\n");
    expect(diagnostic.code).toBe("LX0003");
    expect(diagnostic.phase).toBe("lexer");
    expect(diagnostic.span).toEqual({ file: "/proj/snippet.tern", start: 6, end: 6 });
  });

  it("rejects characters outside the language", () => {
    const diagnostic = lexerError("x = $\n");
    expect(diagnostic.code).toBe("LX0001");
    expect(diagnostic.message).toBe('invalid character "$"');
  });

  it("rejects unterminated strings", () => {
    expect(lexerError("x = 'abc\n").code).toBe("LX0002");
  });

  it("rejects unmatched brackets", () => {
    expect(lexerError("f(1\n").message).toBe("unmatched '('");
    expect(lexerError("x = 1)\n").message).toBe("unmatched ')'");
  });

  it("rejects dedents to an unknown level", () => {
    expect(lexerError("if x:\n        y\n    z\n").code).toBe("LX0004");
  });
});
