import { describe, expect, it } from "vitest";
import { DiagnosticError } from "../../diagnostics/index.js";
import { dumpModule } from "../../ast/dump.js";
import { parse } from "../parser.js";

const dump = (source: string) =>
  dumpModule(parse(source)).map((line) => line.text);

const parserError = (source: string) => {
  let caught: unknown;
  try {
    parse(source);
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(DiagnosticError);
  if (!(caught instanceof DiagnosticError)) {
    throw new Error("expected a diagnostic error");
  }
  return caught.diagnostic;
};

describe("parser", () => {
  it("respects operator precedence", () => {
    expect(dump("x = -1 + 2 * 3 ** 2\n")).toEqual([
      "Module",
      "  Assign",
      "    Name x (store)",
      "    BinOp +",
      "      UnaryOp -",
      "        Constant 1",
      "      BinOp *",
      "        Constant 2",
      "        BinOp **",
      "          Constant 3",
      "          Constant 2",
    ]);
  });

  it("keeps every digit of integers past the safe range", () => {
    const [assign] = parse("x = 9007199254740993\n").body;
    expect(assign).toMatchObject({ kind: "Assign", value: { value: 9007199254740993n } });
    expect(dump("y = 9007199254740991\nz = 1.5e20\n")).toEqual([
      "Module",
      "  Assign",
      "    Name y (store)",
      "    Constant 9007199254740991",
      "  Assign",
      "    Name z (store)",
      "    Constant 150000000000000000000",
    ]);
  });

  it("parses tuple targets and chained assignment", () => {
    expect(dump("a, b = c = 1, 2\n")).toEqual([
      "Module",
      "  Assign",
      "    Tuple (store)",
      "      Name a (store)",
      "      Name b (store)",
      "    Name c (store)",
      "    Tuple",
      "      Constant 1",
      "      Constant 2",
    ]);
  });

  it("parses boolean operators and chained comparisons", () => {
    expect(dump("ok = not a or 0 < b <= 9 and c\n")).toEqual([
      "Module",
      "  Assign",
      "    Name ok (store)",
      "    BoolOp or",
      "      UnaryOp not",
      "        Name a",
      "      BoolOp and",
      "        Compare < <=",
      "          Constant 0",
      "          Name b",
      "          Constant 9",
      "        Name c",
    ]);
  });

  it("parses calls, subscripts and attributes", () => {
    expect(dump("obj.items[0] += f(x, 'y')\n")).toEqual([
      "Module",
      "  AugAssign +=",
      "    Subscript (store)",
      "      Attribute .items",
      "        Name obj",
      "      Constant 0",
      "    Call",
      "      Name f",
      "      Name x",
      "      Constant 'y'",
    ]);
  });

  it("parses if, elif and else blocks", () => {
    const source = [
      "if a:",
      "    x = 1",
      "elif b:",
      "    pass",
      "else:",
      "    del x",
      "",
    ].join("\n");

    expect(dump(source)).toEqual([
      "Module",
      "  If",
      "    Name a",
      "    Assign",
      "      Name x (store)",
      "      Constant 1",
      "    orelse:",
      "      If",
      "        Name b",
      "        Pass",
      "        orelse:",
      "          Delete",
      "            Name x (del)",
    ]);
  });

  it("parses loops with inline bodies", () => {
    expect(dump("for i in range(3): continue\nwhile True: break\n")).toEqual([
      "Module",
      "  For",
      "    Name i (store)",
      "    Call",
      "      Name range",
      "      Constant 3",
      "    Continue",
      "  While",
      "    Constant True",
      "    Break",
    ]);
  });

  it("attributes every node to the line it starts on", () => {
    const lines = dumpModule(parse("a = 1\nb = 2\n")).map((line) => line.line);
    expect(lines).toEqual([undefined, 1, 1, 1, 2, 2, 2]);
  });

  it("concatenates adjacent string literals and reads literals", () => {
    expect(dump("x = 'a' \"b\"\ny = [None, False, ()]\n")).toEqual([
      "Module",
      "  Assign",
      "    Name x (store)",
      "    Constant 'ab'",
      "  Assign",
      "    Name y (store)",
      "    List",
      "      Constant None",
      "      Constant False",
      "      Tuple",
    ]);
  });

  it("reports unexpected tokens", () => {
    const diagnostic = parserError("x = 1 +\n");
    expect(diagnostic.code).toBe("PS0001");
    expect(diagnostic.message).toBe("expected expression, found end of line");
  });

  it("reports invalid assignment targets", () => {
    expect(parserError("f() = 1\n").message).toBe("cannot assign to function call");
    expect(parserError("1 += 1\n").message).toBe("cannot assign to literal");
  });

  it("reports missing indented blocks", () => {
    const diagnostic = parserError("while x:\ny = 1\n");
    expect(diagnostic.code).toBe("PS0003");
    expect(diagnostic.message).toBe("expected an indented block after 'while'");
  });
});
