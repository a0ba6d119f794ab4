import { describe, expect, it } from "vitest";
import { CompilationFailedError, StageUnavailableError } from "../../errors.js";
import type { StageKind } from "../../stages.js";
import { TernToolchainAdapter } from "../tern.js";

const failure = (adapter: TernToolchainAdapter, source: string, kind: StageKind) => {
  let caught: unknown;
  try {
    adapter.run(source, kind);
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(CompilationFailedError);
  if (!(caught instanceof CompilationFailedError)) {
    throw new Error("expected a compilation failure");
  }
  return caught;
};

describe("TernToolchainAdapter", () => {
  it("lists source lines", () => {
    const adapter = new TernToolchainAdapter();
    expect(adapter.run("x = 1\n\ny = 2\n", "source").items).toEqual([
      { text: "x = 1", line: 1 },
      { text: "", line: 2 },
      { text: "y = 2", line: 3 },
    ]);
  });

  it("leaves layout tokens unattributed", () => {
    const adapter = new TernToolchainAdapter();
    expect(adapter.run("if a:\n    b\n", "tokens").items).toEqual([
      { text: "KEYWORD 'if'", line: 1 },
      { text: "NAME 'a'", line: 1 },
      { text: "OP ':'", line: 1 },
      { text: "NEWLINE '\\n'", line: undefined },
      { text: "INDENT '    '", line: undefined },
      { text: "NAME 'b'", line: 2 },
      { text: "NEWLINE '\\n'", line: undefined },
      { text: "DEDENT ''", line: undefined },
      { text: "ENDMARKER ''", line: undefined },
    ]);
  });

  it("produces final bytecode with the implicit return unattributed", () => {
    const adapter = new TernToolchainAdapter();
    expect(adapter.run("a = 1\n", "final-bytecode").items).toEqual([
      { text: "0 LOAD_CONST 0 (1)", line: 1 },
      { text: "2 STORE_NAME 0 (a)", line: 1 },
      { text: "4 LOAD_CONST 1 (None)", line: undefined },
      { text: "6 RETURN_VALUE", line: undefined },
    ]);
  });

  it("compiles a source once for all of its stages", () => {
    const adapter = new TernToolchainAdapter();
    const first = adapter.run("a = 1\n", "tokens");
    adapter.run("a = 1\n", "ast");
    expect(adapter.run("a = 1\n", "tokens")).toBe(first);
    expect(adapter.run("a = 2\n", "tokens")).not.toBe(first);
  });

  it("reports optimizer warnings as stage diagnostics", () => {
    const adapter = new TernToolchainAdapter();
    expect(adapter.run("if 1:\n    x = 2\n", "optimized-ast").diagnostics).toEqual([
      {
        code: "OP0001",
        severity: "warning",
        message: "condition is always true",
        line: 1,
        column: 1,
      },
    ]);
  });

  it("fails the tokens stage on lexer errors", () => {
    const error = failure(new TernToolchainAdapter(), "x = 1\ny = $\n", "tokens");
    expect(error.stage).toBe("tokens");
    expect(error.message).toBe('LX0001 at 2:5: invalid character "$"');
    expect(error.diagnostic?.line).toBe(2);
  });

  it("fails the stage whose phase rejected the source", () => {
    const adapter = new TernToolchainAdapter();
    expect(adapter.run("break\n", "ast").items).toHaveLength(2);

    const error = failure(adapter, "break\n", "pseudo-bytecode");
    expect(error.stage).toBe("pseudo-bytecode");
    expect(error.message).toBe("CG0001 at 1:1: 'break' outside loop");
  });

  it("surfaces hidden phase failures at the next legacy stage", () => {
    const adapter = new TernToolchainAdapter({ version: "legacy" });
    expect(adapter.run("break\n", "ast").items).toHaveLength(2);

    const error = failure(adapter, "break\n", "final-bytecode");
    expect(error.stage).toBe("final-bytecode");
    expect(error.message).toBe("CG0001 at 1:1: 'break' outside loop");
  });

  it("refuses stages the legacy toolchain lacks", () => {
    const adapter = new TernToolchainAdapter({ version: "legacy" });
    expect(() => adapter.run("a = 1\n", "optimized-ast")).toThrow(StageUnavailableError);
  });
});
