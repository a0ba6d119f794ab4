import { describe, expect, it } from "vitest";
import { TernToolchainAdapter } from "@stagelens/explorer";
import { renderDump } from "../dump.js";

describe("renderDump", () => {
  it("prints the visible panels and marks the selected line", () => {
    const { text, error } = renderDump({
      adapter: new TernToolchainAdapter(),
      source: "a = 1\nb = 2\n",
      visible: ["source", "final-bytecode"],
      line: 2,
    });

    expect(error).toBeUndefined();
    expect(text).toBe(
      [
        "Source (1)",
        "  a = 1",
        "* b = 2",
        "",
        "Final Bytecode (7)",
        "  0 LOAD_CONST 0 (1)",
        "  2 STORE_NAME 0 (a)",
        "* 4 LOAD_CONST 1 (2)",
        "* 6 STORE_NAME 1 (b)",
        "  8 LOAD_CONST 2 (None)",
        "  10 RETURN_VALUE",
        "",
      ].join("\n")
    );
  });

  it("lists stage diagnostics under their panel", () => {
    const { text } = renderDump({
      adapter: new TernToolchainAdapter(),
      source: "if 1:\n    x = 2\n",
      visible: ["optimized-ast"],
    });

    const lines = text.split("\n");
    expect(lines[0]).toBe("Optimized AST (4)");
    expect(lines.at(-2)).toBe("  WARNING OP0001 line 1: condition is always true");
  });

  it("returns the failure and leaves unproduced stages empty", () => {
    const { text, error } = renderDump({
      adapter: new TernToolchainAdapter(),
      source: "a = 1 +\n",
      visible: ["source", "ast"],
    });

    expect(text).toBe("Source (1)\n  a = 1 +\n\nAST (3)\n  (no output)\n");
    expect(error).toMatchObject({ type: "compilation-failed", stage: "ast" });
  });

  it("skips stages the toolchain lacks", () => {
    const { text } = renderDump({
      adapter: new TernToolchainAdapter({ version: "legacy" }),
      source: "pass\n",
      visible: ["source", "pseudo-bytecode"],
    });

    expect(text).toBe("Source (1)\n  pass\n");
  });
});
