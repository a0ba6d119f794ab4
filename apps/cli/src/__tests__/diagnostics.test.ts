import { describe, expect, it } from "vitest";
import type { PipelineError } from "@stagelens/explorer";
import { formatPipelineFailure, formatStageDiagnostic } from "../diagnostics.js";
import { stripAnsi } from "../terminal/ansi.js";

const parseFailure: PipelineError = {
  type: "compilation-failed",
  stage: "ast",
  message: "PS0001 at 1:8: expected expression, found end of line",
  diagnostic: {
    code: "PS0001",
    severity: "error",
    message: "expected expression, found end of line",
    line: 1,
    column: 8,
  },
};

describe("formatPipelineFailure", () => {
  it("renders the location and source snippet", () => {
    const formatted = formatPipelineFailure(parseFailure, {
      source: "a = 1 +\n",
      file: "demo.tern",
      color: false,
    });

    expect(formatted.split("\n")).toEqual([
      "demo.tern:1:8 ERROR [AST] PS0001: expected expression, found end of line",
      " |",
      "1 | a = 1 +",
      ` | ${" ".repeat(7)}^ expected expression, found end of line`,
    ]);
  });

  it("colors only decorate the plain rendering", () => {
    const options = { source: "a = 1 +\n", file: "demo.tern" };
    const colored = formatPipelineFailure(parseFailure, { ...options, color: true });

    expect(colored).not.toBe(formatPipelineFailure(parseFailure, { ...options, color: false }));
    expect(stripAnsi(colored)).toBe(
      formatPipelineFailure(parseFailure, { ...options, color: false })
    );
  });

  it("falls back to the summary without a located diagnostic", () => {
    const formatted = formatPipelineFailure(
      { type: "compilation-failed", stage: "final-bytecode", message: "no code" },
      { source: "", file: "<snippet>", color: false }
    );
    expect(formatted).toBe("<snippet> ERROR Final Bytecode failed: no code");
  });

  it("reports adapter crashes", () => {
    const formatted = formatPipelineFailure(
      { type: "adapter-crash", stage: "tokens", message: "boom", cause: new Error("boom") },
      { source: "", file: "<snippet>", color: false }
    );
    expect(formatted).toBe("<snippet> ERROR Toolchain crashed during Tokens: boom");
  });
});

describe("formatStageDiagnostic", () => {
  it("prints severity, code and line", () => {
    expect(
      formatStageDiagnostic(
        { code: "OP0001", severity: "warning", message: "condition is always true", line: 1 },
        { color: false }
      )
    ).toBe("WARNING OP0001 line 1: condition is always true");
  });
});
