import { describe, expect, it } from "vitest";
import { getConfigFromCli, parseArgs } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

const parseStrict = (argv: string[]) => parseArgs(argv, { throwOnError: true });

describe("parseArgs", () => {
  it("defaults to the full toolchain and the built-in snippet", () => {
    expect(parseArgs([])).toEqual({
      file: undefined,
      toolchain: "full",
      stages: undefined,
      dump: false,
      line: undefined,
      color: true,
    });
  });

  it("reads every option", () => {
    expect(
      parseArgs([
        "demo.tern",
        "--toolchain",
        "legacy",
        "--stages",
        "source,opt-ast,code",
        "--dump",
        "--line",
        "3",
        "--no-color",
      ])
    ).toEqual({
      file: "demo.tern",
      toolchain: "legacy",
      stages: ["source", "optimized-ast", "final-bytecode"],
      dump: true,
      line: 3,
      color: false,
    });
  });

  it("accepts stage kinds and drops repeated stages", () => {
    expect(parseArgs(["-s", "tokens, tokens,final-bytecode"]).stages).toEqual([
      "tokens",
      "final-bytecode",
    ]);
  });

  it("rejects unknown toolchains", () => {
    expect(() => parseStrict(["--toolchain", "nightly"])).toThrow(
      /invalid toolchain "nightly" \(allowed: full, legacy\)/
    );
  });

  it("rejects unknown stages", () => {
    expect(() => parseStrict(["--stages", "source,bogus"])).toThrow(/unknown stage "bogus"/);
  });

  it("rejects lines that are not positive integers", () => {
    expect(() => parseStrict(["--line", "0"])).toThrow(
      /line must be a positive integer, got "0"/
    );
    expect(() => parseStrict(["--line", "1.5"])).toThrow(/positive integer/);
  });
});

describe("getConfigFromCli", () => {
  it("reads the process arguments", () => {
    const config = runWithArgv(["node", "stagelens", "snippet.tern", "--dump"]);
    expect(config.file).toBe("snippet.tern");
    expect(config.dump).toBe(true);
  });
});
