import { describe, expect, it } from "vitest";
import type { StageKind } from "@stagelens/explorer";
import { createColorizer } from "../ansi.js";
import { EMPTY_GRID_MESSAGE, columnWidth, renderGrid, rowHeights } from "../layout.js";
import { TerminalPanel } from "../panel.js";

const createPanels = (): Record<StageKind, TerminalPanel> => ({
  source: new TerminalPanel("source"),
  tokens: new TerminalPanel("tokens"),
  ast: new TerminalPanel("ast"),
  "optimized-ast": new TerminalPanel("optimized-ast"),
  "pseudo-bytecode": new TerminalPanel("pseudo-bytecode"),
  "optimized-pseudo-bytecode": new TerminalPanel("optimized-pseudo-bytecode"),
  "final-bytecode": new TerminalPanel("final-bytecode"),
});

const plain = createColorizer(false);

describe("grid layout", () => {
  it("splits the width between columns and separators", () => {
    expect(columnWidth(80, 1)).toBe(80);
    expect(columnWidth(80, 2)).toBe(38);
    expect(columnWidth(80, 3)).toBe(24);
  });

  it("gives earlier rows the leftover height", () => {
    expect(rowHeights(10, 3)).toEqual([4, 3, 3]);
    expect(rowHeights(10, 0)).toEqual([]);
  });

  it("places panels side by side", () => {
    const panels = createPanels();
    panels.source.setContent([{ text: "a = 1", line: 1 }]);
    panels.tokens.setContent([{ text: "NAME 'a'", line: 1 }]);

    const lines = renderGrid({
      layout: { columns: 2, rows: 1, kinds: ["source", "tokens"] },
      panels,
      width: 33,
      height: 2,
      focused: "tokens",
      isStale: () => false,
      color: plain,
    });

    expect(lines).toEqual([
      `${"  Source (1)".padEnd(15)} | ${"> Tokens (2)".padEnd(15)}`,
      `${"   a = 1".padEnd(15)} | ${"   NAME 'a'".padEnd(15)}`,
    ]);
  });

  it("fills the missing cells of the last row", () => {
    const lines = renderGrid({
      layout: { columns: 3, rows: 2, kinds: ["source", "tokens", "ast", "final-bytecode"] },
      panels: createPanels(),
      width: 42,
      height: 2,
      isStale: () => false,
      color: plain,
    });

    expect(lines).toEqual([
      ["  Source (1)", "  Tokens (2)", "  AST (3)   "].join(" | "),
      ["  Final Byt…", " ".repeat(12), " ".repeat(12)].join(" | "),
    ]);
  });

  it("explains an empty grid", () => {
    const lines = renderGrid({
      layout: { columns: 0, rows: 0, kinds: [] },
      panels: createPanels(),
      width: 60,
      height: 2,
      isStale: () => false,
      color: plain,
    });

    expect(lines).toEqual([EMPTY_GRID_MESSAGE.padEnd(60), " ".repeat(60)]);
  });
});
