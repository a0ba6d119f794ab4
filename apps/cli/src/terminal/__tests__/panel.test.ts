import { describe, expect, it } from "vitest";
import { createColorizer } from "../ansi.js";
import { TerminalPanel, panelTitle } from "../panel.js";

const plain = createColorizer(false);

const items = (...texts: string[]) => texts.map((text, index) => ({ text, line: index + 1 }));

const render = (panel: TerminalPanel, { focused = false, height = 3 } = {}) =>
  panel.render({ width: 12, height, focused, stale: false, color: plain });

describe("TerminalPanel", () => {
  it("titles panels with their toggle key", () => {
    expect(panelTitle("optimized-ast")).toBe("Optimized AST (4)");
  });

  it("renders the title and items at a fixed width", () => {
    const panel = new TerminalPanel("source");
    panel.setContent(items("a = 1", "b = 2"));

    expect(render(panel)).toEqual(["  Source (1)", "   a = 1    ", "   b = 2    "]);
  });

  it("marks the cursor and highlighted items", () => {
    const panel = new TerminalPanel("source");
    panel.setContent(items("a = 1", "b = 2"));
    panel.moveCursor(1);
    panel.highlight([1]);

    expect(render(panel, { focused: true })).toEqual([
      "> Source (1)",
      ">  a = 1    ",
      " * b = 2    ",
    ]);
  });

  it("flags stale panels and truncates long lines", () => {
    const panel = new TerminalPanel("tokens");
    panel.setContent([{ text: "NAME 'counter'", line: 1 }]);

    expect(
      panel.render({ width: 12, height: 2, focused: false, stale: true, color: plain })
    ).toEqual(["  Tokens (2…", "   NAME 'co…"]);
  });

  it("scrolls highlighted items into view", () => {
    const panel = new TerminalPanel("source");
    panel.setContent(items("a", "b", "c", "d", "e"));
    panel.highlight([4]);

    expect(render(panel)).toEqual(["  Source (1)", "   d        ", " * e        "]);
  });

  it("clamps the cursor to the items", () => {
    const panel = new TerminalPanel("source");
    expect(panel.moveCursor(1)).toBeUndefined();

    panel.setContent(items("a", "b"));
    expect(panel.moveCursor(-1)).toBe(0);
    expect(panel.moveCursor(5)).toBe(1);

    panel.setContent(items("a"));
    expect(panel.cursor).toBe(0);
  });

  it("clears its highlight", () => {
    const panel = new TerminalPanel("source");
    panel.setContent(items("a"));
    panel.highlight([0]);
    panel.clearHighlight();
    expect(panel.isHighlighted(0)).toBe(false);
  });
});
