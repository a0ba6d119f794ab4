import { describe, expect, it } from "vitest";
import { createExplorer } from "../explorer.js";
import { MemoryPanel } from "../panel.js";
import { STAGE_KINDS, type StageKind } from "../stages.js";

const createPanels = () =>
  ({
    source: new MemoryPanel(),
    tokens: new MemoryPanel(),
    ast: new MemoryPanel(),
    "optimized-ast": new MemoryPanel(),
    "pseudo-bytecode": new MemoryPanel(),
    "optimized-pseudo-bytecode": new MemoryPanel(),
    "final-bytecode": new MemoryPanel(),
  }) satisfies Record<StageKind, MemoryPanel>;

const texts = (panel: MemoryPanel) => panel.highlightedItems().map((item) => item.text);

const setup = (visible: readonly StageKind[] = STAGE_KINDS) => {
  const panels = createPanels();
  const explorer = createExplorer({ panels, visible });
  explorer.setSource("a = 1\nb = 2\n");
  return { explorer, panels };
};

describe("explorer", () => {
  it("highlights exactly what line 1 produced in every stage", () => {
    const { explorer, panels } = setup();

    explorer.selectLine(1);

    expect(texts(panels.source)).toEqual(["a = 1"]);
    expect(texts(panels.tokens)).toEqual(["NAME 'a'", "OP '='", "NUMBER '1'"]);
    expect(texts(panels.ast)).toEqual(["  Assign", "    Name a (store)", "    Constant 1"]);
    expect(texts(panels["final-bytecode"])).toEqual([
      "0 LOAD_CONST 0 (1)",
      "2 STORE_NAME 0 (a)",
    ]);
    STAGE_KINDS.forEach((kind) => {
      expect(panels[kind].highlightedItems().every((item) => item.line === 1)).toBe(true);
      expect(explorer.panelState(kind)).toBe("visible-highlighted");
    });
  });

  it("gives the same state when a line is selected twice", () => {
    const { explorer, panels } = setup();

    explorer.selectLine(2);
    const once = STAGE_KINDS.map((kind) => [...panels[kind].highlighted]);
    explorer.selectLine(2);
    const twice = STAGE_KINDS.map((kind) => [...panels[kind].highlighted]);

    expect(twice).toEqual(once);
    expect(explorer.currentLine).toBe(2);
  });

  it("clears panels that have nothing for the selected line", () => {
    const { explorer, panels } = setup();

    explorer.selectLine(1);
    explorer.selectLine(7);

    STAGE_KINDS.forEach((kind) => {
      expect(panels[kind].highlighted).toEqual([]);
      expect(explorer.panelState(kind)).toBe("visible-unhighlighted");
    });
  });

  it("sends nothing to hidden panels and keeps their last highlight", () => {
    const { explorer, panels } = setup(["source", "tokens"]);

    explorer.selectLine(1);
    expect(panels.ast.calls.highlight).toBe(0);
    expect(explorer.panelState("ast")).toBe("hidden");

    explorer.toggle("tokens");
    explorer.selectLine(2);
    expect(texts(panels.tokens)).toEqual(["NAME 'a'", "OP '='", "NUMBER '1'"]);

    explorer.toggle("tokens");
    expect(explorer.panelState("tokens")).toBe("visible-highlighted");
  });

  it("selects the line of an item picked in another stage", () => {
    const { explorer, panels } = setup();

    explorer.selectItem("tokens", 4);
    expect(explorer.currentLine).toBe(2);
    expect(texts(panels.tokens)).toEqual(["NAME 'b'", "OP '='", "NUMBER '2'"]);

    explorer.selectItem("tokens", 3);
    expect(explorer.currentLine).toBeUndefined();
    expect(panels.tokens.highlighted).toEqual([]);
  });

  it("leaves stale panels untouched after a failed edit", () => {
    const { explorer, panels } = setup();
    explorer.selectLine(2);

    const result = explorer.setSource("a = 1 +\n");
    expect(result.ok).toBe(false);
    expect(explorer.currentLine).toBe(2);

    explorer.selectLine(1);
    expect(texts(panels.tokens)).toEqual(["NAME 'a'", "OP '='", "NUMBER '1'", "OP '+'"]);
    expect(panels.ast.calls.highlight).toBe(1);
    expect(texts(panels.ast)).toEqual(["  Assign", "    Name b (store)", "    Constant 2"]);
  });

  it("clears the selection when new source compiles", () => {
    const { explorer, panels } = setup();
    explorer.selectLine(1);

    explorer.setSource("c = 3\n");

    expect(explorer.currentLine).toBeUndefined();
    expect(panels.tokens.highlighted).toEqual([]);
    expect(explorer.panelState("tokens")).toBe("visible-unhighlighted");
  });

  it("keeps the visible count when toggling a stage the legacy toolchain lacks", () => {
    const explorer = createExplorer({ toolchain: "legacy" });
    const before = explorer.view.visibleCount();

    expect(explorer.toggle("optimized-ast")).toBe(false);
    expect(explorer.view.visibleCount()).toBe(before);
    expect([...explorer.capabilities]).toEqual([
      "source",
      "tokens",
      "ast",
      "final-bytecode",
    ]);
  });
});
