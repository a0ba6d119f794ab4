import type { StageItem } from "./artifact.js";
import type { StageKind } from "./stages.js";

/** Rendering surface for one stage */
export interface PanelView {
  setContent(items: readonly StageItem[]): void;
  highlight(indices: readonly number[]): void;
  clearHighlight(): void;
}

export type PanelRegistry = Partial<Record<StageKind, PanelView>>;

/** Panel that only remembers what it was told to show */
export class MemoryPanel implements PanelView {
  items: readonly StageItem[] = [];
  highlighted: readonly number[] = [];
  /** Number of calls received, by method */
  readonly calls = { setContent: 0, highlight: 0, clearHighlight: 0 };

  setContent(items: readonly StageItem[]): void {
    this.calls.setContent += 1;
    this.items = items;
  }

  highlight(indices: readonly number[]): void {
    this.calls.highlight += 1;
    this.highlighted = [...indices];
  }

  clearHighlight(): void {
    this.calls.clearHighlight += 1;
    this.highlighted = [];
  }

  highlightedItems(): StageItem[] {
    return this.highlighted.map((index) => this.items[index]);
  }
}
