import { STAGE_INFO, type PanelView, type StageItem, type StageKind } from "@stagelens/explorer";
import { fit, type Colorizer } from "./ansi.js";

export type PanelRenderOptions = {
  width: number;
  /** Rows including the title row */
  height: number;
  focused: boolean;
  stale: boolean;
  color: Colorizer;
};

export const panelTitle = (kind: StageKind): string =>
  `${STAGE_INFO[kind].title} (${STAGE_INFO[kind].key})`;

/**
 * A stage panel drawn as text. Keeps its own cursor and scroll offset; the
 * highlight is whatever the broadcaster last pushed.
 */
export class TerminalPanel implements PanelView {
  readonly kind: StageKind;
  private items: readonly StageItem[] = [];
  private highlighted: ReadonlySet<number> = new Set();
  private cursorIndex?: number;
  private scroll = 0;
  /** Item to bring into view on the next render */
  private reveal?: number;

  constructor(kind: StageKind) {
    this.kind = kind;
  }

  get cursor(): number | undefined {
    return this.cursorIndex;
  }

  get itemCount(): number {
    return this.items.length;
  }

  isHighlighted(index: number): boolean {
    return this.highlighted.has(index);
  }

  setContent(items: readonly StageItem[]): void {
    this.items = items;
    if (this.cursorIndex !== undefined) {
      this.cursorIndex = items.length > 0 ? Math.min(this.cursorIndex, items.length - 1) : undefined;
    }
    this.scroll = Math.min(this.scroll, Math.max(0, items.length - 1));
  }

  highlight(indices: readonly number[]): void {
    this.highlighted = new Set(indices);
    this.reveal = indices[0];
  }

  clearHighlight(): void {
    this.highlighted = new Set();
    this.reveal = undefined;
  }

  /** Moves the cursor by `delta`; the first move lands on the first item */
  moveCursor(delta: number): number | undefined {
    if (this.items.length === 0) return undefined;

    const next = this.cursorIndex === undefined ? 0 : this.cursorIndex + delta;
    this.cursorIndex = Math.min(Math.max(next, 0), this.items.length - 1);
    this.reveal = this.cursorIndex;
    return this.cursorIndex;
  }

  render({ width, height, focused, stale, color }: PanelRenderOptions): string[] {
    const bodyHeight = Math.max(0, height - 1);
    this.scrollTo(bodyHeight);

    const title = fit(`${focused ? "> " : "  "}${panelTitle(this.kind)}${stale ? " [stale]" : ""}`, width);
    const lines = [focused ? color.focus(title) : color.accent(title)];

    for (let row = 0; row < bodyHeight; row += 1) {
      const index = this.scroll + row;
      const item = this.items[index];
      if (!item) {
        lines.push(" ".repeat(Math.max(0, width)));
        continue;
      }

      const cursorMark = focused && index === this.cursorIndex ? ">" : " ";
      const highlightMark = this.highlighted.has(index) ? "*" : " ";
      const text = fit(`${cursorMark}${highlightMark} ${item.text}`, width);
      lines.push(this.highlighted.has(index) ? color.highlight(text) : text);
    }

    return lines;
  }

  private scrollTo(bodyHeight: number) {
    const target = this.reveal;
    this.reveal = undefined;
    if (target === undefined || bodyHeight === 0) return;

    if (target < this.scroll) {
      this.scroll = target;
    } else if (target >= this.scroll + bodyHeight) {
      this.scroll = target - bodyHeight + 1;
    }
  }
}
