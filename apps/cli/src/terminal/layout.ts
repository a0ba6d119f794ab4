import type { Layout, StageKind } from "@stagelens/explorer";
import { fit, type Colorizer } from "./ansi.js";
import type { TerminalPanel } from "./panel.js";

const SEPARATOR = " | ";

export const EMPTY_GRID_MESSAGE = "No stages visible. Press a stage key to show one.";

export type GridOptions = {
  layout: Layout;
  panels: Readonly<Record<StageKind, TerminalPanel>>;
  width: number;
  height: number;
  focused?: StageKind;
  isStale: (kind: StageKind) => boolean;
  color: Colorizer;
};

/** Column width that lets `columns` cells and their separators fill `width` */
export const columnWidth = (width: number, columns: number): number =>
  columns <= 0
    ? width
    : Math.max(1, Math.floor((width - SEPARATOR.length * (columns - 1)) / columns));

/** Splits `height` rows across `rows` grid rows; earlier rows take the remainder */
export const rowHeights = (height: number, rows: number): number[] => {
  if (rows <= 0) return [];
  const base = Math.floor(height / rows);
  const extra = height % rows;
  return Array.from({ length: rows }, (_, row) => base + (row < extra ? 1 : 0));
};

export const renderGrid = ({
  layout,
  panels,
  width,
  height,
  focused,
  isStale,
  color,
}: GridOptions): string[] => {
  if (layout.kinds.length === 0) {
    return Array.from({ length: height }, (_, row) =>
      row === 0 ? color.muted(fit(EMPTY_GRID_MESSAGE, width)) : " ".repeat(width)
    );
  }

  const cellWidth = columnWidth(width, layout.columns);
  const lines: string[] = [];

  rowHeights(height, layout.rows).forEach((rowHeight, row) => {
    const kinds = layout.kinds.slice(row * layout.columns, (row + 1) * layout.columns);
    const cells = Array.from({ length: layout.columns }, (_, column) => {
      const kind = kinds[column];
      if (!kind) return Array.from({ length: rowHeight }, () => " ".repeat(cellWidth));
      return panels[kind].render({
        width: cellWidth,
        height: rowHeight,
        focused: kind === focused,
        stale: isStale(kind),
        color,
      });
    });

    for (let line = 0; line < rowHeight; line += 1) {
      lines.push(cells.map((cell) => cell[line]).join(SEPARATOR));
    }
  });

  return lines;
};
