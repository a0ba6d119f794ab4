export type Position = { index: number; line: number; column: number };

const clampIndex = (value: number, max: number): number => {
  if (value < 0) return 0;
  if (value > max) return max;
  return value;
};

export const createLineStarts = (source: string): number[] => {
  const starts = [0];
  for (let i = 0; i < source.length; i += 1) {
    if (source[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
};

const lineIndexFor = (starts: number[], index: number): number => {
  let line = 0;
  for (let i = 1; i < starts.length; i += 1) {
    if (starts[i] > index) break;
    line = i;
  }
  return line;
};

/** 1-based line, 0-based column of a character index */
export const positionAt = (source: string, index: number): Position => {
  const starts = createLineStarts(source);
  const bounded = clampIndex(index, source.length);
  const line = lineIndexFor(starts, bounded);
  const lineStart = starts[line] ?? 0;
  return { index: bounded, line: line + 1, column: bounded - lineStart };
};

/**
 * The lines of a source text as the editor shows them. A trailing newline
 * does not open an extra, empty line.
 */
export const sourceLines = (source: string): string[] => {
  if (source.length === 0) return [];
  const lines = source.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
};
