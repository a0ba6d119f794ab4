import type { StageItem } from "./artifact.js";

const EMPTY: readonly number[] = Object.freeze([]);

const isSourceLine = (line: number | undefined): line is number =>
  line !== undefined && Number.isInteger(line) && line > 0;

/**
 * Maps source lines to the indices of the items they produced. Built once
 * per artifact and read-only afterwards. Items without a line belong to no
 * line at all.
 */
export class PositionIndex {
  readonly #byLine: ReadonlyMap<number, readonly number[]>;
  readonly #lineByItem: readonly (number | undefined)[];

  private constructor(
    byLine: ReadonlyMap<number, readonly number[]>,
    lineByItem: readonly (number | undefined)[]
  ) {
    this.#byLine = byLine;
    this.#lineByItem = lineByItem;
  }

  static build(items: readonly StageItem[]): PositionIndex {
    const byLine = new Map<number, number[]>();
    const lineByItem: (number | undefined)[] = [];

    items.forEach((item, index) => {
      const line = isSourceLine(item.line) ? item.line : undefined;
      lineByItem.push(line);
      if (line === undefined) return;

      const indices = byLine.get(line);
      if (indices) {
        indices.push(index);
      } else {
        byLine.set(line, [index]);
      }
    });

    const frozen = new Map<number, readonly number[]>();
    byLine.forEach((indices, line) => frozen.set(line, Object.freeze(indices)));
    return new PositionIndex(frozen, Object.freeze(lineByItem));
  }

  /** Ascending item indices attributed to `line`; empty when there are none */
  lookup(line: number): readonly number[] {
    return this.#byLine.get(line) ?? EMPTY;
  }

  lineOf(index: number): number | undefined {
    return this.#lineByItem[index];
  }

  lines(): number[] {
    return [...this.#byLine.keys()].sort((left, right) => left - right);
  }

  get size(): number {
    return this.#lineByItem.length;
  }
}
