import { describe, expect, it } from "vitest";
import { PositionIndex } from "../position-index.js";

const items = [
  { text: "Module" },
  { text: "Assign", line: 1 },
  { text: "Name a", line: 1 },
  { text: "Assign", line: 3 },
  { text: "synthetic", line: 0 },
  { text: "Constant 1", line: 1 },
];

describe("PositionIndex", () => {
  it("maps lines to ascending item indices", () => {
    const index = PositionIndex.build(items);
    expect(index.lookup(1)).toEqual([1, 2, 5]);
    expect(index.lookup(3)).toEqual([3]);
  });

  it("returns an empty list for lines without items", () => {
    const index = PositionIndex.build(items);
    expect(index.lookup(2)).toEqual([]);
    expect(index.lookup(99)).toEqual([]);
  });

  it("leaves unattributed items out of every line", () => {
    const index = PositionIndex.build(items);
    expect(index.lineOf(0)).toBeUndefined();
    expect(index.lineOf(4)).toBeUndefined();
    expect(index.lines()).toEqual([1, 3]);
    expect(index.lines().flatMap((line) => index.lookup(line))).toHaveLength(4);
  });

  it("reports the line of an item", () => {
    const index = PositionIndex.build(items);
    expect(index.lineOf(3)).toBe(3);
    expect(index.lineOf(42)).toBeUndefined();
    expect(index.size).toBe(6);
  });

  it("hands out lists that cannot be modified", () => {
    const index = PositionIndex.build(items);
    expect(Object.isFrozen(index.lookup(1))).toBe(true);
  });
});
