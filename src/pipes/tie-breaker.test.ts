import { describe, it, expect } from "vitest";
import { buildTieKeyTable, createTieBreaker, splitMix64 } from "./tie-breaker.js";
import { createGrid } from "./grid.js";

describe("splitMix64", () => {
  it("matches the reference finalizer outputs", () => {
    expect(splitMix64(0n)).toBe(0xe220a8397b1dcdafn);
    expect(splitMix64(1n)).toBe(0x910a2dec89025cc1n);
  });
});

describe("createTieBreaker", () => {
  const tieKey = createTieBreaker(0xd15ea5e5n);

  it("produces fixed 64-bit keys for a seed", () => {
    expect(tieKey({ row: 0, col: 0 })).toBe(8268743680679888752n);
    expect(tieKey({ row: 5, col: 5 })).toBe(2126528219883350074n);
    expect(tieKey({ row: 5, col: 3 })).toBe(11140437670420591274n);
    expect(tieKey({ row: -1, col: 2 })).toBe(16302365772429428929n);
  });

  it("depends on the seed", () => {
    expect(createTieBreaker(0n)({ row: 0, col: 0 })).toBe(16294208416658607535n);
  });

  it("treats seeds as unsigned 64-bit patterns", () => {
    const negative = createTieBreaker(-1n);
    const unsigned = createTieBreaker(0xffffffffffffffffn);
    expect(negative({ row: 3, col: 4 })).toBe(unsigned({ row: 3, col: 4 }));
  });

  it("builds a table indexed by dense cell index", () => {
    const grid = createGrid(6, 6);
    const table = buildTieKeyTable(grid, tieKey);
    expect(table).toHaveLength(36);
    expect(table[0]).toBe(8268743680679888752n);
    expect(table[5 * 6 + 5]).toBe(2126528219883350074n);
  });
});
