import { describe, it, expect } from "vitest";
import { applySolution, cellNodeType, clearNetwork, createLayout, describeCell } from "./layout.js";
import { optimizePipes } from "./pipe-optimizer.js";
import { createGrid } from "./grid.js";
import { EMPTY_PIPE_SOLUTION } from "./solution.js";
import { createGridSettings, DEFAULT_JUNCTION_PENALTY, DEFAULT_OPTIMIZER_SEED } from "./settings.js";

describe("pipe layout", () => {
  const grid = createGrid(5, 7);
  const source = { row: 2, col: 0 };

  it("normalizes consumers and starts without a network", () => {
    const layout = createLayout(grid, source, [source, { row: 2, col: 4 }, { row: 2, col: 4 }]);
    expect(layout.consumers).toEqual([{ row: 2, col: 4 }]);
    expect(layout.solution).toBe(EMPTY_PIPE_SOLUTION);
    expect(() => createLayout(grid, source, [{ row: 5, col: 0 }])).toThrow(
      "Consumer (5, 0) is outside the 5x7 grid"
    );
    expect(() => createLayout({ rows: 0, columns: 3 }, { row: 0, col: 0 })).toThrow(
      "Grid dimensions must be positive integers; got 0x3"
    );
    expect(() => createLayout({ rows: 3, columns: 1.5 }, { row: 0, col: 0 })).toThrow(
      "Grid dimensions must be positive integers; got 3x1.5"
    );
  });

  it("describes each cell of an applied solution", () => {
    const base = createLayout(grid, source, [
      { row: 2, col: 4 },
      { row: 0, col: 3 },
    ]);
    const layout = applySolution(base, optimizePipes(grid, base.source, base.consumers, { junctionPenalty: 0 }));

    expect(describeCell(layout, { row: 2, col: 0 })).toEqual({
      coordinate: { row: 2, col: 0 },
      nodeType: "source",
      connections: ["right"],
      isJunction: false,
      accessibilityState: "source",
    });
    expect(describeCell(layout, { row: 2, col: 3 })).toEqual({
      coordinate: { row: 2, col: 3 },
      nodeType: "pipe",
      connections: ["up", "left", "right"],
      isJunction: true,
      accessibilityState: "junction",
    });
    expect(describeCell(layout, { row: 1, col: 3 })).toMatchObject({
      nodeType: "pipe",
      connections: ["up", "down"],
      accessibilityState: "pipe",
    });
    expect(describeCell(layout, { row: 0, col: 3 })).toMatchObject({
      nodeType: "consumer",
      connections: ["down"],
      accessibilityState: "consumer",
    });
    expect(describeCell(layout, { row: 4, col: 6 })).toEqual({
      coordinate: { row: 4, col: 6 },
      nodeType: "empty",
      connections: [],
      isJunction: false,
      accessibilityState: "empty",
    });

    // Base layout is unchanged by applying a solution.
    expect(cellNodeType(base, { row: 2, col: 2 })).toBe("empty");
    expect(cellNodeType(clearNetwork(layout), { row: 2, col: 2 })).toBe("empty");
  });
});

describe("grid settings", () => {
  it("provides the default grid and optimizer settings", () => {
    const settings = createGridSettings();
    expect(settings.grid).toEqual({ rows: 20, columns: 30 });
    expect(settings.junctionPenalty).toBe(DEFAULT_JUNCTION_PENALTY);
    expect(settings.optimizerSeed).toBe(DEFAULT_OPTIMIZER_SEED);
  });

  it("applies overrides and validates them", () => {
    expect(createGridSettings({ rows: 4, columns: 6, junctionPenalty: 0, seed: -1n })).toEqual({
      grid: { rows: 4, columns: 6 },
      junctionPenalty: 0,
      optimizerSeed: 0xffffffffffffffffn,
    });
    expect(() => createGridSettings({ rows: 0 })).toThrow("Grid dimensions must be positive integers; got 0x30");
    expect(() => createGridSettings({ junctionPenalty: Number.NaN })).toThrow(
      "Junction penalty must be a non-negative finite number; got NaN"
    );
  });
});
