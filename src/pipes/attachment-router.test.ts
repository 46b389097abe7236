import { describe, it, expect } from "vitest";
import { createGrid } from "./grid.js";
import { addPath, createNetwork, hasNetworkEdge, type PipeNetwork } from "./network.js";
import { fallbackPath, findAttachmentPath, nearestNetworkCell } from "./attachment-router.js";
import { buildTieKeyTable, createTieBreaker } from "./tie-breaker.js";
import { DEFAULT_OPTIMIZER_SEED } from "./settings.js";
import type { GridCoordinate } from "./graph-types.js";

const tieKey = createTieBreaker(DEFAULT_OPTIMIZER_SEED);

function row(r: number, from: number, to: number): GridCoordinate[] {
  const cells: GridCoordinate[] = [];
  for (let col = from; col <= to; col++) cells.push({ row: r, col });
  return cells;
}

/** 5x7 grid with a straight pipe along row 2 from column 0 to 4 */
function straightNetwork(): PipeNetwork {
  const grid = createGrid(5, 7);
  const network = createNetwork(grid, { row: 2, col: 0 });
  addPath(network, row(2, 0, 4));
  return network;
}

describe("network state", () => {
  it("tracks nodes, edges and degrees", () => {
    const network = straightNetwork();
    expect(network.edges).toHaveLength(4);
    expect(Array.from(network.degree.slice(14, 19))).toEqual([1, 2, 2, 2, 1]);
    expect(hasNetworkEdge(network, 14, 15)).toBe(true);
    expect(hasNetworkEdge(network, 14, 21)).toBe(false);
  });

  it("inserts an edge only once", () => {
    const network = straightNetwork();
    addPath(network, row(2, 0, 4).reverse());
    addPath(network, row(2, 1, 3));
    expect(network.edges).toHaveLength(4);
    expect(Array.from(network.degree.slice(14, 19))).toEqual([1, 2, 2, 2, 1]);
  });

  it("rejects cells that are not adjacent, including across a row wrap", () => {
    const network = straightNetwork();
    expect(() => hasNetworkEdge(network, 14, 16)).toThrow("Cells 14 and 16 are not grid-adjacent");
    expect(() => hasNetworkEdge(network, 6, 7)).toThrow("Cells 6 and 7 are not grid-adjacent");
  });
});

describe("findAttachmentPath", () => {
  it("returns the start alone when it is already in the network", () => {
    const network = straightNetwork();
    const tieKeys = buildTieKeyTable(network.grid, tieKey);
    expect(findAttachmentPath({ row: 2, col: 2 }, network, { junctionPenalty: 1, tieKeys })).toEqual([
      { row: 2, col: 2 },
    ]);
  });

  it("takes the shortest branch when junctions are free", () => {
    const network = straightNetwork();
    const tieKeys = buildTieKeyTable(network.grid, tieKey);
    expect(findAttachmentPath({ row: 0, col: 3 }, network, { junctionPenalty: 0, tieKeys })).toEqual([
      { row: 0, col: 3 },
      { row: 1, col: 3 },
      { row: 2, col: 3 },
    ]);
  });

  it("detours to a pipe end when a junction is expensive", () => {
    const network = straightNetwork();
    const tieKeys = buildTieKeyTable(network.grid, tieKey);
    expect(findAttachmentPath({ row: 0, col: 3 }, network, { junctionPenalty: 10, tieKeys })).toEqual([
      { row: 0, col: 3 },
      { row: 0, col: 4 },
      { row: 1, col: 4 },
      { row: 2, col: 4 },
    ]);
  });

  it("reaches the lone source across the grid", () => {
    const grid = createGrid(10, 10);
    const network = createNetwork(grid, { row: 5, col: 5 });
    const tieKeys = buildTieKeyTable(grid, tieKey);
    expect(findAttachmentPath({ row: 5, col: 8 }, network, { junctionPenalty: 1.25, tieKeys })).toEqual(
      row(5, 5, 8).reverse()
    );
  });
});

describe("fallback routing", () => {
  const keyOf = tieKey;

  it("runs the horizontal leg first when the key parity is even", () => {
    expect(fallbackPath({ row: 2, col: 2 }, { row: 5, col: 6 }, keyOf)).toEqual([
      { row: 2, col: 2 },
      { row: 2, col: 3 },
      { row: 2, col: 4 },
      { row: 2, col: 5 },
      { row: 2, col: 6 },
      { row: 3, col: 6 },
      { row: 4, col: 6 },
      { row: 5, col: 6 },
    ]);
  });

  it("runs the vertical leg first when the key parity is odd", () => {
    expect(fallbackPath({ row: 0, col: 0 }, { row: 3, col: 4 }, keyOf)).toEqual([
      { row: 0, col: 0 },
      { row: 1, col: 0 },
      { row: 2, col: 0 },
      { row: 3, col: 0 },
      { row: 3, col: 1 },
      { row: 3, col: 2 },
      { row: 3, col: 3 },
      { row: 3, col: 4 },
    ]);
  });

  it("targets the closest network cell", () => {
    const network = straightNetwork();
    const tieKeys = buildTieKeyTable(network.grid, tieKey);
    expect(nearestNetworkCell({ row: 0, col: 3 }, network, tieKeys)).toEqual({ row: 2, col: 3 });
    expect(nearestNetworkCell({ row: 4, col: 6 }, network, tieKeys)).toEqual({ row: 2, col: 4 });
  });
});
