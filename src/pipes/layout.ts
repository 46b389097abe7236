/**
 * Pipe Layout
 *
 * Source, consumers and the last solution for one grid, plus the per-cell
 * lookup renderers use. Updates return new layouts.
 */

import type { Grid, GridCoordinate, GridDirection, GridNodeType, PipeSolution } from "./graph-types.js";
import { assertInGrid, assertValidGrid, pointKey, sameCoordinate } from "./grid.js";
import { EMPTY_PIPE_SOLUTION } from "./solution.js";
import { normalizeConsumers } from "./pipe-optimizer.js";

export interface PipeLayout {
  readonly grid: Grid;
  readonly source: GridCoordinate;
  readonly consumers: readonly GridCoordinate[];
  readonly solution: PipeSolution;
}

export interface GridCell {
  coordinate: GridCoordinate;
  nodeType: GridNodeType;
  connections: readonly GridDirection[];
  isJunction: boolean;
  /** Node type, or "junction" for a branching pipe cell */
  accessibilityState: GridNodeType | "junction";
}

export function createLayout(
  grid: Grid,
  source: GridCoordinate,
  consumers: Iterable<GridCoordinate> = []
): PipeLayout {
  assertValidGrid(grid);
  assertInGrid(grid, source, "Source");
  const normalized = normalizeConsumers(source, consumers);
  for (const consumer of normalized) {
    assertInGrid(grid, consumer, "Consumer");
  }
  return { grid, source, consumers: normalized, solution: EMPTY_PIPE_SOLUTION };
}

export function applySolution(layout: PipeLayout, solution: PipeSolution): PipeLayout {
  return { ...layout, solution };
}

export function clearNetwork(layout: PipeLayout): PipeLayout {
  return { ...layout, solution: EMPTY_PIPE_SOLUTION };
}

export function cellNodeType(layout: PipeLayout, p: GridCoordinate): GridNodeType {
  if (sameCoordinate(p, layout.source)) return "source";
  if (layout.consumers.some((c) => sameCoordinate(c, p))) return "consumer";
  if (layout.solution.connections[pointKey(p)] !== undefined) return "pipe";
  return "empty";
}

export function describeCell(layout: PipeLayout, p: GridCoordinate): GridCell {
  const nodeType = cellNodeType(layout, p);
  const isJunction = layout.solution.junctions.some((j) => sameCoordinate(j, p));
  return {
    coordinate: { row: p.row, col: p.col },
    nodeType,
    connections: layout.solution.connections[pointKey(p)] ?? [],
    isJunction,
    accessibilityState: nodeType === "pipe" && isJunction ? "junction" : nodeType,
  };
}
