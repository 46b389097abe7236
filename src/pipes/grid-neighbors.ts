/**
 * Grid Neighbor Functions
 *
 * 4-neighborhood of a square grid and the direction vocabulary used by the
 * connection map.
 */

import type { Grid, GridCoordinate, GridDirection } from "./graph-types.js";
import { gridContains } from "./grid.js";

/** Fixed iteration order for relaxation and for listing a cell's directions */
export const GRID_DIRECTIONS: readonly GridDirection[] = ["up", "down", "left", "right"];

export const DIRECTION_OFFSETS: Readonly<Record<GridDirection, { dr: number; dc: number }>> = {
  up: { dr: -1, dc: 0 },
  down: { dr: 1, dc: 0 },
  left: { dr: 0, dc: -1 },
  right: { dr: 0, dc: 1 },
};

export function oppositeDirection(dir: GridDirection): GridDirection {
  switch (dir) {
    case "up": return "down";
    case "down": return "up";
    case "left": return "right";
    case "right": return "left";
  }
}

/**
 * Step one cell in `dir`, or null when that leaves the grid
 */
export function movedCoordinate(
  p: GridCoordinate,
  dir: GridDirection,
  grid: Grid
): GridCoordinate | null {
  const { dr, dc } = DIRECTION_OFFSETS[dir];
  const next = { row: p.row + dr, col: p.col + dc };
  return gridContains(grid, next) ? next : null;
}

/**
 * Get the in-bounds 4-neighbors of a point, in `GRID_DIRECTIONS` order
 */
export function getNeighbors(p: GridCoordinate, grid: Grid): GridCoordinate[] {
  const neighbors: GridCoordinate[] = [];
  for (const dir of GRID_DIRECTIONS) {
    const next = movedCoordinate(p, dir, grid);
    if (next) neighbors.push(next);
  }
  return neighbors;
}

/**
 * Direction from `from` to an adjacent `to`. Row-aligned cells give left/right.
 */
export function directionBetween(from: GridCoordinate, to: GridCoordinate): GridDirection {
  if (from.row === to.row) {
    return from.col < to.col ? "right" : "left";
  }
  return from.row < to.row ? "down" : "up";
}
