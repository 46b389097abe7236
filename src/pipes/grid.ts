/**
 * Grid Primitives
 *
 * Bounds, dense cell indexing, coordinate ordering and canonical edges.
 */

import type { Grid, GridCoordinate, GridEdge } from "./graph-types.js";

/**
 * Create grid bounds. Non-positive dimensions are a caller bug.
 */
export function createGrid(rows: number, columns: number): Grid {
  const grid = { rows, columns };
  assertValidGrid(grid);
  return grid;
}

/**
 * Throw unless both dimensions are positive integers
 */
export function assertValidGrid(grid: Grid): void {
  const { rows, columns } = grid;
  if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows <= 0 || columns <= 0) {
    throw new Error(`Grid dimensions must be positive integers; got ${rows}x${columns}`);
  }
}

export function cellCount(grid: Grid): number {
  return grid.rows * grid.columns;
}

export function gridContains(grid: Grid, p: GridCoordinate): boolean {
  return p.row >= 0 && p.row < grid.rows && p.col >= 0 && p.col < grid.columns;
}

/** Dense index `row * columns + col` */
export function cellIndex(grid: Grid, p: GridCoordinate): number {
  return p.row * grid.columns + p.col;
}

export function coordinateAt(grid: Grid, index: number): GridCoordinate {
  return { row: Math.floor(index / grid.columns), col: index % grid.columns };
}

/**
 * Convert a grid point to a string key
 */
export function pointKey(p: GridCoordinate): string {
  return `${p.row},${p.col}`;
}

export function sameCoordinate(a: GridCoordinate, b: GridCoordinate): boolean {
  return a.row === b.row && a.col === b.col;
}

/** Lexicographic (row, col) order */
export function compareCoordinates(a: GridCoordinate, b: GridCoordinate): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function manhattanDistance(a: GridCoordinate, b: GridCoordinate): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

/**
 * Create the canonical edge between two cells (smaller endpoint first)
 */
export function makeGridEdge(p: GridCoordinate, q: GridCoordinate): GridEdge {
  if (compareCoordinates(p, q) <= 0) {
    return { a: { row: p.row, col: p.col }, b: { row: q.row, col: q.col } };
  }
  return { a: { row: q.row, col: q.col }, b: { row: p.row, col: p.col } };
}

export function compareEdges(e: GridEdge, f: GridEdge): number {
  return compareCoordinates(e.a, f.a) || compareCoordinates(e.b, f.b);
}

/**
 * Throw unless `p` is an integer coordinate inside the grid.
 * @param label Name used in the error message
 */
export function assertInGrid(grid: Grid, p: GridCoordinate, label: string): void {
  if (!Number.isInteger(p.row) || !Number.isInteger(p.col)) {
    throw new Error(`${label} must have integer coordinates; got (${p.row}, ${p.col})`);
  }
  if (!gridContains(grid, p)) {
    throw new Error(
      `${label} (${p.row}, ${p.col}) is outside the ${grid.rows}x${grid.columns} grid`
    );
  }
}
