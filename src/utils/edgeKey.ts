/**
 * String identity of a pipe edge: "row,col|row,col" with the smaller
 * endpoint first, so both directions of a step give the same key.
 */
import type { GridCoordinate, GridEdge } from "../pipes/graph-types.js";

export type EdgeKey = string;

/** Create canonical edge key between two adjacent cells */
export function makeEdgeKey(p: GridCoordinate, q: GridCoordinate): EdgeKey {
  if (p.row < q.row || (p.row === q.row && p.col < q.col)) {
    return `${p.row},${p.col}|${q.row},${q.col}`;
  }
  return `${q.row},${q.col}|${p.row},${p.col}`;
}

export function edgeKey(edge: GridEdge): EdgeKey {
  return makeEdgeKey(edge.a, edge.b);
}

/** Parse an edge key string back into a canonical edge */
export function parseEdgeKey(key: EdgeKey): GridEdge | null {
  const match = key.match(/^(-?\d+),(-?\d+)[|](-?\d+),(-?\d+)$/);
  if (!match) return null;

  const r1 = parseInt(match[1], 10);
  const c1 = parseInt(match[2], 10);
  const r2 = parseInt(match[3], 10);
  const c2 = parseInt(match[4], 10);

  if ([r1, c1, r2, c2].some(isNaN)) return null;
  if (r1 > r2 || (r1 === r2 && c1 > c2)) {
    return { a: { row: r2, col: c2 }, b: { row: r1, col: c1 } };
  }
  return { a: { row: r1, col: c1 }, b: { row: r2, col: c2 } };
}
