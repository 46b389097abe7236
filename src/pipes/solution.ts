/**
 * Solution Builder
 *
 * Derives the connection map, junctions, pipe cells and metrics from the final
 * edge set, and checks connectivity of a finished solution.
 */

import type { GridCoordinate, GridDirection, GridEdge, PipeSolution } from "./graph-types.js";
import { compareCoordinates, compareEdges, makeGridEdge, pointKey } from "./grid.js";
import { edgeKey } from "../utils/edgeKey.js";
import { GRID_DIRECTIONS, directionBetween, oppositeDirection } from "./grid-neighbors.js";

export const EMPTY_PIPE_SOLUTION: PipeSolution = Object.freeze({
  pipeEdges: Object.freeze([]),
  pipeCells: Object.freeze([]),
  junctions: Object.freeze([]),
  connections: Object.freeze<Record<string, readonly GridDirection[]>>({}),
  metrics: Object.freeze({ totalLength: 0, junctionCount: 0 }),
});

/**
 * Map each covered cell ("row,col") to the directions its segments occupy.
 * Keys follow coordinate order; directions follow `GRID_DIRECTIONS`.
 */
export function buildConnectionMap(edges: readonly GridEdge[]): Record<string, GridDirection[]> {
  const byCell = new Map<string, { cell: GridCoordinate; dirs: Set<GridDirection> }>();
  const mark = (cell: GridCoordinate, dir: GridDirection) => {
    const key = pointKey(cell);
    const entry = byCell.get(key);
    if (entry) {
      entry.dirs.add(dir);
    } else {
      byCell.set(key, { cell, dirs: new Set([dir]) });
    }
  };

  for (const edge of edges) {
    const dir = directionBetween(edge.a, edge.b);
    mark(edge.a, dir);
    mark(edge.b, oppositeDirection(dir));
  }

  const map: Record<string, GridDirection[]> = {};
  const entries = [...byCell.values()].sort((x, y) => compareCoordinates(x.cell, y.cell));
  for (const { cell, dirs } of entries) {
    map[pointKey(cell)] = GRID_DIRECTIONS.filter((d) => dirs.has(d));
  }
  return map;
}

function parsePointKey(key: string): GridCoordinate {
  const [row, col] = key.split(",").map(Number);
  return { row, col };
}

/**
 * Assemble the immutable solution for a finished network. Edges given in
 * either orientation, or more than once, count once.
 * @param consumers Normalized consumers (source already removed)
 */
export function buildPipeSolution(
  edges: readonly GridEdge[],
  source: GridCoordinate,
  consumers: readonly GridCoordinate[]
): PipeSolution {
  const unique = new Map<string, GridEdge>();
  for (const edge of edges) {
    const canonical = makeGridEdge(edge.a, edge.b);
    unique.set(edgeKey(canonical), canonical);
  }
  const pipeEdges = [...unique.values()].sort(compareEdges);
  const connections = buildConnectionMap(pipeEdges);

  const terminalKeys = new Set<string>([pointKey(source), ...consumers.map(pointKey)]);
  const junctions: GridCoordinate[] = [];
  const pipeCells: GridCoordinate[] = [];

  for (const [key, dirs] of Object.entries(connections)) {
    const cell = parsePointKey(key);
    if (dirs.length > 2) junctions.push(cell);
    if (!terminalKeys.has(key)) pipeCells.push(cell);
  }

  return {
    pipeEdges,
    pipeCells,
    junctions,
    connections,
    metrics: { totalLength: pipeEdges.length, junctionCount: junctions.length },
  };
}

/**
 * Breadth-first reachability from `source` over the solution's edges.
 * An empty consumer set is trivially connected.
 */
export function isFullyConnected(
  solution: PipeSolution,
  source: GridCoordinate,
  consumers: Iterable<GridCoordinate>
): boolean {
  const required = [...consumers];
  if (required.length === 0) return true;

  const adjacency = new Map<string, string[]>();
  const link = (from: string, to: string) => {
    const list = adjacency.get(from);
    if (list) list.push(to);
    else adjacency.set(from, [to]);
  };
  for (const edge of solution.pipeEdges) {
    link(pointKey(edge.a), pointKey(edge.b));
    link(pointKey(edge.b), pointKey(edge.a));
  }

  const start = pointKey(source);
  const visited = new Set<string>([start]);
  const queue: string[] = [start];
  let head = 0;
  while (head < queue.length) {
    const current = queue[head++];
    for (const next of adjacency.get(current) ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }

  return required.every((p) => visited.has(pointKey(p)));
}
