/**
 * Attachment Router
 *
 * Label-setting search over every grid cell that attaches a terminal to the
 * nearest cell of the network built so far.
 *
 * Step cost:
 * - reusing a network edge: cost 0, hops 0
 * - a new edge: cost 1 + junctionPenalty * J, hops 1, where J counts the
 *   endpoints currently at degree 2 (the step would make them junctions)
 *
 * Labels are ordered by (cost within COST_EPSILON, hops, tie key). Each round
 * rescans all unvisited cells instead of using a heap, which keeps the
 * selection order identical to the total order above.
 */

import type { GridCoordinate } from "./graph-types.js";
import { cellCount, cellIndex, coordinateAt, manhattanDistance, sameCoordinate } from "./grid.js";
import { getNeighbors } from "./grid-neighbors.js";
import { hasNetworkEdge, isNetworkNode, type PipeNetwork } from "./network.js";
import type { TieKey } from "./tie-breaker.js";

export const COST_EPSILON = 1e-9;

export interface RouterOptions {
  junctionPenalty: number;
  /** Tie key per dense cell index */
  tieKeys: readonly TieKey[];
}

function junctionDelta(network: PipeNetwork, index: number): number {
  return network.degree[index] === 2 ? 1 : 0;
}

/**
 * Find the cheapest path from `start` to any network cell.
 * @returns Cells from `start` to a network cell; `[start]` when start is already in the network
 */
export function findAttachmentPath(
  start: GridCoordinate,
  network: PipeNetwork,
  options: RouterOptions
): GridCoordinate[] {
  const { grid } = network;
  const { junctionPenalty, tieKeys } = options;
  const startIndex = cellIndex(grid, start);

  if (isNetworkNode(network, startIndex)) {
    return [start];
  }

  const total = cellCount(grid);
  const cost = new Float64Array(total).fill(Infinity);
  const hops = new Array<number>(total).fill(Number.MAX_SAFE_INTEGER);
  const predecessor = new Int32Array(total).fill(-1);
  const visited = new Uint8Array(total);

  cost[startIndex] = 0;
  hops[startIndex] = 0;

  let targetIndex = -1;

  for (let round = 0; round < total; round++) {
    let current = -1;
    for (let index = 0; index < total; index++) {
      if (visited[index] || !Number.isFinite(cost[index])) continue;
      if (current === -1 || isBetterLabel(index, current, cost, hops, tieKeys)) {
        current = index;
      }
    }
    if (current === -1) break;

    visited[current] = 1;
    if (isNetworkNode(network, current) && current !== startIndex) {
      targetIndex = current;
      break;
    }

    const currentCoordinate = coordinateAt(grid, current);
    for (const neighbor of getNeighbors(currentCoordinate, grid)) {
      const next = cellIndex(grid, neighbor);
      if (visited[next]) continue;

      let stepCost = 0;
      let stepHops = 0;
      if (!hasNetworkEdge(network, current, next)) {
        const j = junctionDelta(network, current) + junctionDelta(network, next);
        stepCost = 1 + junctionPenalty * j;
        stepHops = 1;
      }

      const candidateCost = cost[current] + stepCost;
      const candidateHops = hops[current] + stepHops;

      let replace = false;
      if (candidateCost + COST_EPSILON < cost[next]) {
        replace = true;
      } else if (Math.abs(candidateCost - cost[next]) <= COST_EPSILON) {
        if (candidateHops < hops[next]) {
          replace = true;
        } else if (candidateHops === hops[next]) {
          // Compares the relaxing cell, not the neighbor, against the existing predecessor.
          const existing = predecessor[next];
          replace = existing === -1 || tieKeys[current] < tieKeys[existing];
        }
      }

      if (replace) {
        cost[next] = candidateCost;
        hops[next] = candidateHops;
        predecessor[next] = current;
      }
    }
  }

  const keyOf = (p: GridCoordinate) => tieKeys[cellIndex(grid, p)];

  if (targetIndex === -1) {
    console.warn(`Attachment search from (${start.row}, ${start.col}) reached no network cell; using fallback path`);
    return fallbackPath(start, nearestNetworkCell(start, network, tieKeys), keyOf);
  }

  const reversed: GridCoordinate[] = [];
  let cursor = targetIndex;
  while (cursor !== -1) {
    reversed.push(coordinateAt(grid, cursor));
    if (cursor === startIndex) break;
    cursor = predecessor[cursor];
  }

  const last = reversed[reversed.length - 1];
  if (!last || !sameCoordinate(last, start)) {
    console.warn(`Predecessor walk from (${start.row}, ${start.col}) did not return to start; using fallback path`);
    return fallbackPath(start, nearestNetworkCell(start, network, tieKeys), keyOf);
  }

  return reversed.reverse();
}

function isBetterLabel(
  a: number,
  b: number,
  cost: Float64Array,
  hops: readonly number[],
  tieKeys: readonly TieKey[]
): boolean {
  if (cost[a] + COST_EPSILON < cost[b]) return true;
  if (Math.abs(cost[a] - cost[b]) <= COST_EPSILON) {
    if (hops[a] !== hops[b]) return hops[a] < hops[b];
    return tieKeys[a] < tieKeys[b];
  }
  return false;
}

/**
 * Network cell closest to `start` by Manhattan distance, ties by smaller key.
 * Returns `start` itself when the network is empty.
 */
export function nearestNetworkCell(
  start: GridCoordinate,
  network: PipeNetwork,
  tieKeys: readonly TieKey[]
): GridCoordinate {
  const { grid } = network;
  let best: GridCoordinate = start;
  let bestIndex = -1;
  let bestDistance = Infinity;

  for (let index = 0; index < network.nodes.length; index++) {
    if (!isNetworkNode(network, index)) continue;
    const p = coordinateAt(grid, index);
    const distance = manhattanDistance(start, p);
    if (distance < bestDistance || (distance === bestDistance && tieKeys[index] < tieKeys[bestIndex])) {
      best = p;
      bestIndex = index;
      bestDistance = distance;
    }
  }

  return best;
}

/**
 * Axis-aligned L path from `start` to `target`. Horizontal leg first when the
 * XOR of both keys is even.
 */
export function fallbackPath(
  start: GridCoordinate,
  target: GridCoordinate,
  keyOf: (p: GridCoordinate) => TieKey
): GridCoordinate[] {
  const horizontalFirst = ((keyOf(start) ^ keyOf(target)) & 1n) === 0n;

  const path: GridCoordinate[] = [{ row: start.row, col: start.col }];
  let row = start.row;
  let col = start.col;

  const walkColumns = () => {
    while (col !== target.col) {
      col += col < target.col ? 1 : -1;
      path.push({ row, col });
    }
  };
  const walkRows = () => {
    while (row !== target.row) {
      row += row < target.row ? 1 : -1;
      path.push({ row, col });
    }
  };

  if (horizontalFirst) {
    walkColumns();
    walkRows();
  } else {
    walkRows();
    walkColumns();
  }
  return path;
}
