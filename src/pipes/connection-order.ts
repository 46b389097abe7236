/**
 * Connection Order Planner
 *
 * Breadth-first walk of the terminal tree from the source. Every terminal
 * appears after its tree parent, so the network it attaches to is never empty.
 */

import type { GridCoordinate } from "./graph-types.js";
import type { MstEdge } from "./terminal-mst.js";
import type { TieBreaker } from "./tie-breaker.js";

interface TreeNeighbor {
  neighbor: number;
  weight: number;
}

/**
 * @returns Terminal indices in attachment order, source (index 0) excluded
 */
export function buildConnectionOrder(
  terminals: readonly GridCoordinate[],
  mstEdges: readonly MstEdge[],
  tieKey: TieBreaker
): number[] {
  const adjacency = new Map<number, TreeNeighbor[]>();
  const link = (from: number, to: number, weight: number) => {
    const list = adjacency.get(from);
    if (list) {
      list.push({ neighbor: to, weight });
    } else {
      adjacency.set(from, [{ neighbor: to, weight }]);
    }
  };
  for (const edge of mstEdges) {
    link(edge.u, edge.v, edge.weight);
    link(edge.v, edge.u, edge.weight);
  }

  const order: number[] = [];
  const visited = new Set<number>([0]);
  const queue: number[] = [0];
  let head = 0;

  while (head < queue.length) {
    const node = queue[head++];

    const neighbors = [...(adjacency.get(node) ?? [])].sort((x, y) => {
      if (x.weight !== y.weight) return x.weight - y.weight;
      const xKey = tieKey(terminals[x.neighbor]);
      const yKey = tieKey(terminals[y.neighbor]);
      return xKey < yKey ? -1 : xKey > yKey ? 1 : 0;
    });

    for (const { neighbor } of neighbors) {
      if (visited.has(neighbor)) continue;
      visited.add(neighbor);
      queue.push(neighbor);
      order.push(neighbor);
    }
  }

  return order;
}
