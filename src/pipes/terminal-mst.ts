/**
 * Terminal Spanning Tree
 *
 * Dense Prim's algorithm over the complete graph of terminals weighted by
 * Manhattan distance. Only used to plan the attachment order; the grid route
 * is computed separately.
 */

import type { GridCoordinate } from "./graph-types.js";
import { manhattanDistance } from "./grid.js";
import type { TieBreaker } from "./tie-breaker.js";

/** Tree edge between terminal indices; `u` was already in the tree */
export interface MstEdge {
  u: number;
  v: number;
  weight: number;
}

/**
 * Strict "a before b": weight, then XOR of endpoint keys, then in-tree index,
 * then out-of-tree index.
 */
function isBetterMstEdge(
  a: MstEdge,
  b: MstEdge,
  terminals: readonly GridCoordinate[],
  tieKey: TieBreaker
): boolean {
  if (a.weight !== b.weight) return a.weight < b.weight;

  const aTie = tieKey(terminals[a.u]) ^ tieKey(terminals[a.v]);
  const bTie = tieKey(terminals[b.u]) ^ tieKey(terminals[b.v]);
  if (aTie !== bTie) return aTie < bTie;

  if (a.u !== b.u) return a.u < b.u;
  return a.v < b.v;
}

/**
 * Build the minimum spanning tree rooted at terminal 0.
 * @returns Edges in the order Prim's algorithm added them (empty for < 2 terminals)
 */
export function buildTerminalMst(
  terminals: readonly GridCoordinate[],
  tieKey: TieBreaker
): MstEdge[] {
  if (terminals.length < 2) return [];

  const inTree = new Array<boolean>(terminals.length).fill(false);
  inTree[0] = true;
  let treeSize = 1;
  const edges: MstEdge[] = [];

  while (treeSize < terminals.length) {
    let best: MstEdge | null = null;

    for (let u = 0; u < terminals.length; u++) {
      if (!inTree[u]) continue;
      for (let v = 0; v < terminals.length; v++) {
        if (inTree[v]) continue;
        const candidate: MstEdge = {
          u,
          v,
          weight: manhattanDistance(terminals[u], terminals[v]),
        };
        if (best === null || isBetterMstEdge(candidate, best, terminals, tieKey)) {
          best = candidate;
        }
      }
    }

    if (best === null) break;

    inTree[best.v] = true;
    treeSize++;
    edges.push(best);
  }

  return edges;
}
