/**
 * Network State
 *
 * Call-scoped arena of grid-indexed arrays holding the pipe network while it
 * grows. Edges are stored at the smaller endpoint's index: `horizontal[i]` is
 * the edge from cell i to its right neighbor, `vertical[i]` the edge to the cell
 * below.
 */

import type { Grid, GridCoordinate, GridEdge } from "./graph-types.js";
import { cellCount, cellIndex, makeGridEdge } from "./grid.js";

export interface PipeNetwork {
  readonly grid: Grid;
  /** 1 when the cell is part of the network */
  readonly nodes: Uint8Array;
  /** Number of incident network edges per cell */
  readonly degree: Uint8Array;
  readonly horizontal: Uint8Array;
  readonly vertical: Uint8Array;
  /** Canonical edges in insertion order */
  readonly edges: GridEdge[];
}

/**
 * Create a network containing only `seed` (the source)
 */
export function createNetwork(grid: Grid, seed: GridCoordinate): PipeNetwork {
  const total = cellCount(grid);
  const network: PipeNetwork = {
    grid,
    nodes: new Uint8Array(total),
    degree: new Uint8Array(total),
    horizontal: new Uint8Array(total),
    vertical: new Uint8Array(total),
    edges: [],
  };
  network.nodes[cellIndex(grid, seed)] = 1;
  return network;
}

/**
 * Locate the slot of the edge between two adjacent cell indices
 */
function edgeSlot(network: PipeNetwork, i: number, j: number): { table: Uint8Array; index: number } {
  const low = Math.min(i, j);
  const high = Math.max(i, j);
  if (high - low === 1 && Math.floor(low / network.grid.columns) === Math.floor(high / network.grid.columns)) {
    return { table: network.horizontal, index: low };
  }
  if (high - low === network.grid.columns) {
    return { table: network.vertical, index: low };
  }
  throw new Error(`Cells ${i} and ${j} are not grid-adjacent`);
}

export function hasNetworkEdge(network: PipeNetwork, i: number, j: number): boolean {
  const { table, index } = edgeSlot(network, i, j);
  return table[index] === 1;
}

export function isNetworkNode(network: PipeNetwork, index: number): boolean {
  return network.nodes[index] === 1;
}

/**
 * Merge a path into the network. Every cell joins the node set; each step is
 * inserted as an edge once, and only a new edge raises its endpoints' degree.
 */
export function addPath(network: PipeNetwork, path: readonly GridCoordinate[]): void {
  const { grid } = network;
  for (const p of path) {
    network.nodes[cellIndex(grid, p)] = 1;
  }

  for (let k = 0; k + 1 < path.length; k++) {
    const i = cellIndex(grid, path[k]);
    const j = cellIndex(grid, path[k + 1]);
    const { table, index } = edgeSlot(network, i, j);
    if (table[index] === 1) continue;

    table[index] = 1;
    network.degree[i]++;
    network.degree[j]++;
    network.edges.push(makeGridEdge(path[k], path[k + 1]));
  }
}
