/**
 * Pipe Network Optimizer
 *
 * Connects a source cell to a set of consumer cells with a rectilinear pipe
 * network that approximates a minimum Steiner tree while discouraging branch
 * points:
 *
 * 1. normalize consumers (drop duplicates and the source, sort by coordinate)
 * 2. spanning tree over the terminals by Manhattan distance
 * 3. breadth-first attachment order over that tree
 * 4. attach each terminal to the growing network with the junction-aware router
 * 5. derive the solution
 *
 * Each call is synchronous and recomputes from scratch; inputs are not mutated.
 */

import type { Grid, GridCoordinate, PipeSolution } from "./graph-types.js";
import { assertInGrid, assertValidGrid, cellIndex, compareCoordinates, pointKey, sameCoordinate } from "./grid.js";
import { buildTerminalMst } from "./terminal-mst.js";
import { buildConnectionOrder } from "./connection-order.js";
import { addPath, createNetwork, isNetworkNode } from "./network.js";
import { findAttachmentPath } from "./attachment-router.js";
import { EMPTY_PIPE_SOLUTION, buildPipeSolution } from "./solution.js";
import { buildTieKeyTable, createTieBreaker } from "./tie-breaker.js";
import { resolveOptimizerConfig, type PipeOptimizerOptions } from "./settings.js";

/**
 * Remove duplicates and the source, then sort by (row, col)
 */
export function normalizeConsumers(
  source: GridCoordinate,
  consumers: Iterable<GridCoordinate>
): GridCoordinate[] {
  const unique = new Map<string, GridCoordinate>();
  for (const p of consumers) {
    if (sameCoordinate(p, source)) continue;
    unique.set(pointKey(p), { row: p.row, col: p.col });
  }
  return [...unique.values()].sort(compareCoordinates);
}

/**
 * Compute the pipe network for one source and its consumers.
 *
 * @throws Error when the grid dimensions are not positive integers, the source
 *   or a consumer lies outside the grid, or the options are invalid
 * @returns `EMPTY_PIPE_SOLUTION` when no consumer remains after normalization
 */
export function optimizePipes(
  grid: Grid,
  source: GridCoordinate,
  consumers: Iterable<GridCoordinate>,
  options?: PipeOptimizerOptions
): PipeSolution {
  const config = resolveOptimizerConfig(options);
  assertValidGrid(grid);
  assertInGrid(grid, source, "Source");

  const normalized = normalizeConsumers(source, consumers);
  for (const consumer of normalized) {
    assertInGrid(grid, consumer, "Consumer");
  }
  if (normalized.length === 0) {
    return EMPTY_PIPE_SOLUTION;
  }

  const terminals = [source, ...normalized];
  const tieKeys = buildTieKeyTable(grid, createTieBreaker(config.seed));
  const tieKey = (p: GridCoordinate) => tieKeys[cellIndex(grid, p)];

  const mstEdges = buildTerminalMst(terminals, tieKey);
  const order = buildConnectionOrder(terminals, mstEdges, tieKey);

  const network = createNetwork(grid, source);
  for (const terminalIndex of order) {
    const terminal = terminals[terminalIndex];
    if (isNetworkNode(network, cellIndex(grid, terminal))) continue;

    const path = findAttachmentPath(terminal, network, {
      junctionPenalty: config.junctionPenalty,
      tieKeys,
    });
    addPath(network, path);
  }

  return buildPipeSolution(network.edges, source, normalized);
}
