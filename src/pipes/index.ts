/**
 * Pipes Module
 *
 * Exports the pipe network optimizer, its grid primitives and the helpers
 * surrounding code uses to render and verify solutions.
 */

// Types
export type {
  Grid,
  GridCoordinate,
  GridDirection,
  GridEdge,
  GridNodeType,
  PipeMetrics,
  PipeOptimizerConfig,
  PipeSolution,
} from "./graph-types.js";

// Grid primitives
export {
  assertInGrid,
  assertValidGrid,
  cellCount,
  cellIndex,
  compareCoordinates,
  coordinateAt,
  createGrid,
  gridContains,
  makeGridEdge,
  manhattanDistance,
  pointKey,
} from "./grid.js";
export { GRID_DIRECTIONS, getNeighbors, movedCoordinate, oppositeDirection } from "./grid-neighbors.js";
export { edgeKey, makeEdgeKey, parseEdgeKey, type EdgeKey } from "../utils/edgeKey.js";

// Tie-breaking
export { createTieBreaker, splitMix64, type TieBreaker, type TieKey } from "./tie-breaker.js";

// Optimizer
export { normalizeConsumers, optimizePipes } from "./pipe-optimizer.js";
export {
  createGridSettings,
  DEFAULT_JUNCTION_PENALTY,
  DEFAULT_OPTIMIZER_SEED,
  resolveOptimizerConfig,
  type GridSettings,
  type PipeOptimizerOptions,
} from "./settings.js";
export { EMPTY_PIPE_SOLUTION, buildConnectionMap, isFullyConnected } from "./solution.js";

// Per-cell lookup
export {
  applySolution,
  cellNodeType,
  clearNetwork,
  createLayout,
  describeCell,
  type GridCell,
  type PipeLayout,
} from "./layout.js";

// Background execution
export { runOptimizerInWorker, type WorkerRunOptions } from "./run-in-worker.js";
export { handleOptimizerRequest } from "./optimizer.worker.js";
export type { OptimizerRequest, OptimizerResponse } from "./optimizer.worker.js";
