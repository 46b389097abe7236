/**
 * Worker thread for running the pipe optimizer off the caller's thread
 *
 * The optimizer itself is synchronous; this worker wraps one call per message
 * and always answers with a response, never an uncaught error.
 */

import { parentPort, workerData } from "node:worker_threads";
import { optimizePipes } from "./pipe-optimizer.js";
import { createGrid } from "./grid.js";
import type { GridCoordinate, PipeSolution } from "./graph-types.js";

export const OPTIMIZER_WORKER_ROLE = "pipe-optimizer";

/**
 * Request JSON for one optimization
 */
export interface OptimizerRequest {
  /** Grid height (number of rows) */
  rows: number;
  /** Grid width (number of columns) */
  columns: number;
  source: GridCoordinate;
  /** Duplicates and the source itself are ignored */
  consumers: GridCoordinate[];
  junctionPenalty?: number;
  seed?: bigint;
}

/**
 * Response JSON from the optimizer
 */
export interface OptimizerResponse {
  /** Whether the optimization completed without errors */
  success: boolean;
  /** The solution, null if success is false */
  solution: PipeSolution | null;
  /** Error message if success is false */
  error?: string;
  /** Wall-clock time spent in the optimizer */
  elapsedMs: number;
}

export function handleOptimizerRequest(request: OptimizerRequest): OptimizerResponse {
  const started = performance.now();
  try {
    const grid = createGrid(request.rows, request.columns);
    const solution = optimizePipes(grid, request.source, request.consumers, {
      junctionPenalty: request.junctionPenalty,
      seed: request.seed,
    });
    return { success: true, solution, elapsedMs: performance.now() - started };
  } catch (error) {
    return {
      success: false,
      solution: null,
      error: error instanceof Error ? error.message : String(error),
      elapsedMs: performance.now() - started,
    };
  }
}

export function isOptimizerWorkerData(data: unknown): boolean {
  return (
    typeof data === "object" &&
    data !== null &&
    "role" in data &&
    data.role === OPTIMIZER_WORKER_ROLE
  );
}

const port = parentPort;
if (port && isOptimizerWorkerData(workerData)) {
  port.on("message", (request: OptimizerRequest) => {
    port.postMessage(handleOptimizerRequest(request));
  });
}
