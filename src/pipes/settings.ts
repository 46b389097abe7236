/**
 * Optimizer defaults and option resolution.
 */

import type { Grid, PipeOptimizerConfig } from "./graph-types.js";
import { createGrid } from "./grid.js";

export const DEFAULT_ROWS = 20;
export const DEFAULT_COLUMNS = 30;

// Tune this to discourage new junctions.
export const DEFAULT_JUNCTION_PENALTY = 1.25;

export const DEFAULT_OPTIMIZER_SEED = 0xd15ea5e5n;

/**
 * Options for the pipe optimizer
 */
export interface PipeOptimizerOptions {
  /** Cost per endpoint pushed from degree 2 to 3 (default 1.25) */
  junctionPenalty?: number;
  /** Tie-break seed; taken as an unsigned 64-bit pattern */
  seed?: bigint;
}

export interface GridSettings {
  readonly grid: Grid;
  readonly junctionPenalty: number;
  readonly optimizerSeed: bigint;
}

export function resolveOptimizerConfig(options?: PipeOptimizerOptions): PipeOptimizerConfig {
  const junctionPenalty = options?.junctionPenalty ?? DEFAULT_JUNCTION_PENALTY;
  if (!Number.isFinite(junctionPenalty) || junctionPenalty < 0) {
    throw new Error(`Junction penalty must be a non-negative finite number; got ${junctionPenalty}`);
  }
  const seed = BigInt.asUintN(64, options?.seed ?? DEFAULT_OPTIMIZER_SEED);
  return { junctionPenalty, seed };
}

export function createGridSettings(
  overrides?: { rows?: number; columns?: number } & PipeOptimizerOptions
): GridSettings {
  const config = resolveOptimizerConfig(overrides);
  return Object.freeze({
    grid: createGrid(overrides?.rows ?? DEFAULT_ROWS, overrides?.columns ?? DEFAULT_COLUMNS),
    junctionPenalty: config.junctionPenalty,
    optimizerSeed: config.seed,
  });
}
