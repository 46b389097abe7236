/**
 * Type Definitions for the Pipe Network Problem
 *
 * Core types for representing grid coordinates, edges, optimizer settings
 * and solutions.
 */

/**
 * Cardinal direction a pipe segment leaves a cell in
 */
export type GridDirection = "up" | "down" | "left" | "right";

/**
 * Represents a cell of the grid
 */
export interface GridCoordinate {
  row: number;
  col: number;
}

/**
 * Rectangular grid bounds
 */
export interface Grid {
  readonly rows: number;
  readonly columns: number;
}

/**
 * An edge between two adjacent grid cells.
 * Canonical form stores the lexicographically smaller endpoint as `a`.
 */
export interface GridEdge {
  readonly a: GridCoordinate;
  readonly b: GridCoordinate;
}

/**
 * Optimizer tuning. The seed drives every tie-break, so a fixed seed gives
 * bit-identical output.
 */
export interface PipeOptimizerConfig {
  /** Extra cost per endpoint a new edge would turn into a junction (0 disables) */
  junctionPenalty: number;
  /** Unsigned 64-bit seed */
  seed: bigint;
}

export interface PipeMetrics {
  totalLength: number;
  junctionCount: number;
}

/**
 * Optimizer output. Collections are in canonical order (see `compareCoordinates`).
 */
export interface PipeSolution {
  readonly pipeEdges: readonly GridEdge[];
  /** Cells carrying pipe that are neither the source nor a consumer */
  readonly pipeCells: readonly GridCoordinate[];
  /** Cells with more than two incident segments */
  readonly junctions: readonly GridCoordinate[];
  /** Key is "row,col", value lists the occupied directions */
  readonly connections: Readonly<Record<string, readonly GridDirection[]>>;
  readonly metrics: PipeMetrics;
}

export type GridNodeType = "empty" | "source" | "consumer" | "pipe";
