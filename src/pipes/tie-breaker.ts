/**
 * Deterministic Tie-Breaker
 *
 * Seeded 64-bit hash of a coordinate. Every equal-cost choice in the optimizer
 * is resolved by comparing these keys, never by iteration order.
 */

import type { Grid, GridCoordinate } from "./graph-types.js";
import { cellCount, coordinateAt } from "./grid.js";

const ROW_MULTIPLIER = 0x9e3779b185ebca87n;
const COL_MULTIPLIER = 0xc2b2ae3d27d4eb4fn;

const SPLITMIX_GAMMA = 0x9e3779b97f4a7c15n;
const SPLITMIX_MUL_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX_MUL_2 = 0x94d049bb133111ebn;

export type TieKey = bigint;
export type TieBreaker = (p: GridCoordinate) => TieKey;

function u64(value: bigint): bigint {
  return BigInt.asUintN(64, value);
}

/**
 * splitmix64 finalizer
 */
export function splitMix64(x: bigint): bigint {
  let z = u64(x + SPLITMIX_GAMMA);
  z = u64((z ^ (z >> 30n)) * SPLITMIX_MUL_1);
  z = u64((z ^ (z >> 27n)) * SPLITMIX_MUL_2);
  return z ^ (z >> 31n);
}

/**
 * Build the key function for a seed. Coordinates are taken as signed 64-bit
 * integers, so negative rows and columns hash by their two's complement pattern.
 */
export function createTieBreaker(seed: bigint): TieBreaker {
  const base = u64(seed);
  return (p) => {
    let value = base;
    value ^= u64(u64(BigInt(p.row)) * ROW_MULTIPLIER);
    value ^= u64(u64(BigInt(p.col)) * COL_MULTIPLIER);
    return splitMix64(value);
  };
}

/**
 * Precompute the key of every cell, indexed by dense cell index
 */
export function buildTieKeyTable(grid: Grid, tieKey: TieBreaker): TieKey[] {
  const total = cellCount(grid);
  const keys: TieKey[] = new Array<TieKey>(total);
  for (let index = 0; index < total; index++) {
    keys[index] = tieKey(coordinateAt(grid, index));
  }
  return keys;
}
