/**
 * Core indexing types for scheduling grids.
 *
 * @packageDocumentation
 */

import { InvalidDimensionError } from "./errors.js";

/** A schedulable resource (driver, nurse), in `[0, entities)`. */
export type Entity = number;

/** A scheduling day, in `[0, periods)`. */
export type Period = number;

/** A fixed-length slice of a period (a time block or a shift), in `[0, subPeriods)`. */
export type SubPeriod = number;

/**
 * Size of a scheduling grid.
 *
 * @example
 * ```typescript
 * // 3 drivers, one day split into eight half-hour blocks
 * const dimensions: GridDimensions = { entities: 3, periods: 1, subPeriods: 8 };
 * ```
 */
export interface GridDimensions {
  entities: number;
  periods: number;
  subPeriods: number;
}

/**
 * Address of one cell of the grid, without the state.
 */
export interface CellRef {
  entity: Entity;
  period: Period;
  subPeriod: SubPeriod;
}

export function assertPositiveInteger(dimension: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidDimensionError(dimension, value);
  }
}

/**
 * Throws {@link InvalidDimensionError} unless every count is a positive integer.
 */
export function assertDimensions(dimensions: GridDimensions): void {
  assertPositiveInteger("entities", dimensions.entities);
  assertPositiveInteger("periods", dimensions.periods);
  assertPositiveInteger("subPeriods", dimensions.subPeriods);
}

/** `[0, 1, ..., count - 1]` */
export function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}
