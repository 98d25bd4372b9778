import * as z from "zod";
import type { Entity, Period } from "../../types.js";
import type { DecisionGrid } from "../grid.js";

/**
 * Fields for narrowing a rule to some entities and periods.
 *
 * When omitted, the rule applies to every entity and every period of the grid.
 * Indices outside the grid fail with `InvalidReferenceError` at compile time.
 */
export const ScopeShape = {
  /** Restrict to these entities. */
  entities: z.array(z.number().int()).nonempty().optional(),
  /** Restrict to these periods. */
  periods: z.array(z.number().int()).nonempty().optional(),
};

export interface ScopeConfig {
  entities?: Entity[];
  periods?: Period[];
}

export function resolveEntities(scope: ScopeConfig, grid: DecisionGrid): Entity[] {
  if (!scope.entities) return grid.entities;
  for (const entity of scope.entities) grid.assertEntity(entity);
  return [...new Set(scope.entities)];
}

export function resolvePeriods(scope: ScopeConfig, grid: DecisionGrid): Period[] {
  if (!scope.periods) return grid.periods;
  for (const period of scope.periods) grid.assertPeriod(period);
  return [...new Set(scope.periods)];
}
