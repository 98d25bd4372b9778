import * as z from "zod";
import type { CompilationRule } from "../model-builder.js";
import { sumOf } from "../utils.js";
import { resolveEntities, resolvePeriods, ScopeShape } from "./scoping.js";

const MaxWorkSchema = z.object({
  max: z.number().int().min(0),
  ...ScopeShape,
});

/**
 * Configuration for {@link createMaxWorkRule}.
 *
 * - `max` (required): maximum work sub-periods per entity per period
 *
 * Scoping (optional): `entities`, `periods`
 */
export type MaxWorkConfig = z.input<typeof MaxWorkSchema>;

/**
 * Limits how many sub-periods of a period an entity spends in work states
 * (states with `isWork`). Applies on every period, whether or not it has a
 * coverage requirement.
 *
 * @example At most five half-hour blocks per day, breaks included
 * ```ts
 * createMaxWorkRule({ max: 5 });
 * ```
 *
 * @example At most one shift per nurse per day
 * ```ts
 * createMaxWorkRule({ max: 1 });
 * ```
 */
export function createMaxWorkRule(config: MaxWorkConfig): CompilationRule {
  const parsed = MaxWorkSchema.parse(config);
  const { max } = parsed;

  return {
    name: "max-work",
    compile(b) {
      if (b.states.workStates.length === 0) return;
      for (const entity of resolveEntities(parsed, b.grid)) {
        for (const period of resolvePeriods(parsed, b.grid)) {
          b.addLinear(sumOf(b.grid.workCells(entity, period)), "<=", max);
        }
      }
    },
    validate(solution, reporter, { grid }) {
      for (const entity of resolveEntities(parsed, grid)) {
        for (const period of resolvePeriods(parsed, grid)) {
          const worked = grid.workCells(entity, period).filter((v) => solution.value(v)).length;
          if (worked > max) {
            reporter.reportRuleViolation({
              rule: "max-work",
              message: `Entity ${entity} works ${worked} sub-periods in period ${period}; at most ${max} allowed`,
              context: { entity, period },
            });
          }
        }
      }
    },
  };
}
