import * as z from "zod";
import type { SolverTerm } from "../../client.types.js";
import type { CompilationRule } from "../model-builder.js";
import { sumOf } from "../utils.js";
import { resolveEntities, resolvePeriods, ScopeShape } from "./scoping.js";

const MinWorkSchema = z.object({
  min: z.number().int().min(0),
  exemptState: z.string().optional(),
  ...ScopeShape,
});

/**
 * Configuration for {@link createMinWorkRule}.
 *
 * - `min` (required): minimum work sub-periods on a working period
 * - `exemptState` (optional): a period spent entirely in this state is exempt
 *
 * Scoping (optional): `entities`, `periods`
 */
export type MinWorkConfig = z.input<typeof MinWorkSchema>;

/**
 * Requires at least `min` work sub-periods per entity per period.
 *
 * With `exemptState`, the bound only holds on periods the entity does not
 * spend entirely in that state. The rule defines the matching indicator
 * (see `defineIndicator`) and emits `count ≥ min × (1 − indicator)`, written
 * linearly as `count + min·indicator ≥ min`.
 *
 * @example Four blocks minimum, unless the driver has the day off
 * ```ts
 * createMinWorkRule({ min: 4, exemptState: "free" });
 * ```
 */
export function createMinWorkRule(config: MinWorkConfig): CompilationRule {
  const parsed = MinWorkSchema.parse(config);
  const { min, exemptState } = parsed;

  return {
    name: "min-work",
    compile(b) {
      if (exemptState !== undefined) b.states.get(exemptState);
      if (min === 0) return;

      for (const entity of resolveEntities(parsed, b.grid)) {
        for (const period of resolvePeriods(parsed, b.grid)) {
          const terms: SolverTerm[] = sumOf(b.grid.workCells(entity, period));
          if (exemptState !== undefined) {
            terms.push({ var: b.indicators.ensure(entity, period, exemptState), coeff: min });
          }
          b.addLinear(terms, ">=", min);
        }
      }
    },
    validate(solution, reporter, { grid, indicators }) {
      for (const entity of resolveEntities(parsed, grid)) {
        for (const period of resolvePeriods(parsed, grid)) {
          if (exemptState !== undefined) {
            const indicator = indicators.get(entity, period, exemptState);
            if (indicator !== undefined && solution.value(indicator)) continue;
          }
          const worked = grid.workCells(entity, period).filter((v) => solution.value(v)).length;
          if (worked < min) {
            reporter.reportRuleViolation({
              rule: "min-work",
              message: `Entity ${entity} works ${worked} sub-periods in period ${period}; at least ${min} required`,
              context: { entity, period },
            });
          }
        }
      }
    },
  };
}
