import * as z from "zod";
import type { CompilationRule } from "../model-builder.js";
import { resolveEntities, resolvePeriods, ScopeShape } from "./scoping.js";

const FreePeriodSchema = z.object({
  state: z.string(),
  ...ScopeShape,
});

/**
 * Configuration for {@link createFreePeriodRule}.
 *
 * - `state` (required): the state that makes a period "free", e.g. `"free"`
 *
 * Scoping (optional): `entities`, `periods`
 */
export type FreePeriodConfig = z.input<typeof FreePeriodSchema>;

/**
 * Defines one indicator per (entity, period), true exactly when the entity
 * spends every sub-period of the period in `state`.
 *
 * The indicators carry no requirement themselves. Other rules (such as
 * `min-work` with `exemptState`) and scenario renderers read them.
 *
 * @example
 * ```ts
 * createFreePeriodRule({ state: "free" });
 * ```
 */
export function createFreePeriodRule(config: FreePeriodConfig): CompilationRule {
  const parsed = FreePeriodSchema.parse(config);
  const { state } = parsed;

  return {
    name: "free-period",
    compile(b) {
      b.states.get(state);
      for (const entity of resolveEntities(parsed, b.grid)) {
        for (const period of resolvePeriods(parsed, b.grid)) {
          b.indicators.ensure(entity, period, state);
        }
      }
    },
    validate(solution, reporter, { grid, indicators }) {
      for (const entity of resolveEntities(parsed, grid)) {
        for (const period of resolvePeriods(parsed, grid)) {
          const indicator = indicators.get(entity, period, state);
          if (indicator === undefined) continue;
          const allInState = grid.subPeriods.every((s) =>
            solution.value(grid.cell(entity, period, s, state)),
          );
          if (solution.value(indicator) !== allInState) {
            reporter.reportRuleViolation({
              rule: "free-period",
              message: `Indicator "${indicator}" is ${solution.value(indicator)} but entity ${entity} is ${allInState ? "" : "not "}"${state}" throughout period ${period}`,
              context: { entity, period },
            });
          }
        }
      }
    },
  };
}
