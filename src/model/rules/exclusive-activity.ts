import * as z from "zod";
import type { CompilationRule } from "../model-builder.js";
import { sumOf } from "../utils.js";
import { resolveEntities, resolvePeriods, ScopeShape } from "./scoping.js";

const ExclusiveActivitySchema = z.object({ ...ScopeShape });

/**
 * Configuration for {@link createExclusiveActivityRule}.
 *
 * Entity and period scoping only; see {@link ScopeShape}.
 */
export type ExclusiveActivityConfig = z.input<typeof ExclusiveActivitySchema>;

/**
 * Each entity does exactly one thing in each sub-period: for every
 * (entity, period, sub-period) exactly one state variable is true.
 *
 * @example
 * ```ts
 * createExclusiveActivityRule({});
 * ```
 */
export function createExclusiveActivityRule(config: ExclusiveActivityConfig = {}): CompilationRule {
  const parsed = ExclusiveActivitySchema.parse(config);

  return {
    name: "exclusive-activity",
    compile(b) {
      for (const entity of resolveEntities(parsed, b.grid)) {
        for (const period of resolvePeriods(parsed, b.grid)) {
          for (const subPeriod of b.grid.subPeriods) {
            b.addLinear(sumOf(b.grid.cells(entity, period, subPeriod)), "==", 1);
          }
        }
      }
    },
    validate(solution, reporter, { grid }) {
      for (const entity of resolveEntities(parsed, grid)) {
        for (const period of resolvePeriods(parsed, grid)) {
          for (const subPeriod of grid.subPeriods) {
            const held = grid
              .cells(entity, period, subPeriod)
              .filter((v) => solution.value(v)).length;
            if (held !== 1) {
              reporter.reportRuleViolation({
                rule: "exclusive-activity",
                message: `Entity ${entity} holds ${held} states at period ${period}, sub-period ${subPeriod}`,
                context: { entity, period, subPeriod },
              });
            }
          }
        }
      }
    },
  };
}
