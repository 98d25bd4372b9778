import * as z from "zod";
import type { CompilationRule } from "../model-builder.js";
import { sumOf } from "../utils.js";
import { resolvePeriods, ScopeShape } from "./scoping.js";

const CoverageSchema = z.object({
  state: z.string(),
  count: z.number().int().min(0).default(1),
  periods: ScopeShape.periods,
});

/**
 * Configuration for {@link createCoverageRule}.
 *
 * - `state` (required): the state that must be covered, e.g. `"drive"`
 * - `count` (optional): how many entities must hold it, default 1
 * - `periods` (optional): only cover these periods
 */
export type CoverageConfig = z.input<typeof CoverageSchema>;

/**
 * Requires, for every (period, sub-period), that exactly `count` entities are
 * in `state`.
 *
 * @example Exactly one driver drives each block
 * ```ts
 * createCoverageRule({ state: "drive" });
 * ```
 */
export function createCoverageRule(config: CoverageConfig): CompilationRule {
  const parsed = CoverageSchema.parse(config);
  const { state, count } = parsed;

  return {
    name: "coverage",
    compile(b) {
      b.states.get(state);
      for (const period of resolvePeriods(parsed, b.grid)) {
        for (const subPeriod of b.grid.subPeriods) {
          const vars = b.grid.entities.map((e) => b.grid.cell(e, period, subPeriod, state));
          b.addLinear(sumOf(vars), "==", count);
        }
      }
    },
    validate(solution, reporter, { grid }) {
      for (const period of resolvePeriods(parsed, grid)) {
        for (const subPeriod of grid.subPeriods) {
          const holders = grid.entities.filter((e) =>
            solution.value(grid.cell(e, period, subPeriod, state)),
          );
          if (holders.length !== count) {
            reporter.reportRuleViolation({
              rule: "coverage",
              message: `${holders.length} entities in "${state}" at period ${period}, sub-period ${subPeriod}; expected ${count}`,
              context: { period, subPeriod },
            });
          }
        }
      }
    },
  };
}
