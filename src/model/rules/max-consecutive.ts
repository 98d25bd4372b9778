import * as z from "zod";
import type { SubPeriod } from "../../types.js";
import type { CompilationRule } from "../model-builder.js";
import { sumOf } from "../utils.js";
import { resolveEntities, resolvePeriods, ScopeShape } from "./scoping.js";

const MaxConsecutiveSchema = z.object({
  state: z.string(),
  max: z.number().int().min(0),
  ...ScopeShape,
});

/**
 * Configuration for {@link createMaxConsecutiveRule}.
 *
 * - `state` (required): the state whose runs are bounded, e.g. `"drive"`
 * - `max` (required): longest allowed run of consecutive sub-periods
 *
 * Scoping (optional): `entities`, `periods`
 */
export type MaxConsecutiveConfig = z.input<typeof MaxConsecutiveSchema>;

/**
 * Windows of `size` contiguous sub-periods that fit inside `[0, subPeriods)`.
 * Windows never wrap into the next period.
 */
export function slidingWindows(subPeriods: number, size: number): SubPeriod[][] {
  const windows: SubPeriod[][] = [];
  for (let start = 0; start + size <= subPeriods; start++) {
    windows.push(Array.from({ length: size }, (_, i) => start + i));
  }
  return windows;
}

/**
 * Forbids runs of more than `max` consecutive sub-periods in `state`.
 *
 * Every window of `max + 1` sub-periods may hold at most `max` of them. Two
 * runs of exactly `max` separated by a single other state remain allowed.
 *
 * @example No more than two driving blocks without a break
 * ```ts
 * createMaxConsecutiveRule({ state: "drive", max: 2 });
 * ```
 */
export function createMaxConsecutiveRule(config: MaxConsecutiveConfig): CompilationRule {
  const parsed = MaxConsecutiveSchema.parse(config);
  const { state, max } = parsed;

  return {
    name: "max-consecutive",
    compile(b) {
      b.states.get(state);
      const windows = slidingWindows(b.dimensions.subPeriods, max + 1);

      for (const entity of resolveEntities(parsed, b.grid)) {
        for (const period of resolvePeriods(parsed, b.grid)) {
          for (const window of windows) {
            const vars = window.map((s) => b.grid.cell(entity, period, s, state));
            b.addLinear(sumOf(vars), "<=", max);
          }
        }
      }
    },
    validate(solution, reporter, { grid }) {
      const windows = slidingWindows(grid.dimensions.subPeriods, max + 1);

      for (const entity of resolveEntities(parsed, grid)) {
        for (const period of resolvePeriods(parsed, grid)) {
          for (const window of windows) {
            const held = window.filter((s) =>
              solution.value(grid.cell(entity, period, s, state)),
            ).length;
            if (held > max) {
              reporter.reportRuleViolation({
                rule: "max-consecutive",
                message: `Entity ${entity} is in "${state}" for ${held} consecutive sub-periods from ${window[0]} in period ${period}; at most ${max} allowed`,
                context: { entity, period, subPeriod: window[0] },
              });
            }
          }
        }
      }
    },
  };
}
