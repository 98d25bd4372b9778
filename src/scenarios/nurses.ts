import { defineScenario, maxWorkPerPeriod, type Scenario } from "../scenario.js";
import { NURSE_STATES } from "../model/states.js";
import { range } from "../types.js";
import {
  renderEnumerationStatus,
  renderGridSolution,
  renderStatistics,
  type GridRenderOptions,
} from "./render.js";
import type { ScenarioDriver, ScenarioReport, ScenarioRunOptions } from "./types.js";

export interface NursesParams {
  nurses: number;
  days: number;
  shifts: number;
  maxShiftsPerDay: number;
}

export const NURSES_DEFAULTS: Readonly<NursesParams> = {
  nurses: 4,
  days: 3,
  shifts: 3,
  maxShiftsPerDay: 1,
};

export const NURSE_RENDER: GridRenderOptions = {
  entityLabel: "Nurse",
  describeCell: (entity, shift) => `Nurse ${entity} works shift ${shift}`,
};

/** Nurses work at most `maxShiftsPerDay` shifts a day; nothing else is required. */
export function nursesScenario(params: Partial<NursesParams> = {}): Scenario {
  const p = { ...NURSES_DEFAULTS, ...params };
  return defineScenario({
    dimensions: { entities: p.nurses, periods: p.days, subPeriods: p.shifts },
    states: NURSE_STATES,
    rules: [maxWorkPerPeriod(p.maxShiftsPerDay)],
  });
}

/**
 * Enumerates nurse assignments and renders solutions 1 to 5 (by default).
 */
export function runNurses(
  params: Partial<NursesParams> = {},
  options: ScenarioRunOptions = {},
): ScenarioReport {
  const lines: string[] = [];
  const { result } = nursesScenario(params).enumerate(
    (solution, builder) => lines.push(...renderGridSolution(solution, builder.grid, NURSE_RENDER)),
    {
      solutionsOfInterest: options.solutionsOfInterest ?? range(5).map((i) => i + 1),
      timeLimitSeconds: options.timeLimitSeconds,
      solutionLimit: options.solutionLimit,
      now: options.now,
    },
  );

  lines.push("", ...renderStatistics(result.statistics), renderEnumerationStatus(result.status));
  return { status: result.status, lines };
}

export const nurses: ScenarioDriver<NursesParams> = {
  name: "nurses",
  description: "Nurse shift assignment with a per-day shift limit",
  defaults: NURSES_DEFAULTS,
  run: async (params, options) => runNurses(params, options),
};
