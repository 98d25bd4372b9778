import {
  cover,
  defineScenario,
  exclusiveActivity,
  maxConsecutive,
  maxWorkPerPeriod,
  minWorkPerPeriod,
  type Scenario,
} from "../scenario.js";
import { DRIVER_STATES } from "../model/states.js";
import { renderEnumerationStatus, renderGridSolution, renderStatistics, type GridRenderOptions } from "./render.js";
import type { ScenarioDriver, ScenarioReport, ScenarioRunOptions } from "./types.js";

/**
 * Parameters of the driver-breaks scenario. Work counts include breaks.
 */
export interface DriverBreaksParams {
  drivers: number;
  days: number;
  /** Half-hour blocks per day. */
  blocks: number;
  minWorkBlocks: number;
  maxWorkBlocks: number;
  maxConsecutiveDriveBlocks: number;
}

export const DRIVER_BREAKS_DEFAULTS: Readonly<DriverBreaksParams> = {
  drivers: 3,
  days: 1,
  blocks: 8,
  minWorkBlocks: 4,
  maxWorkBlocks: 5,
  maxConsecutiveDriveBlocks: 2,
};

export const DRIVER_RENDER: GridRenderOptions = {
  entityLabel: "Driver",
  describeCell: (entity, block, state) => `Driver ${entity}, time-block ${block}: ${state}`,
};

/**
 * Drivers share one vehicle: exactly one drives in every block, each does
 * one thing per block, works between the minimum and maximum blocks every
 * day, and never drives longer than the limit without a break.
 */
export function driverBreaksScenario(params: Partial<DriverBreaksParams> = {}): Scenario {
  const p = { ...DRIVER_BREAKS_DEFAULTS, ...params };
  return defineScenario({
    dimensions: { entities: p.drivers, periods: p.days, subPeriods: p.blocks },
    states: DRIVER_STATES,
    rules: [
      cover("drive"),
      exclusiveActivity(),
      maxWorkPerPeriod(p.maxWorkBlocks),
      minWorkPerPeriod(p.minWorkBlocks),
      maxConsecutive("drive", p.maxConsecutiveDriveBlocks),
    ],
  });
}

/**
 * Enumerates the scenario and renders solutions 1 and 2 (by default)
 * followed by the search statistics.
 */
export function runDriverBreaks(
  params: Partial<DriverBreaksParams> = {},
  options: ScenarioRunOptions = {},
): ScenarioReport {
  const lines: string[] = [];
  const { result } = driverBreaksScenario(params).enumerate(
    (solution, builder) => lines.push(...renderGridSolution(solution, builder.grid, DRIVER_RENDER)),
    {
      solutionsOfInterest: options.solutionsOfInterest ?? [1, 2],
      timeLimitSeconds: options.timeLimitSeconds,
      solutionLimit: options.solutionLimit,
      now: options.now,
    },
  );

  lines.push("", ...renderStatistics(result.statistics), renderEnumerationStatus(result.status));
  return { status: result.status, lines };
}

export const driverBreaks: ScenarioDriver<DriverBreaksParams> = {
  name: "driver-breaks",
  description: "Drivers sharing a vehicle, with work limits and mandatory breaks",
  defaults: DRIVER_BREAKS_DEFAULTS,
  run: async (params, options) => runDriverBreaks(params, options),
};
