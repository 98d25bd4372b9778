import {
  cover,
  defineScenario,
  exclusiveActivity,
  freePeriods,
  maxConsecutive,
  maxWorkPerPeriod,
  minWorkPerPeriod,
  type Scenario,
} from "../scenario.js";
import type { SolverClient } from "../client.types.js";
import { LocalSolverClient } from "../model/local-solver.js";
import { DRIVER_STATES } from "../model/states.js";
import { DRIVER_RENDER } from "./driver-breaks.js";
import {
  renderGridSolution,
  renderSolveStatus,
  renderStatistics,
  solveStatistics,
} from "./render.js";
import type { ScenarioDriver, ScenarioReport, ScenarioRunOptions } from "./types.js";

export interface DriverFreeDaysParams {
  drivers: number;
  days: number;
  blocks: number;
  minWorkBlocks: number;
  maxWorkBlocks: number;
  maxConsecutiveDriveBlocks: number;
}

export const DRIVER_FREE_DAYS_DEFAULTS: Readonly<DriverFreeDaysParams> = {
  drivers: 6,
  days: 2,
  blocks: 6,
  minWorkBlocks: 4,
  maxWorkBlocks: 5,
  maxConsecutiveDriveBlocks: 2,
};

/**
 * The driver-breaks policy over several days, where a driver may take a
 * whole day off: the minimum workload only applies on days the driver is
 * not free throughout.
 */
export function driverFreeDaysScenario(params: Partial<DriverFreeDaysParams> = {}): Scenario {
  const p = { ...DRIVER_FREE_DAYS_DEFAULTS, ...params };
  return defineScenario({
    dimensions: { entities: p.drivers, periods: p.days, subPeriods: p.blocks },
    states: DRIVER_STATES,
    rules: [
      cover("drive"),
      exclusiveActivity(),
      freePeriods("free"),
      maxWorkPerPeriod(p.maxWorkBlocks),
      minWorkPerPeriod(p.minWorkBlocks, { exemptState: "free" }),
      maxConsecutive("drive", p.maxConsecutiveDriveBlocks),
    ],
  });
}

/**
 * Solves for the first feasible schedule and renders it with its status.
 */
export async function runDriverFreeDays(
  params: Partial<DriverFreeDaysParams> = {},
  options: ScenarioRunOptions = {},
): Promise<ScenarioReport> {
  const client: SolverClient = options.client ?? new LocalSolverClient();
  const { builder, result } = await driverFreeDaysScenario(params).solve(client, {
    timeLimitSeconds: options.timeLimitSeconds,
  });

  const lines = [renderSolveStatus(result)];
  if (result.solution) {
    lines.push(...renderGridSolution(result.solution, builder.grid, DRIVER_RENDER));
  }
  lines.push("", ...renderStatistics(solveStatistics(result)));
  return { status: result.status, lines };
}

export const driverFreeDays: ScenarioDriver<DriverFreeDaysParams> = {
  name: "driver-free-days",
  description: "Drivers over several days with optional days off (first feasible)",
  defaults: DRIVER_FREE_DAYS_DEFAULTS,
  run: runDriverFreeDays,
};
