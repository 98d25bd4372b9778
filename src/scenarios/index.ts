import { driverBreaks } from "./driver-breaks.js";
import { driverFreeDays } from "./driver-free-days.js";
import { implicationPuzzle } from "./implications.js";
import { nurses } from "./nurses.js";
import type { ScenarioDriver } from "./types.js";

export {
  DRIVER_BREAKS_DEFAULTS,
  DRIVER_RENDER,
  driverBreaks,
  driverBreaksScenario,
  runDriverBreaks,
  type DriverBreaksParams,
} from "./driver-breaks.js";
export {
  DRIVER_FREE_DAYS_DEFAULTS,
  driverFreeDays,
  driverFreeDaysScenario,
  runDriverFreeDays,
  type DriverFreeDaysParams,
} from "./driver-free-days.js";
export {
  IMPLICATIONS_DEFAULTS,
  implicationPuzzle,
  implicationsModel,
  runImplications,
  type ImplicationsParams,
} from "./implications.js";
export { NURSE_RENDER, NURSES_DEFAULTS, nurses, nursesScenario, runNurses, type NursesParams } from "./nurses.js";
export * from "./render.js";
export type { ScenarioDriver, ScenarioReport, ScenarioRunOptions } from "./types.js";

/** Every built-in scenario, by name. */
export const scenarios: Readonly<Record<string, ScenarioDriver>> = {
  [driverBreaks.name]: driverBreaks,
  [driverFreeDays.name]: driverFreeDays,
  [nurses.name]: nurses,
  [implicationPuzzle.name]: implicationPuzzle,
};
