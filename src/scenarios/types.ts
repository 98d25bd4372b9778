import type { SolverClient, SolverStatus } from "../client.types.js";
import type { EnumerationStatus, SolutionsOfInterest } from "../model/enumerate.js";

/**
 * Options shared by every scenario run.
 */
export interface ScenarioRunOptions {
  /** Time budget in seconds. Default 10. */
  timeLimitSeconds?: number;
  /** Enumerating scenarios stop after this many solutions. */
  solutionLimit?: number;
  /** Replaces the scenario's own selection of printed solutions. */
  solutionsOfInterest?: SolutionsOfInterest;
  /** Backend for first-feasible scenarios. Default: in process. */
  client?: SolverClient;
  /** Clock in milliseconds, for enumeration. */
  now?: () => number;
}

/**
 * What a scenario run produced: its terminal status and the console lines.
 */
export interface ScenarioReport {
  status: EnumerationStatus | SolverStatus;
  lines: string[];
}

/**
 * A named, runnable scenario with parameters `P`.
 */
export interface ScenarioDriver<P extends object = object> {
  readonly name: string;
  readonly description: string;
  readonly defaults: Readonly<P>;
  run(params?: Partial<P>, options?: ScenarioRunOptions): Promise<ScenarioReport>;
}
