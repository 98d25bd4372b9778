import type { EnumerationStatus, SearchStatistics } from "../model/enumerate.js";
import type { DecisionGrid } from "../model/grid.js";
import { isWorking, stateAt, type Solution, type SolverResult } from "../model/response.js";
import type { Entity, SubPeriod } from "../types.js";

export interface GridRenderOptions {
  /** Noun for one entity, e.g. `"Driver"`. */
  entityLabel: string;
  /** Text of one line for a cell holding `state`, without indentation. */
  describeCell(entity: Entity, subPeriod: SubPeriod, state: string): string;
}

/**
 * Renders one grid solution: a `Solution N` header, then for every period a
 * `Day P` header followed by the state of each of an entity's sub-periods,
 * or a `does not work` line when the entity holds no work state that period.
 * Sub-periods holding no state at all are skipped.
 * Ends with a blank line.
 */
export function renderGridSolution(
  solution: Solution,
  grid: DecisionGrid,
  options: GridRenderOptions,
): string[] {
  const lines = [`Solution ${solution.index}`];

  for (const period of grid.periods) {
    lines.push(`Day ${period}`);
    for (const entity of grid.entities) {
      if (!isWorking(solution, grid, entity, period)) {
        lines.push(`  ${options.entityLabel} ${entity} does not work`);
        continue;
      }
      for (const subPeriod of grid.subPeriods) {
        const state = stateAt(solution, grid, entity, period, subPeriod);
        if (state !== undefined) {
          lines.push(`  ${options.describeCell(entity, subPeriod, state)}`);
        }
      }
    }
  }

  lines.push("");
  return lines;
}

/**
 * Renders the named variables of a solution as `  name -> 0|1`, sorted by name.
 */
export function renderVariables(solution: Solution, names: readonly string[]): string[] {
  const lines = [`Solution ${solution.index}`];
  for (const name of [...names].sort()) {
    lines.push(`  ${name} -> ${solution.value(name) ? 1 : 0}`);
  }
  lines.push("");
  return lines;
}

/**
 * The statistics block. `conflicts` is the number of unsatisfiable solver
 * calls, not a count of conflicts inside the SAT search.
 */
export function renderStatistics(statistics: SearchStatistics): string[] {
  return [
    "Statistics",
    `  - conflicts       : ${statistics.conflicts}`,
    `  - branches        : ${statistics.branches}`,
    `  - wall time       : ${(statistics.wallTimeMs / 1000).toFixed(6)} s`,
    `  - solutions found : ${statistics.solutions}`,
  ];
}

export function renderEnumerationStatus(status: EnumerationStatus): string {
  switch (status) {
    case "COMPLETE":
      return "Search complete";
    case "SOLUTION_LIMIT":
      return "Stopped at the solution limit";
    case "TIMEOUT":
      return "Stopped at the time limit; more solutions may exist";
  }
}

/**
 * The status line printed before a first-feasible solution.
 */
export function renderSolveStatus(result: SolverResult): string {
  if (result.solution) {
    return result.timedOut
      ? `Status: ${result.status} (time limit reached)`
      : `Status: ${result.status}`;
  }
  switch (result.status) {
    case "INFEASIBLE":
      return "No solution: the model is infeasible";
    case "TIMEOUT":
      return "No solution found within the time limit";
    case "ERROR":
      return `Solver error: ${result.error ?? "unknown error"}`;
    default:
      return `Status: ${result.status} (no assignment returned)`;
  }
}

/** Search statistics of a single first-feasible solve. */
export function solveStatistics(result: SolverResult): SearchStatistics {
  return {
    solutions: result.solution ? 1 : 0,
    conflicts: result.statistics?.conflicts ?? 0,
    branches: result.statistics?.branches ?? 0,
    wallTimeMs: result.statistics?.solveTimeMs ?? 0,
  };
}
