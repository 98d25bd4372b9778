import type { SolverLiteral, SolverResponse } from "../client.types.js";
import { InvalidReferenceError } from "../errors.js";
import type { Entity, Period, SubPeriod } from "../types.js";
import type { DecisionGrid } from "./grid.js";
import { isNegated, literalVar } from "./utils.js";

/**
 * Read-only view of one satisfying assignment.
 *
 * `index` is the 1-based position of the assignment in enumeration order
 * (always 1 for a first-feasible solve).
 *
 * @category Solver
 */
export class Solution {
  readonly index: number;

  #values: ReadonlyMap<string, boolean>;

  constructor(values: Iterable<readonly [string, boolean]>, index = 1) {
    this.#values = new Map(values);
    this.index = index;
  }

  /** Builds a solution from a response's 0/1 value record. */
  static fromValues(values: Readonly<Record<string, number>>, index = 1): Solution {
    return new Solution(
      Object.entries(values).map(([name, value]) => [name, value !== 0] as const),
      index,
    );
  }

  get size(): number {
    return this.#values.size;
  }

  has(name: string): boolean {
    return this.#values.has(name);
  }

  /**
   * @throws {InvalidReferenceError} when the variable is not part of the assignment
   */
  value(name: string): boolean {
    const value = this.#values.get(name);
    if (value === undefined) {
      throw new InvalidReferenceError(`Unknown variable "${name}"`);
    }
    return value;
  }

  literal(literal: SolverLiteral): boolean {
    const value = this.value(literalVar(literal));
    return isNegated(literal) ? !value : value;
  }

  /** Names of the variables set to true, in model order. */
  trueVars(): string[] {
    return [...this.#values].filter(([, value]) => value).map(([name]) => name);
  }

  toValues(): Record<string, number> {
    const values: Record<string, number> = {};
    for (const [name, value] of this.#values) {
      values[name] = value ? 1 : 0;
    }
    return values;
  }
}

/**
 * Parsed solver result.
 *
 * @category Solver
 */
export interface SolverResult {
  /** The solver outcome: OPTIMAL, FEASIBLE, INFEASIBLE, TIMEOUT, or ERROR. */
  status: SolverResponse["status"];
  /** The assignment, when the solver found one. */
  solution?: Solution;
  /** True when the time budget ran out, with or without a solution. */
  timedOut: boolean;
  /** Solver performance statistics (branches, conflicts, solve time). */
  statistics?: SolverResponse["statistics"];
  /** Error message if the solver returned an error status. */
  error?: string;
}

/**
 * Turns a raw response into a {@link SolverResult}.
 *
 * A `TIMEOUT` response that still carries values is a feasible solution found
 * before the budget ran out: it is reported as `FEASIBLE` with `timedOut`.
 * `INFEASIBLE` means proven unsatisfiable; `TIMEOUT` without values means
 * unknown. The two are never merged.
 *
 * @category Solver
 *
 * @example
 * ```typescript
 * const result = parseSolverResponse(await client.solve(request));
 * if (result.solution) {
 *   console.log(result.solution.trueVars());
 * }
 * ```
 */
export function parseSolverResponse(response: SolverResponse): SolverResult {
  const timedOut = response.status === "TIMEOUT";

  if (response.status === "INFEASIBLE" || response.status === "ERROR" || !response.values) {
    return {
      status: response.status,
      timedOut,
      statistics: response.statistics,
      error: response.error,
    };
  }

  return {
    status: timedOut ? "FEASIBLE" : response.status,
    solution: Solution.fromValues(response.values),
    timedOut,
    statistics: response.statistics,
  };
}

/**
 * The state held at (entity, period, subPeriod), or `undefined` when no state
 * variable of the cell is true.
 */
export function stateAt(
  solution: Solution,
  grid: DecisionGrid,
  entity: Entity,
  period: Period,
  subPeriod: SubPeriod,
): string | undefined {
  return grid.states.names.find((state) =>
    solution.value(grid.cell(entity, period, subPeriod, state)),
  );
}

/** True when any work-state cell of (entity, period) is set. */
export function isWorking(
  solution: Solution,
  grid: DecisionGrid,
  entity: Entity,
  period: Period,
): boolean {
  return grid.workCells(entity, period).some((v) => solution.value(v));
}

/**
 * A cell whose state variable is true.
 *
 * @category Solver
 */
export interface Assignment {
  entity: Entity;
  period: Period;
  subPeriod: SubPeriod;
  state: string;
}

/**
 * Every true grid variable as an {@link Assignment}, ordered by entity,
 * period, sub-period, then vocabulary order.
 */
export function decodeGrid(solution: Solution, grid: DecisionGrid): Assignment[] {
  const assignments: Assignment[] = [];
  for (const entity of grid.entities) {
    for (const period of grid.periods) {
      for (const subPeriod of grid.subPeriods) {
        for (const state of grid.states.names) {
          if (solution.value(grid.cell(entity, period, subPeriod, state))) {
            assignments.push({ entity, period, subPeriod, state });
          }
        }
      }
    }
  }
  return assignments;
}
