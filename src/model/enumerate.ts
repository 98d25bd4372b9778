import { SolverRequestSchema } from "../client.schemas.js";
import type { SolverRequest } from "../client.types.js";
import { LocalSearch } from "./local-solver.js";
import { Solution } from "./response.js";
import { DEFAULT_TIME_LIMIT_SECONDS } from "./utils.js";

/**
 * Why an enumeration stopped.
 *
 * - `COMPLETE`: the search space is exhausted; every solution was delivered
 * - `SOLUTION_LIMIT`: `solutionLimit` solutions were delivered
 * - `TIMEOUT`: the time budget elapsed first; more solutions may exist
 */
export type EnumerationStatus = "COMPLETE" | "SOLUTION_LIMIT" | "TIMEOUT";

/**
 * Counters for one enumeration run.
 *
 * `branches` counts solver calls. `conflicts` counts the calls that came back
 * unsatisfiable, so it is 1 for an exhausted search and 0 otherwise; it is
 * not MiniSat's internal conflict count.
 */
export interface SearchStatistics {
  solutions: number;
  conflicts: number;
  branches: number;
  wallTimeMs: number;
}

export interface EnumerationResult {
  status: EnumerationStatus;
  statistics: SearchStatistics;
}

/** 1-based solution indices, or a predicate over them. */
export type SolutionsOfInterest = Iterable<number> | ((index: number) => boolean);

export interface IterateOptions {
  /** Overrides `request.options.timeLimitSeconds`. Default {@link DEFAULT_TIME_LIMIT_SECONDS}. */
  timeLimitSeconds?: number;
  /** Overrides `request.options.solutionLimit`. Default: no limit. */
  solutionLimit?: number;
  /** Clock in milliseconds. Defaults to `performance.now`. */
  now?: () => number;
}

export interface EnumerateOptions extends IterateOptions {
  /** Which solutions reach the callback. Default: all of them. */
  solutionsOfInterest?: SolutionsOfInterest;
}

/**
 * Lazily enumerates the satisfying assignments of a request, in process.
 *
 * Solutions are numbered from 1 in delivery order. The time budget is checked
 * before every solver call. The generator's return value reports why the
 * search stopped; breaking out of a `for...of` loop early discards it.
 * Every call starts a fresh search.
 *
 * @example
 * ```typescript
 * for (const solution of iterateSolutions(request, { solutionLimit: 10 })) {
 *   console.log(solution.index, solution.trueVars());
 * }
 * ```
 */
export function* iterateSolutions(
  request: SolverRequest,
  options: IterateOptions = {},
): Generator<Solution, EnumerationResult, undefined> {
  const parsed = SolverRequestSchema.parse(request);
  const now = options.now ?? (() => performance.now());
  const timeLimitSeconds =
    options.timeLimitSeconds ?? parsed.options?.timeLimitSeconds ?? DEFAULT_TIME_LIMIT_SECONDS;
  const solutionLimit = options.solutionLimit ?? parsed.options?.solutionLimit;
  const limitMs = timeLimitSeconds * 1000;

  const start = now();
  const search = new LocalSearch(parsed);
  let solutions = 0;
  let status: EnumerationStatus;

  for (;;) {
    if (solutionLimit !== undefined && solutions >= solutionLimit) {
      status = "SOLUTION_LIMIT";
      break;
    }
    if (now() - start >= limitMs) {
      status = "TIMEOUT";
      break;
    }
    const values = search.next();
    if (!values) {
      status = "COMPLETE";
      break;
    }
    solutions++;
    yield new Solution(values, solutions);
  }

  return {
    status,
    statistics: {
      solutions,
      conflicts: search.conflicts,
      branches: search.branches,
      wallTimeMs: now() - start,
    },
  };
}

/**
 * Enumerates every satisfying assignment and calls `onSolution` for the ones
 * of interest.
 *
 * Enumeration does not stop when the solutions of interest have been seen;
 * it runs until the space is exhausted, the solution limit is reached, or the
 * time budget elapses, so `statistics.solutions` is the total count found.
 *
 * @example Print the first two solutions, count all of them
 * ```typescript
 * const result = enumerateSolutions(request, print, { solutionsOfInterest: [1, 2] });
 * console.log(result.status, result.statistics.solutions);
 * ```
 */
export function enumerateSolutions(
  request: SolverRequest,
  onSolution: (solution: Solution) => void,
  options: EnumerateOptions = {},
): EnumerationResult {
  const ofInterest = interestPredicate(options.solutionsOfInterest);
  const iterator = iterateSolutions(request, options);

  for (;;) {
    const step = iterator.next();
    if (step.done) return step.value;
    if (ofInterest(step.value.index)) onSolution(step.value);
  }
}

export function interestPredicate(
  solutionsOfInterest: SolutionsOfInterest | undefined,
): (index: number) => boolean {
  if (solutionsOfInterest === undefined) return () => true;
  if (typeof solutionsOfInterest === "function") return solutionsOfInterest;
  const indices = new Set(solutionsOfInterest);
  return (index) => indices.has(index);
}
