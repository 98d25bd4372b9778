import type { SolverClient, SolverRequest } from "../client.types.js";
import { parseSolverResponse, type SolverResult } from "./response.js";
import { DEFAULT_TIME_LIMIT_SECONDS } from "./utils.js";

export interface SolveOptions {
  /** Overrides `request.options.timeLimitSeconds`. Default {@link DEFAULT_TIME_LIMIT_SECONDS}. */
  timeLimitSeconds?: number;
  signal?: AbortSignal;
}

/**
 * Asks a backend for one satisfying assignment.
 *
 * The result distinguishes a proof of infeasibility (`INFEASIBLE`) from an
 * exhausted budget (`TIMEOUT`); neither is thrown. Check `result.solution`
 * before reading values.
 *
 * @example
 * ```typescript
 * const result = await solveFirst(new LocalSolverClient(), builder.compile().request);
 * if (result.status === "INFEASIBLE") console.log("No solution");
 * ```
 *
 * @category Solver
 */
export async function solveFirst(
  client: SolverClient,
  request: SolverRequest,
  options: SolveOptions = {},
): Promise<SolverResult> {
  const timeLimitSeconds =
    options.timeLimitSeconds ?? request.options?.timeLimitSeconds ?? DEFAULT_TIME_LIMIT_SECONDS;
  const response = await client.solve(
    { ...request, options: { ...request.options, timeLimitSeconds } },
    { signal: options.signal },
  );
  return parseSolverResponse(response);
}
