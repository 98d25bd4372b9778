/**
 * Solver transport types and status constants.
 *
 * Types are derived from Zod schemas to ensure validation and types stay in sync.
 *
 * @see client.schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type {
  SolverTermSchema,
  SolverLiteralSchema,
  SolverVariableSchema,
  SolverConstraintSchema,
  SolverOptionsSchema,
  SolverRequestSchema,
  SolverResponseSchema,
  SolverStatusSchema,
  SolverStatisticsSchema,
} from "./client.schemas.js";

// --------------------------------------------------------------------------
// Types derived from Zod schemas
// --------------------------------------------------------------------------

/**
 * A single linear term in a constraint.
 *
 * - `var` (required): variable name
 * - `coeff` (required): integer coefficient
 */
export type SolverTerm = z.infer<typeof SolverTermSchema>;

/**
 * A boolean literal: a variable name, or `{ not: name }` for its negation.
 */
export type SolverLiteral = z.infer<typeof SolverLiteralSchema>;

/**
 * A boolean decision variable.
 */
export type SolverVariable = z.infer<typeof SolverVariableSchema>;

/**
 * A constraint in the model.
 *
 * - `linear`: `sum(coeff * var) op rhs`
 * - `implication`: `if` literal implies `then` literal
 */
export type SolverConstraint = z.infer<typeof SolverConstraintSchema>;

/**
 * Search limits carried with a request.
 *
 * - `timeLimitSeconds` (optional): wall-clock budget for the search
 * - `solutionLimit` (optional): stop enumerating after this many solutions
 */
export type SolverOptions = z.infer<typeof SolverOptionsSchema>;

/**
 * The full request payload sent to a solver backend.
 *
 * - `variables` (required): all decision variables
 * - `constraints` (required): all constraints
 * - `options` (optional): search limits
 */
export type SolverRequest = z.infer<typeof SolverRequestSchema>;

/**
 * The response payload returned by a solver backend.
 *
 * - `status` (required): solve outcome (see {@link SolverStatus})
 * - `values` (optional): variable assignments (0/1) when a solution is found
 * - `statistics` (optional): solve time, conflicts, branches
 * - `error` (optional): error message on failure
 */
export type SolverResponse = z.infer<typeof SolverResponseSchema>;

/**
 * Solver outcome status.
 *
 * One of `"OPTIMAL"`, `"FEASIBLE"`, `"INFEASIBLE"`, `"TIMEOUT"`, or `"ERROR"`.
 *
 * @category Solver
 */
export type SolverStatus = z.infer<typeof SolverStatusSchema>;

export type SolverStatistics = z.infer<typeof SolverStatisticsSchema>;

// --------------------------------------------------------------------------
// Status constants (for convenience)
// --------------------------------------------------------------------------

/** Convenience constants for {@link SolverStatus} values. */
export const SOLVER_STATUS = {
  OPTIMAL: "OPTIMAL",
  FEASIBLE: "FEASIBLE",
  INFEASIBLE: "INFEASIBLE",
  TIMEOUT: "TIMEOUT",
  ERROR: "ERROR",
} as const;

// --------------------------------------------------------------------------
// Client interface
// --------------------------------------------------------------------------

/**
 * Interface for sending solver requests and receiving responses.
 *
 * @category Solver
 */
export interface SolverClient {
  solve(request: SolverRequest, options?: { signal?: AbortSignal }): Promise<SolverResponse>;
}
