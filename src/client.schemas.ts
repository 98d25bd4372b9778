/**
 * Zod schemas for solver transport types.
 *
 * These schemas define the contract between model builders and solver backends,
 * in process or behind another `SolverClient` implementation.
 * TypeScript types are derived from these schemas using z.infer to ensure they stay in sync.
 *
 * @see client.types.ts for the derived TypeScript types
 */

import { z } from "zod";

// --------------------------------------------------------------------------
// Variable schemas
// --------------------------------------------------------------------------

export const SolverTermSchema = z.object({
  var: z.string(),
  coeff: z.number().int(),
});

/** A variable name, or its negation. */
export const SolverLiteralSchema = z.union([z.string(), z.object({ not: z.string() })]);

export const BoolVariableSchema = z.object({
  type: z.literal("bool"),
  name: z.string().min(1),
});

export const SolverVariableSchema = BoolVariableSchema;

// --------------------------------------------------------------------------
// Constraint schemas
// --------------------------------------------------------------------------

export const LinearConstraintSchema = z.object({
  type: z.literal("linear"),
  terms: z.array(SolverTermSchema),
  op: z.union([z.literal("<="), z.literal(">="), z.literal("==")]),
  rhs: z.number().int(),
});

export const ImplicationConstraintSchema = z.object({
  type: z.literal("implication"),
  if: SolverLiteralSchema,
  // oxlint-disable-next-line unicorn/no-thenable -- This is a schema property, not a Promise
  then: SolverLiteralSchema,
});

export const SolverConstraintSchema = z.union([
  LinearConstraintSchema,
  ImplicationConstraintSchema,
]);

// --------------------------------------------------------------------------
// Options schema
// --------------------------------------------------------------------------

export const SolverOptionsSchema = z.object({
  timeLimitSeconds: z.number().positive().optional(),
  solutionLimit: z.number().int().positive().optional(),
});

// --------------------------------------------------------------------------
// Request/Response schemas
// --------------------------------------------------------------------------

export const SolverRequestSchema = z.object({
  variables: z.array(SolverVariableSchema),
  constraints: z.array(SolverConstraintSchema),
  options: SolverOptionsSchema.optional(),
});

export const SolverStatusSchema = z.enum(["OPTIMAL", "FEASIBLE", "INFEASIBLE", "TIMEOUT", "ERROR"]);

export const SolverStatisticsSchema = z.object({
  solveTimeMs: z.number().optional(),
  conflicts: z.number().optional(),
  branches: z.number().optional(),
});

export const SolverResponseSchema = z.object({
  status: SolverStatusSchema,
  values: z.record(z.string(), z.number()).optional(),
  statistics: SolverStatisticsSchema.optional(),
  error: z.string().optional(),
});
