import type { Entity, Period, SubPeriod } from "../types.js";

/**
 * Where in the grid a validation result applies.
 */
export interface ValidationContext {
  entity?: Entity;
  period?: Period;
  subPeriod?: SubPeriod;
}

/**
 * A constraint that does not hold in a given assignment.
 *
 * Produced by checking a solution against the rules that built the model,
 * independently of the solver that found it.
 */
export interface RuleViolation {
  readonly id: string;
  readonly type: "rule";
  readonly rule: string;
  readonly message: string;
  readonly context: ValidationContext;
}
