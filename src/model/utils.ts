import type { SolverLiteral, SolverTerm } from "../client.types.js";

/** Default wall-clock budget for a search, in seconds. */
export const DEFAULT_TIME_LIMIT_SECONDS = 10;

/**
 * Negated literal for use in implications.
 *
 * @example
 * ```ts
 * model.addImplication(not("a"), not("c")); // ¬a ⇒ ¬c
 * ```
 */
export function not(name: string): SolverLiteral {
  return { not: name };
}

export function literalVar(literal: SolverLiteral): string {
  return typeof literal === "string" ? literal : literal.not;
}

export function isNegated(literal: SolverLiteral): boolean {
  return typeof literal !== "string";
}

export function formatLiteral(literal: SolverLiteral): string {
  return typeof literal === "string" ? literal : `¬${literal.not}`;
}

/** Unit-coefficient terms over a list of variables. */
export function sumOf(vars: readonly string[]): SolverTerm[] {
  return vars.map((v) => ({ var: v, coeff: 1 }));
}
