import Logic from "logic-solver";
import { SolverRequestSchema } from "../client.schemas.js";
import type {
  SolverClient,
  SolverConstraint,
  SolverLiteral,
  SolverRequest,
  SolverResponse,
  SolverTerm,
} from "../client.types.js";
import { InvalidReferenceError } from "../errors.js";
import type { LinearOp } from "./constraint-model.js";
import { runSearchProcess } from "./search-process.js";
import { DEFAULT_TIME_LIMIT_SECONDS, isNegated, literalVar } from "./utils.js";

/**
 * A solver request loaded into a fresh MiniSat instance.
 *
 * Each {@link LocalSearch.next} call returns an assignment that differs from
 * every assignment returned before it on at least one request variable.
 * A search is single-use; build a new one to start over.
 */
export class LocalSearch {
  readonly variables: readonly string[];

  #solver = new Logic.Solver();
  #exhausted = false;
  #branches = 0;
  #conflicts = 0;

  constructor(request: SolverRequest) {
    assertRequestReferences(request);
    this.variables = [...new Set(request.variables.map((v) => v.name))];
    for (const name of this.variables) {
      this.#solver.getVarNum(name);
    }
    for (const constraint of request.constraints) {
      this.#solver.require(toFormula(constraint));
    }
  }

  /** Solver calls made so far. */
  get branches(): number {
    return this.#branches;
  }

  /**
   * Solver calls that came back unsatisfiable. MiniSat's own conflict count is
   * not exposed, so this is 0 or 1: the final call of an exhausted search.
   */
  get conflicts(): number {
    return this.#conflicts;
  }

  get exhausted(): boolean {
    return this.#exhausted;
  }

  next(): Map<string, boolean> | undefined {
    if (this.#exhausted) return undefined;

    this.#branches++;
    const solution = this.#solver.solve();
    if (!solution) {
      this.#conflicts++;
      this.#exhausted = true;
      return undefined;
    }

    const values = new Map<string, boolean>();
    for (const name of this.variables) {
      values.set(name, solution.evaluate(name));
    }

    if (this.variables.length === 0) {
      this.#exhausted = true;
    } else {
      this.#solver.forbid(
        Logic.and(this.variables.map((name) => (values.get(name) ? name : Logic.not(name)))),
      );
    }
    return values;
  }
}

/**
 * Throws {@link InvalidReferenceError} when a constraint names a variable the
 * request does not declare.
 */
export function assertRequestReferences(request: SolverRequest): void {
  const declared = new Set(request.variables.map((v) => v.name));
  for (const constraint of request.constraints) {
    for (const name of constraintVars(constraint)) {
      if (!declared.has(name)) {
        throw new InvalidReferenceError(`Constraint references undeclared variable "${name}"`);
      }
    }
  }
}

function constraintVars(constraint: SolverConstraint): string[] {
  return constraint.type === "linear"
    ? constraint.terms.map((t) => t.var)
    : [literalVar(constraint.if), literalVar(constraint.then)];
}

/**
 * One MiniSat call on the request: `FEASIBLE` with 0/1 values, or
 * `INFEASIBLE`. Runs to completion; {@link LocalSolverClient} bounds it in time.
 */
export function searchFirst(request: SolverRequest): SolverResponse {
  const search = new LocalSearch(request);
  const values = search.next();
  const statistics = { conflicts: search.conflicts, branches: search.branches };
  if (!values) {
    return { status: "INFEASIBLE", statistics };
  }

  const record: Record<string, number> = {};
  for (const [name, value] of values) {
    record[name] = value ? 1 : 0;
  }
  return { status: "FEASIBLE", values: record, statistics };
}

function toFormula(constraint: SolverConstraint): Logic.Term {
  if (constraint.type === "implication") {
    return Logic.implies(toTerm(constraint.if), toTerm(constraint.then));
  }
  return linearFormula(constraint.terms, constraint.op, constraint.rhs);
}

function toTerm(literal: SolverLiteral): Logic.Term {
  const name = literalVar(literal);
  return isNegated(literal) ? Logic.not(name) : name;
}

/**
 * Encodes `Σ coeff·var op rhs` over bit vectors.
 *
 * Negative coefficients are rewritten on the negated literal
 * (`c·x = c + |c|·¬x`), so every weight handed to MiniSat is positive.
 */
export function linearFormula(terms: readonly SolverTerm[], op: LinearOp, rhs: number): Logic.Term {
  const literals: Logic.Term[] = [];
  const weights: number[] = [];
  let bound = rhs;

  for (const { var: name, coeff } of terms) {
    if (coeff === 0) continue;
    if (coeff > 0) {
      literals.push(name);
      weights.push(coeff);
    } else {
      literals.push(Logic.not(name));
      weights.push(-coeff);
      bound -= coeff;
    }
  }

  if (literals.length === 0) {
    return compareConstant(0, op, bound) ? Logic.TRUE : Logic.FALSE;
  }

  const total = Logic.weightedSum(literals, weights);
  switch (op) {
    case "<=":
      return bound < 0 ? Logic.FALSE : Logic.lessThanOrEqual(total, Logic.constantBits(bound));
    case ">=":
      return bound <= 0 ? Logic.TRUE : Logic.greaterThanOrEqual(total, Logic.constantBits(bound));
    case "==":
      return bound < 0 ? Logic.FALSE : Logic.equalBits(total, Logic.constantBits(bound));
  }
}

function compareConstant(value: number, op: LinearOp, bound: number): boolean {
  switch (op) {
    case "<=":
      return value <= bound;
    case ">=":
      return value >= bound;
    case "==":
      return value === bound;
  }
}

export interface LocalSolverClientOptions {
  /** Clock in milliseconds. Defaults to `performance.now`. */
  now?: () => number;
}

/**
 * In-process solver backend over MiniSat.
 *
 * Finds one satisfying assignment. There is no objective, so a found
 * assignment is reported as `FEASIBLE`; a failed search is a proof of
 * infeasibility. The search runs in a child process that is killed when
 * `request.options.timeLimitSeconds` (default
 * {@link DEFAULT_TIME_LIMIT_SECONDS}) elapses, which answers `TIMEOUT`.
 *
 * @example
 * ```typescript
 * const client = new LocalSolverClient();
 * const response = await client.solve(builder.compile().request);
 * ```
 *
 * @category Solver
 */
export class LocalSolverClient implements SolverClient {
  #now: () => number;

  constructor(options: LocalSolverClientOptions = {}) {
    this.#now = options.now ?? (() => performance.now());
  }

  async solve(request: SolverRequest, options?: { signal?: AbortSignal }): Promise<SolverResponse> {
    options?.signal?.throwIfAborted();

    const parsed = SolverRequestSchema.parse(request);
    assertRequestReferences(parsed);
    const timeLimitSeconds = parsed.options?.timeLimitSeconds ?? DEFAULT_TIME_LIMIT_SECONDS;

    const start = this.#now();
    const response = await runSearchProcess(parsed, timeLimitSeconds * 1000, options?.signal);
    const solveTimeMs = this.#now() - start;

    if (!response) {
      return { status: "TIMEOUT", statistics: { solveTimeMs, conflicts: 0, branches: 1 } };
    }
    return { ...response, statistics: { ...response.statistics, solveTimeMs } };
  }
}
