import type {
  SolverConstraint,
  SolverLiteral,
  SolverOptions,
  SolverRequest,
  SolverTerm,
  SolverVariable,
} from "../client.types.js";
import { DuplicateVariableError, InvalidReferenceError, ModelFrozenError } from "../errors.js";
import { formatLiteral, literalVar } from "./utils.js";

/** Comparison operators accepted by {@link ConstraintSink.addLinear}. */
export type LinearOp = "<=" | ">=" | "==";

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_:.-]*$/;

/**
 * Registration capability that constraint families write into.
 *
 * Rules only see this interface, so they do not depend on which solver
 * eventually receives the model.
 */
export interface ConstraintSink {
  boolVar(name: string): string;
  newBoolVar(name: string): string;
  hasVar(name: string): boolean;
  addLinear(terms: SolverTerm[], op: LinearOp, rhs: number): void;
  addImplication(ifLiteral: SolverLiteral, thenLiteral: SolverLiteral): void;
}

/**
 * Collects boolean variables and constraints and emits a {@link SolverRequest}.
 *
 * Models are built first and solved afterwards: once {@link toRequest} has been
 * called the model is frozen and every further registration throws
 * {@link ModelFrozenError}.
 */
export class ConstraintModel implements ConstraintSink {
  readonly options: SolverOptions | undefined;

  #variables = new Map<string, SolverVariable>();
  #constraints: SolverConstraint[] = [];
  #request: SolverRequest | undefined;

  constructor(options?: SolverOptions) {
    this.options = options;
  }

  get frozen(): boolean {
    return this.#request !== undefined;
  }

  get variableCount(): number {
    return this.#variables.size;
  }

  get constraintCount(): number {
    return this.#constraints.length;
  }

  /** Returns the variable, creating it on first use. */
  boolVar(name: string): string {
    if (this.#variables.has(name)) return name;
    return this.newBoolVar(name);
  }

  /** Creates a variable; throws if the name is taken. */
  newBoolVar(name: string): string {
    this.#assertOpen(`create variable "${name}"`);
    if (!VARIABLE_NAME.test(name)) {
      throw new InvalidReferenceError(`Invalid variable name "${name}"`);
    }
    if (this.#variables.has(name)) {
      throw new DuplicateVariableError(name);
    }
    this.#variables.set(name, { type: "bool", name });
    return name;
  }

  hasVar(name: string): boolean {
    return this.#variables.has(name);
  }

  addLinear(terms: SolverTerm[], op: LinearOp, rhs: number): void {
    this.#assertOpen("add a linear constraint");
    for (const term of terms) {
      this.#assertKnown(term.var);
      if (!Number.isInteger(term.coeff)) {
        throw new InvalidReferenceError(
          `Coefficient of "${term.var}" must be an integer, got ${term.coeff}`,
        );
      }
    }
    if (!Number.isInteger(rhs)) {
      throw new InvalidReferenceError(`Right-hand side must be an integer, got ${rhs}`);
    }
    this.#constraints.push({ type: "linear", terms, op, rhs });
  }

  addImplication(ifLiteral: SolverLiteral, thenLiteral: SolverLiteral): void {
    this.#assertOpen(`add ${formatLiteral(ifLiteral)} ⇒ ${formatLiteral(thenLiteral)}`);
    this.#assertKnown(literalVar(ifLiteral));
    this.#assertKnown(literalVar(thenLiteral));
    // oxlint-disable-next-line unicorn/no-thenable -- This is a constraint property, not a Promise
    this.#constraints.push({ type: "implication", if: ifLiteral, then: thenLiteral });
  }

  /**
   * Freezes the model and returns the request. Repeated calls return the same object.
   */
  toRequest(): SolverRequest {
    if (!this.#request) {
      this.#request = {
        variables: Array.from(this.#variables.values()),
        constraints: this.#constraints,
        options: this.options,
      };
    }
    return this.#request;
  }

  #assertOpen(operation: string): void {
    if (this.#request) throw new ModelFrozenError(operation);
  }

  #assertKnown(name: string): void {
    if (!this.#variables.has(name)) {
      throw new InvalidReferenceError(`Unknown variable "${name}"`);
    }
  }
}
