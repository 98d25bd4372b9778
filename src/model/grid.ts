import { InvalidReferenceError } from "../errors.js";
import type { Entity, GridDimensions, Period, SubPeriod } from "../types.js";
import { assertDimensions, range } from "../types.js";
import type { ConstraintSink } from "./constraint-model.js";
import type { StateVocabulary } from "./states.js";

export interface DecisionGridOptions {
  /** Variable name prefix. Defaults to `"cell"`. */
  prefix?: string;
}

/**
 * Dense grid of boolean decision variables, one per
 * (entity, period, sub-period, state): "entity is in state during this
 * sub-period of this period".
 *
 * Variables are created once, in {@link DecisionGrid.create}, and addressed in O(1)
 * by index arithmetic.
 */
export class DecisionGrid {
  readonly dimensions: Readonly<GridDimensions>;
  readonly states: StateVocabulary;
  readonly prefix: string;

  #vars: string[];

  private constructor(
    dimensions: GridDimensions,
    states: StateVocabulary,
    prefix: string,
    vars: string[],
  ) {
    this.dimensions = { ...dimensions };
    this.states = states;
    this.prefix = prefix;
    this.#vars = vars;
  }

  /**
   * Allocates every variable of the grid in `sink`.
   *
   * @throws {InvalidDimensionError} when any count is not a positive integer
   * @throws {DuplicateVariableError} when a variable with the same name exists
   */
  static create(
    sink: ConstraintSink,
    dimensions: GridDimensions,
    states: StateVocabulary,
    options: DecisionGridOptions = {},
  ): DecisionGrid {
    assertDimensions(dimensions);
    const prefix = options.prefix ?? "cell";
    const vars: string[] = [];

    for (let e = 0; e < dimensions.entities; e++) {
      for (let p = 0; p < dimensions.periods; p++) {
        for (let s = 0; s < dimensions.subPeriods; s++) {
          for (const state of states.states) {
            vars.push(sink.newBoolVar(`${prefix}:${e}:${p}:${s}:${state.name}`));
          }
        }
      }
    }

    return new DecisionGrid(dimensions, states, prefix, vars);
  }

  get size(): number {
    return this.#vars.length;
  }

  get entities(): number[] {
    return range(this.dimensions.entities);
  }

  get periods(): number[] {
    return range(this.dimensions.periods);
  }

  get subPeriods(): number[] {
    return range(this.dimensions.subPeriods);
  }

  /** Variable for (entity, period, subPeriod, state). */
  cell(entity: Entity, period: Period, subPeriod: SubPeriod, state: string): string {
    this.assertCell(entity, period, subPeriod);
    const stateIndex = this.states.indexOf(state);
    const { periods, subPeriods } = this.dimensions;
    const stateCount = this.states.states.length;
    const offset = ((entity * periods + period) * subPeriods + subPeriod) * stateCount + stateIndex;
    const name = this.#vars[offset];
    if (name === undefined) {
      throw new InvalidReferenceError(`No variable at offset ${offset}`);
    }
    return name;
  }

  /** The variables of every state of one cell, in vocabulary order. */
  cells(entity: Entity, period: Period, subPeriod: SubPeriod): string[] {
    return this.states.names.map((state) => this.cell(entity, period, subPeriod, state));
  }

  /** Every work-state variable of (entity, period), sub-period major. */
  workCells(entity: Entity, period: Period): string[] {
    const vars: string[] = [];
    for (const s of this.subPeriods) {
      for (const state of this.states.workStates) {
        vars.push(this.cell(entity, period, s, state.name));
      }
    }
    return vars;
  }

  assertEntity(entity: Entity): void {
    assertIndex("entity", entity, this.dimensions.entities);
  }

  assertPeriod(period: Period): void {
    assertIndex("period", period, this.dimensions.periods);
  }

  assertCell(entity: Entity, period: Period, subPeriod: SubPeriod): void {
    this.assertEntity(entity);
    this.assertPeriod(period);
    assertIndex("subPeriod", subPeriod, this.dimensions.subPeriods);
  }
}

function assertIndex(label: string, value: number, count: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= count) {
    throw new InvalidReferenceError(`${label} ${value} is outside [0, ${count})`);
  }
}
