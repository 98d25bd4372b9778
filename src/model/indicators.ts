import type { Entity, Period } from "../types.js";
import type { ConstraintSink } from "./constraint-model.js";
import type { DecisionGrid } from "./grid.js";
import { not, sumOf } from "./utils.js";

/**
 * Defines a boolean that is true iff every sub-period of (entity, period) is
 * in `state`.
 *
 * Per sub-period, `¬cell ⇒ ¬indicator` and `indicator ⇒ cell` pin the
 * indicator down to false whenever a cell is outside `state`. One linear
 * constraint, `Σ cells − indicator ≤ subPeriods − 1`, forces it to true when
 * every cell is in `state`.
 */
export function defineIndicator(
  sink: ConstraintSink,
  grid: DecisionGrid,
  entity: Entity,
  period: Period,
  state: string,
  name = `all:${entity}:${period}:${state}`,
): string {
  grid.assertEntity(entity);
  grid.assertPeriod(period);
  grid.states.get(state);

  const indicator = sink.newBoolVar(name);
  const cells: string[] = [];
  for (const s of grid.subPeriods) {
    const cell = grid.cell(entity, period, s, state);
    sink.addImplication(not(cell), not(indicator));
    sink.addImplication(indicator, cell);
    cells.push(cell);
  }
  sink.addLinear([...sumOf(cells), { var: indicator, coeff: -1 }], "<=", cells.length - 1);
  return indicator;
}

/**
 * Indicators defined on a grid, keyed by (entity, period, state).
 *
 * {@link IndicatorTable.ensure} is idempotent, so several rules can ask for the
 * same indicator regardless of the order they compile in.
 */
export class IndicatorTable {
  readonly prefix: string;

  #sink: ConstraintSink;
  #grid: DecisionGrid;
  #byKey = new Map<string, string>();

  constructor(sink: ConstraintSink, grid: DecisionGrid, prefix = "all") {
    this.#sink = sink;
    this.#grid = grid;
    this.prefix = prefix;
  }

  get size(): number {
    return this.#byKey.size;
  }

  ensure(entity: Entity, period: Period, state: string): string {
    const key = `${entity}:${period}:${state}`;
    const existing = this.#byKey.get(key);
    if (existing) return existing;

    const indicator = defineIndicator(
      this.#sink,
      this.#grid,
      entity,
      period,
      state,
      `${this.prefix}:${entity}:${period}:${state}`,
    );
    this.#byKey.set(key, indicator);
    return indicator;
  }

  get(entity: Entity, period: Period, state: string): string | undefined {
    return this.#byKey.get(`${entity}:${period}:${state}`);
  }

  entries(): Array<{ entity: Entity; period: Period; state: string; variable: string }> {
    return [...this.#byKey.entries()].map(([key, variable]) => {
      const [entity = "", period = "", state = ""] = key.split(":");
      return { entity: Number(entity), period: Number(period), state, variable };
    });
  }
}
