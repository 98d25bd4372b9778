import { DuplicateStateNameError, InvalidDimensionError, InvalidReferenceError } from "../errors.js";

const STATE_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

/**
 * One per-sub-period activity state.
 *
 * `isWork` marks states that count toward workload bounds (driving and resting
 * both count; being free does not).
 */
export interface StateDef<N extends string = string> {
  readonly name: N;
  readonly isWork: boolean;
}

/**
 * Closed, ordered set of mutually exclusive states.
 *
 * For any (entity, period, sub-period) exactly one state holds once the
 * exclusive-activity rule is applied.
 */
export interface StateVocabulary<N extends string = string> {
  readonly states: readonly StateDef<N>[];
  /** The states whose `isWork` is true, in vocabulary order. */
  readonly workStates: readonly StateDef<N>[];
  readonly names: readonly N[];
  has(name: string): name is N;
  get(name: string): StateDef<N>;
  indexOf(name: string): number;
}

/**
 * Builds a state vocabulary.
 *
 * @throws {DuplicateStateNameError} when two states share a name
 * @throws {InvalidDimensionError} when no state is given
 *
 * @example
 * ```ts
 * const states = defineStates([
 *   { name: "free", isWork: false },
 *   { name: "drive", isWork: true },
 *   { name: "rest", isWork: true },
 * ]);
 * states.workStates.map((s) => s.name); // ["drive", "rest"]
 * ```
 */
export function defineStates<const T extends readonly StateDef[]>(
  defs: T,
): StateVocabulary<T[number]["name"]> {
  type N = T[number]["name"];

  if (defs.length === 0) {
    throw new InvalidDimensionError("states", 0);
  }

  const index = new Map<string, number>();
  defs.forEach((def, i) => {
    if (!STATE_NAME.test(def.name)) {
      throw new InvalidReferenceError(`Invalid state name "${def.name}"`);
    }
    if (index.has(def.name)) {
      throw new DuplicateStateNameError(def.name);
    }
    index.set(def.name, i);
  });

  const states: readonly StateDef<N>[] = defs.map((d) => ({ name: d.name, isWork: d.isWork }));
  const workStates = states.filter((s) => s.isWork);

  const has = (name: string): name is N => index.has(name);

  return {
    states,
    workStates,
    names: states.map((s) => s.name),
    has,
    get(name) {
      const i = index.get(name);
      const state = i === undefined ? undefined : states[i];
      if (!state) {
        throw new InvalidReferenceError(`Unknown state "${name}"`);
      }
      return state;
    },
    indexOf(name) {
      const i = index.get(name);
      if (i === undefined) {
        throw new InvalidReferenceError(`Unknown state "${name}"`);
      }
      return i;
    },
  };
}

/** Driver states: idle, driving, or on a break. Driving and breaks count as work. */
export const DRIVER_STATES = defineStates([
  { name: "free", isWork: false },
  { name: "drive", isWork: true },
  { name: "rest", isWork: true },
]);

/** Single work state: the nurse works the shift. */
export const NURSE_STATES = defineStates([{ name: "on", isWork: true }]);
