/**
 * High-level scenario definition API.
 *
 * Small factory functions that produce rule entries, and an immutable
 * {@link Scenario} that compiles them into a model and solves or enumerates
 * it.
 *
 * @example
 * ```typescript
 * import {
 *   defineScenario, cover, exclusiveActivity,
 *   maxWorkPerPeriod, minWorkPerPeriod, maxConsecutive, DRIVER_STATES,
 * } from "shiftgrid";
 *
 * const drivers = defineScenario({
 *   dimensions: { entities: 3, periods: 1, subPeriods: 8 },
 *   states: DRIVER_STATES,
 *   rules: [
 *     cover("drive"),
 *     exclusiveActivity(),
 *     maxWorkPerPeriod(5),
 *     minWorkPerPeriod(4),
 *     maxConsecutive("drive", 2),
 *   ],
 * });
 *
 * const { result } = drivers.enumerate((solution) => console.log(solution.index), {
 *   solutionsOfInterest: [1, 2],
 * });
 * ```
 *
 * @module
 */

import type { SolverClient, SolverOptions } from "./client.types.js";
import { enumerateSolutions, type EnumerateOptions, type EnumerationResult } from "./model/enumerate.js";
import type { CompilationResult, CompilationRule } from "./model/model-builder.js";
import { ModelBuilder } from "./model/model-builder.js";
import type { Solution, SolverResult } from "./model/response.js";
import type { ImplicationPair } from "./model/rules/implications.js";
import type { RuleConfigEntry } from "./model/rules/rules.types.js";
import { solveFirst, type SolveOptions } from "./model/solve.js";
import type { StateVocabulary } from "./model/states.js";
import type { Entity, GridDimensions, Period } from "./types.js";
import type { RuleViolation } from "./model/validation.types.js";

// ============================================================================
// Rule helpers
// ============================================================================

/**
 * Entity and period scoping shared by the rule helpers.
 *
 * @category Rules
 */
export interface ScopeOptions {
  /** Restrict to these entities. */
  entities?: [Entity, ...Entity[]];
  /** Restrict to these periods. */
  periods?: [Period, ...Period[]];
}

/**
 * Exactly `count` entities hold `state` in every sub-period.
 *
 * @example
 * ```typescript
 * cover("drive")      // one driver at the wheel in every block
 * cover("on", 2)      // two nurses on every shift
 * ```
 *
 * @category Rules
 */
export function cover(
  state: string,
  count = 1,
  opts?: { periods?: [Period, ...Period[]] },
): RuleConfigEntry {
  return { name: "coverage", state, count, ...opts };
}

/**
 * Each entity holds exactly one state per sub-period.
 *
 * @category Rules
 */
export function exclusiveActivity(opts?: ScopeOptions): RuleConfigEntry {
  return { name: "exclusive-activity", ...opts };
}

/**
 * At most `max` work sub-periods per entity per period.
 *
 * @category Rules
 */
export function maxWorkPerPeriod(max: number, opts?: ScopeOptions): RuleConfigEntry {
  return { name: "max-work", max, ...opts };
}

/**
 * At least `min` work sub-periods per entity per period. With `exemptState`,
 * a period spent entirely in that state is exempt.
 *
 * @example
 * ```typescript
 * minWorkPerPeriod(4)
 * minWorkPerPeriod(4, { exemptState: "free" })
 * ```
 *
 * @category Rules
 */
export function minWorkPerPeriod(
  min: number,
  opts?: ScopeOptions & { exemptState?: string },
): RuleConfigEntry {
  return { name: "min-work", min, ...opts };
}

/**
 * No run of more than `max` consecutive sub-periods in `state`.
 *
 * @category Rules
 */
export function maxConsecutive(state: string, max: number, opts?: ScopeOptions): RuleConfigEntry {
  return { name: "max-consecutive", state, max, ...opts };
}

/**
 * Defines "entire period in `state`" indicators, e.g. days off.
 *
 * @category Rules
 */
export function freePeriods(state: string, opts?: ScopeOptions): RuleConfigEntry {
  return { name: "free-period", state, ...opts };
}

/**
 * Direct `if ⇒ then` implications over named variables.
 *
 * @category Rules
 */
export function implications(pairs: ImplicationPair[]): RuleConfigEntry {
  return { name: "implications", implications: pairs };
}

// ============================================================================
// Scenario
// ============================================================================

/**
 * Configuration for {@link defineScenario}.
 *
 * @category Scenario Definition
 */
export interface ScenarioConfig {
  dimensions: GridDimensions;
  states: StateVocabulary;
  /** Named rule entries, usually built with the helpers above. */
  rules: RuleConfigEntry[];
  /** Rules outside the registry, compiled after `rules`. */
  customRules?: CompilationRule[];
  solverOptions?: SolverOptions;
}

/**
 * Result of {@link Scenario.enumerate}.
 *
 * @category Scenario Definition
 */
export interface ScenarioEnumeration {
  builder: ModelBuilder;
  result: EnumerationResult;
}

/**
 * Result of {@link Scenario.solve}.
 *
 * @category Scenario Definition
 */
export interface ScenarioSolve {
  builder: ModelBuilder;
  result: SolverResult;
  /** Rule violations of the returned solution; empty when none was found. */
  violations: RuleViolation[];
}

/**
 * An immutable scenario definition.
 *
 * Every compile starts from a fresh {@link ModelBuilder}, so a scenario can
 * be solved any number of times.
 *
 * @category Scenario Definition
 */
export class Scenario {
  readonly #config: Readonly<ScenarioConfig>;

  /** @internal */
  constructor(config: ScenarioConfig) {
    this.#config = config;
  }

  get dimensions(): Readonly<GridDimensions> {
    return this.#config.dimensions;
  }

  get states(): StateVocabulary {
    return this.#config.states;
  }

  /** Rule names in compile order. */
  get ruleNames(): readonly string[] {
    return this.#config.rules.map((r) => r.name);
  }

  /**
   * Returns a new scenario with more rules appended. The original is untouched.
   */
  with(...rules: RuleConfigEntry[]): Scenario {
    return new Scenario({ ...this.#config, rules: [...this.#config.rules, ...rules] });
  }

  /**
   * Returns a new scenario with some dimensions replaced.
   */
  resize(dimensions: Partial<GridDimensions>): Scenario {
    return new Scenario({
      ...this.#config,
      dimensions: { ...this.#config.dimensions, ...dimensions },
    });
  }

  /**
   * Diagnostic escape hatch. Compiles the scenario without solving.
   */
  compile(): CompilationResult & { builder: ModelBuilder } {
    const builder = new ModelBuilder({
      dimensions: this.#config.dimensions,
      states: this.#config.states,
      ruleConfigs: this.#config.rules,
      rules: this.#config.customRules,
      solverOptions: this.#config.solverOptions,
    });
    return { ...builder.compile(), builder };
  }

  /**
   * Enumerates the scenario in process; `onSolution` receives the solutions
   * of interest together with the builder that decodes them.
   */
  enumerate(
    onSolution: (solution: Solution, builder: ModelBuilder) => void,
    options?: EnumerateOptions,
  ): ScenarioEnumeration {
    const { request, builder } = this.compile();
    const result = enumerateSolutions(request, (s) => onSolution(s, builder), options);
    return { builder, result };
  }

  /**
   * Finds one solution through `client` and audits it against the rules.
   */
  async solve(client: SolverClient, options?: SolveOptions): Promise<ScenarioSolve> {
    const { request, builder } = this.compile();
    const result = await solveFirst(client, request, options);
    const violations = result.solution ? builder.validateSolution(result.solution) : [];
    return { builder, result, violations };
  }
}

/**
 * Create a scenario definition.
 *
 * @category Scenario Definition
 */
export function defineScenario(config: ScenarioConfig): Scenario {
  return new Scenario({ ...config, rules: [...config.rules] });
}
