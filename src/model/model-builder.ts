import type { SolverOptions, SolverRequest } from "../client.types.js";
import type { GridDimensions } from "../types.js";
import { ConstraintModel } from "./constraint-model.js";
import { DecisionGrid } from "./grid.js";
import { IndicatorTable } from "./indicators.js";
import type { Solution } from "./response.js";
import { buildRules } from "./rules/resolver.js";
import type { RuleConfigEntry } from "./rules/rules.types.js";
import type { StateVocabulary } from "./states.js";
import { ValidationReporterImpl } from "./validation-reporter.js";
import type { ValidationReporter } from "./validation-reporter.js";
import type { RuleViolation } from "./validation.types.js";

/**
 * Context provided to rules during post-solve validation.
 */
export interface RuleValidationContext {
  readonly grid: DecisionGrid;
  readonly indicators: IndicatorTable;
}

/**
 * A constraint family that writes into the model.
 *
 * Rules implement `compile` to emit constraints during model building,
 * and optionally `validate` to check an assignment after solving.
 * Use the `create*Rule` functions to create built-in rules.
 */
export interface CompilationRule {
  /** Identifies the rule in violations and diagnostics. */
  readonly name?: string;
  /** Emit variables and constraints into the model builder. */
  compile(builder: ModelBuilder): void;
  /** Check an assignment and report violations. */
  validate?(solution: Solution, reporter: ValidationReporter, context: RuleValidationContext): void;
}

export interface CompilationResult {
  request: SolverRequest;
}

/**
 * Configuration for ModelBuilder.
 *
 * @example Three drivers, one day of eight half-hour blocks
 * ```typescript
 * const builder = new ModelBuilder({
 *   dimensions: { entities: 3, periods: 1, subPeriods: 8 },
 *   states: DRIVER_STATES,
 *   ruleConfigs: [
 *     { name: "coverage", state: "drive" },
 *     { name: "exclusive-activity" },
 *     { name: "max-consecutive", state: "drive", max: 2 },
 *   ],
 * });
 * ```
 */
export interface ModelBuilderConfig {
  dimensions: GridDimensions;
  states: StateVocabulary;
  /**
   * Pre-compiled rules; use this for custom rules that are not part of the registry.
   */
  rules?: CompilationRule[];
  /**
   * Named rule configurations compiled with the built-in rule factories.
   * They run before `rules`.
   */
  ruleConfigs?: RuleConfigEntry[];
  /** Prefix of grid variable names. Defaults to `"cell"`. */
  variablePrefix?: string;
  /** Prefix of indicator variable names. Defaults to `"all"`. */
  indicatorPrefix?: string;
  solverOptions?: SolverOptions;
}

/**
 * Compilation context for grid scheduling models.
 *
 * Allocates the decision grid up front, lets each rule register its
 * constraints, and emits a `SolverRequest`. After {@link compile} the model
 * is frozen.
 */
export class ModelBuilder extends ConstraintModel {
  readonly dimensions: Readonly<GridDimensions>;
  readonly states: StateVocabulary;
  readonly grid: DecisionGrid;
  readonly indicators: IndicatorTable;
  readonly rules: CompilationRule[];

  #compilation: CompilationResult | undefined;

  constructor(config: ModelBuilderConfig) {
    super(config.solverOptions);
    this.states = config.states;
    this.grid = DecisionGrid.create(this, config.dimensions, config.states, {
      prefix: config.variablePrefix,
    });
    this.dimensions = this.grid.dimensions;
    this.indicators = new IndicatorTable(this, this.grid, config.indicatorPrefix);

    const compiledRuleConfigs = config.ruleConfigs ? buildRules(config.ruleConfigs) : [];
    this.rules = [...compiledRuleConfigs, ...(config.rules ?? [])];
  }

  /**
   * Applies every rule and freezes the model. Repeated calls return the same result.
   */
  compile(): CompilationResult {
    if (this.#compilation) return this.#compilation;

    for (const rule of this.rules) {
      rule.compile(this);
    }

    this.#compilation = { request: this.toRequest() };
    return this.#compilation;
  }

  /**
   * Checks an assignment against every rule that implements `validate`.
   */
  validateSolution(solution: Solution): RuleViolation[] {
    const reporter = new ValidationReporterImpl();
    const context: RuleValidationContext = { grid: this.grid, indicators: this.indicators };
    for (const rule of this.rules) {
      rule.validate?.(solution, reporter, context);
    }
    return reporter.getViolations();
  }
}
