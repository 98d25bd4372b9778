/**
 * Boolean constraint models for shift and block scheduling.
 *
 * Describe a schedule as a grid of boolean decisions, one per
 * (entity, period, sub-period, state), constrain it with rules, and either
 * enumerate its solutions in process or ask a solver for the first one.
 *
 * @remarks
 * ## Core Concepts
 *
 * **States**: a closed vocabulary of mutually exclusive activities
 * ({@link defineStates}); states flagged `isWork` count toward workload.
 *
 * **Grid**: {@link DecisionGrid} allocates every decision variable up front.
 * **Indicators** ({@link defineIndicator}) are booleans equivalent to
 * "the whole period is in state X".
 *
 * **Rules**: constraint families (coverage, exclusive activity, workload
 * bounds, consecutive-run bounds, free periods, implications), available as
 * `create*Rule` factories, as named entries (`{ name: "max-work", max: 5 }`),
 * and as the helpers used with {@link defineScenario}.
 *
 * **Solving**: {@link ModelBuilder} compiles the rules into a JSON
 * {@link SolverRequest}. {@link enumerateSolutions} walks every solution in
 * process; {@link solveFirst} asks a {@link SolverClient}
 * (such as {@link LocalSolverClient}) for one.
 *
 * @example
 * ```typescript
 * import {
 *   defineScenario, cover, exclusiveActivity, maxWorkPerPeriod,
 *   minWorkPerPeriod, maxConsecutive, DRIVER_STATES,
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
 * const { result } = drivers.enumerate(() => {}, { solutionLimit: 100 });
 * console.log(result.status, result.statistics.solutions);
 * ```
 *
 * @packageDocumentation
 */

// Scenario definition API
export {
  cover,
  defineScenario,
  exclusiveActivity,
  freePeriods,
  implications,
  maxConsecutive,
  maxWorkPerPeriod,
  minWorkPerPeriod,
  Scenario,
  type ScenarioConfig,
  type ScenarioEnumeration,
  type ScenarioSolve,
  type ScopeOptions,
} from "./scenario.js";

// Core types
export {
  assertDimensions,
  range,
  type CellRef,
  type Entity,
  type GridDimensions,
  type Period,
  type SubPeriod,
} from "./types.js";

// Errors
export {
  DuplicateStateNameError,
  DuplicateVariableError,
  InvalidDimensionError,
  InvalidReferenceError,
  ModelFrozenError,
  ShiftgridError,
} from "./errors.js";

// Model
export { ConstraintModel, type ConstraintSink, type LinearOp } from "./model/constraint-model.js";
export { DecisionGrid, type DecisionGridOptions } from "./model/grid.js";
export { defineIndicator, IndicatorTable } from "./model/indicators.js";
export {
  ModelBuilder,
  type CompilationResult,
  type CompilationRule,
  type ModelBuilderConfig,
  type RuleValidationContext,
} from "./model/model-builder.js";
export {
  defineStates,
  DRIVER_STATES,
  NURSE_STATES,
  type StateDef,
  type StateVocabulary,
} from "./model/states.js";
export { DEFAULT_TIME_LIMIT_SECONDS, not, sumOf } from "./model/utils.js";

// Rules
export * from "./model/rules.js";

// Solving
export {
  enumerateSolutions,
  iterateSolutions,
  type EnumerateOptions,
  type EnumerationResult,
  type EnumerationStatus,
  type IterateOptions,
  type SearchStatistics,
  type SolutionsOfInterest,
} from "./model/enumerate.js";
export {
  LocalSearch,
  LocalSolverClient,
  searchFirst,
  type LocalSolverClientOptions,
} from "./model/local-solver.js";
export {
  decodeGrid,
  isWorking,
  parseSolverResponse,
  Solution,
  stateAt,
  type Assignment,
  type SolverResult,
} from "./model/response.js";
export { solveFirst, type SolveOptions } from "./model/solve.js";
export type { RuleViolation, ValidationContext } from "./model/validation.types.js";
export type { ValidationReporter } from "./model/validation-reporter.js";

// Solver transport
export {
  SOLVER_STATUS,
  type SolverClient,
  type SolverConstraint,
  type SolverLiteral,
  type SolverOptions,
  type SolverRequest,
  type SolverResponse,
  type SolverStatistics,
  type SolverStatus,
  type SolverTerm,
  type SolverVariable,
} from "./client.types.js";
export { SolverRequestSchema, SolverResponseSchema } from "./client.schemas.js";

// Scenarios
export * from "./scenarios/index.js";
