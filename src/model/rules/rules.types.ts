import type { CompilationRule } from "../model-builder.js";

export type CreateRuleFunction<TConfig> = (config: TConfig) => CompilationRule;

// Registry of built-in rule names to their config types
export interface RuleRegistry {
  coverage: import("./coverage.js").CoverageConfig;
  "exclusive-activity": import("./exclusive-activity.js").ExclusiveActivityConfig;
  "free-period": import("./free-period.js").FreePeriodConfig;
  implications: import("./implications.js").ImplicationsConfig;
  "max-consecutive": import("./max-consecutive.js").MaxConsecutiveConfig;
  "max-work": import("./max-work.js").MaxWorkConfig;
  "min-work": import("./min-work.js").MinWorkConfig;
}

export type RuleName = keyof RuleRegistry;

export type BuiltInRuleFactories = {
  [K in RuleName]: CreateRuleFunction<RuleRegistry[K]>;
};

/**
 * A named rule configuration entry.
 *
 * Flat discriminated union: `name` is the discriminant and the rule's config
 * fields sit at the same level.
 *
 * @example
 * ```ts
 * const rules: RuleConfigEntry[] = [
 *   { name: "coverage", state: "drive" },
 *   { name: "exclusive-activity" },
 *   { name: "max-consecutive", state: "drive", max: 2 },
 * ];
 * ```
 */
export type RuleConfigEntry = {
  [K in RuleName]: { name: K } & RuleRegistry[K];
}[RuleName];
