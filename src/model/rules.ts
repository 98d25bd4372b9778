export {
  addImplications,
  createCoverageRule,
  createExclusiveActivityRule,
  createFreePeriodRule,
  createImplicationsRule,
  createMaxConsecutiveRule,
  createMaxWorkRule,
  createMinWorkRule,
  slidingWindows,
} from "./rules/index.js";

export type {
  CoverageConfig,
  ExclusiveActivityConfig,
  FreePeriodConfig,
  ImplicationPair,
  ImplicationsConfig,
  MaxConsecutiveConfig,
  MaxWorkConfig,
  MinWorkConfig,
} from "./rules/index.js";

export { builtInRuleFactories, isRuleName } from "./rules/registry.js";

export type {
  BuiltInRuleFactories,
  CreateRuleFunction,
  RuleConfigEntry,
  RuleName,
  RuleRegistry,
} from "./rules/rules.types.js";

export { buildRules } from "./rules/resolver.js";
