import {
  createCoverageRule,
  createExclusiveActivityRule,
  createFreePeriodRule,
  createImplicationsRule,
  createMaxConsecutiveRule,
  createMaxWorkRule,
  createMinWorkRule,
} from "./index.js";
import type { BuiltInRuleFactories, RuleName } from "./rules.types.js";

export const builtInRuleFactories: BuiltInRuleFactories = {
  coverage: createCoverageRule,
  "exclusive-activity": createExclusiveActivityRule,
  "free-period": createFreePeriodRule,
  implications: createImplicationsRule,
  "max-consecutive": createMaxConsecutiveRule,
  "max-work": createMaxWorkRule,
  "min-work": createMinWorkRule,
};

export function isRuleName(name: string): name is RuleName {
  return Object.hasOwn(builtInRuleFactories, name);
}
