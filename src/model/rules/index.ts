export { createCoverageRule, type CoverageConfig } from "./coverage.js";
export {
  createExclusiveActivityRule,
  type ExclusiveActivityConfig,
} from "./exclusive-activity.js";
export { createFreePeriodRule, type FreePeriodConfig } from "./free-period.js";
export {
  addImplications,
  createImplicationsRule,
  type ImplicationPair,
  type ImplicationsConfig,
} from "./implications.js";
export {
  createMaxConsecutiveRule,
  slidingWindows,
  type MaxConsecutiveConfig,
} from "./max-consecutive.js";
export { createMaxWorkRule, type MaxWorkConfig } from "./max-work.js";
export { createMinWorkRule, type MinWorkConfig } from "./min-work.js";
export { resolveEntities, resolvePeriods, ScopeShape, type ScopeConfig } from "./scoping.js";
