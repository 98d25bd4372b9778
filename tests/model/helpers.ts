import type { SolverRequest } from "../../src/client.types.js";
import { enumerateSolutions, type EnumerateOptions } from "../../src/model/enumerate.js";
import type { CompilationRule, ModelBuilderConfig } from "../../src/model/model-builder.js";
import { ModelBuilder } from "../../src/model/model-builder.js";
import type { Solution } from "../../src/model/response.js";
import type { RuleConfigEntry } from "../../src/model/rules.js";
import { DRIVER_STATES } from "../../src/model/states.js";
import type { GridDimensions } from "../../src/types.js";

/**
 * Base type for test grids: what ModelBuilder accepts minus the rules.
 */
export type BaseGridConfig = Omit<ModelBuilderConfig, "rules" | "ruleConfigs">;

export function driverGrid(dimensions: GridDimensions): BaseGridConfig {
  return { dimensions, states: DRIVER_STATES };
}

export const compileWithRules = (
  baseConfig: BaseGridConfig,
  ruleConfigs: RuleConfigEntry[],
  customRules: CompilationRule[] = [],
) => {
  const builder = new ModelBuilder({ ...baseConfig, ruleConfigs, rules: customRules });
  const { request } = builder.compile();
  return { builder, request };
};

/**
 * Enumerates every solution without a time budget worth mentioning and
 * collects them.
 */
export function collectSolutions(request: SolverRequest, options: EnumerateOptions = {}) {
  const solutions: Solution[] = [];
  const result = enumerateSolutions(request, (s) => solutions.push(s), {
    timeLimitSeconds: 60,
    ...options,
  });
  return { solutions, result };
}

/**
 * A custom rule that pins variables to fixed values, for building
 * assignments that a rule must reject.
 */
export function pin(values: Record<string, boolean>): CompilationRule {
  return {
    name: "pin",
    compile(b) {
      for (const [name, value] of Object.entries(values)) {
        b.addLinear([{ var: name, coeff: 1 }], "==", value ? 1 : 0);
      }
    },
  };
}

/** Rule entries shared by the driver fixtures. */
export const DRIVER_CORE: RuleConfigEntry[] = [
  { name: "coverage", state: "drive" },
  { name: "exclusive-activity" },
];
