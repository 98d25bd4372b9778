import { ConstraintModel } from "../model/constraint-model.js";
import { enumerateSolutions } from "../model/enumerate.js";
import { addImplications, type ImplicationPair } from "../model/rules/implications.js";
import { not } from "../model/utils.js";
import { range } from "../types.js";
import { renderEnumerationStatus, renderStatistics, renderVariables } from "./render.js";
import type { ScenarioDriver, ScenarioReport, ScenarioRunOptions } from "./types.js";

export interface ImplicationsParams {
  variables: string[];
  implications: ImplicationPair[];
}

export const IMPLICATIONS_DEFAULTS: Readonly<ImplicationsParams> = {
  variables: ["a", "b", "c"],
  implications: [
    { if: "a", then: "c" },
    { if: not("a"), then: not("c") },
    { if: "b", then: "c" },
  ],
};

/**
 * Builds a bare model: one boolean per name and the given implications.
 */
export function implicationsModel(params: Partial<ImplicationsParams> = {}): ConstraintModel {
  const p = { ...IMPLICATIONS_DEFAULTS, ...params };
  const model = new ConstraintModel();
  for (const name of p.variables) model.newBoolVar(name);
  addImplications(model, p.implications);
  return model;
}

/**
 * Enumerates every assignment satisfying the implications and renders
 * solutions 1 to 8 (by default).
 */
export function runImplications(
  params: Partial<ImplicationsParams> = {},
  options: ScenarioRunOptions = {},
): ScenarioReport {
  const model = implicationsModel(params);
  const request = model.toRequest();
  const names = request.variables.map((v) => v.name);

  const lines: string[] = [];
  const result = enumerateSolutions(request, (solution) => lines.push(...renderVariables(solution, names)), {
    solutionsOfInterest: options.solutionsOfInterest ?? range(8).map((i) => i + 1),
    timeLimitSeconds: options.timeLimitSeconds,
    solutionLimit: options.solutionLimit,
    now: options.now,
  });

  lines.push("", ...renderStatistics(result.statistics), renderEnumerationStatus(result.status));
  return { status: result.status, lines };
}

export const implicationPuzzle: ScenarioDriver<ImplicationsParams> = {
  name: "implications",
  description: "Three booleans linked by implications",
  defaults: IMPLICATIONS_DEFAULTS,
  run: async (params, options) => runImplications(params, options),
};
