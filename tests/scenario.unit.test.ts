import { describe, expect, it } from "vitest";
import { LocalSolverClient } from "../src/model/local-solver.js";
import { DRIVER_STATES, NURSE_STATES } from "../src/model/states.js";
import {
  cover,
  defineScenario,
  exclusiveActivity,
  freePeriods,
  implications,
  maxConsecutive,
  maxWorkPerPeriod,
  minWorkPerPeriod,
} from "../src/scenario.js";
import { not } from "../src/model/utils.js";

describe("rule helpers", () => {
  it("produce named rule entries", () => {
    expect(cover("drive")).toEqual({ name: "coverage", state: "drive", count: 1 });
    expect(cover("on", 2, { periods: [1] })).toEqual({
      name: "coverage",
      state: "on",
      count: 2,
      periods: [1],
    });
    expect(exclusiveActivity({ entities: [0] })).toEqual({
      name: "exclusive-activity",
      entities: [0],
    });
    expect(maxWorkPerPeriod(5)).toEqual({ name: "max-work", max: 5 });
    expect(minWorkPerPeriod(4, { exemptState: "free" })).toEqual({
      name: "min-work",
      min: 4,
      exemptState: "free",
    });
    expect(maxConsecutive("drive", 2)).toEqual({ name: "max-consecutive", state: "drive", max: 2 });
    expect(freePeriods("free")).toEqual({ name: "free-period", state: "free" });
    expect(implications([{ if: "a", then: not("b") }])).toEqual({
      name: "implications",
      implications: [{ if: "a", then: { not: "b" } }],
    });
  });
});

describe("Scenario", () => {
  const drivers = defineScenario({
    dimensions: { entities: 2, periods: 1, subPeriods: 3 },
    states: DRIVER_STATES,
    rules: [cover("drive"), exclusiveActivity()],
  });

  it("is immutable", () => {
    const stricter = drivers.with(maxConsecutive("drive", 1));

    expect(drivers.ruleNames).toEqual(["coverage", "exclusive-activity"]);
    expect(stricter.ruleNames).toEqual(["coverage", "exclusive-activity", "max-consecutive"]);
    expect(drivers.resize({ entities: 3 }).dimensions).toEqual({
      entities: 3,
      periods: 1,
      subPeriods: 3,
    });
    expect(drivers.dimensions.entities).toBe(2);
  });

  it("compiles into a fresh model every time", () => {
    const first = drivers.compile();
    const second = drivers.compile();

    expect(first.builder).not.toBe(second.builder);
    expect(first.request).toEqual(second.request);
    expect(first.request.constraints).toHaveLength(9);
  });

  it("enumerates with the builder at hand", () => {
    // Per block: which entity drives, and whether the other is free or resting.
    const seen: string[] = [];
    const { result } = drivers.enumerate(
      (_solution, builder) => seen.push(builder.grid.cell(0, 0, 0, "drive")),
      { solutionsOfInterest: [1], timeLimitSeconds: 60 },
    );

    expect(seen).toEqual(["cell:0:0:0:drive"]);
    expect(result.status).toBe("COMPLETE");
    expect(result.statistics.solutions).toBe(64);
  });

  it("solves and audits the first solution", async () => {
    const { result, violations } = await drivers
      .with(maxWorkPerPeriod(2), minWorkPerPeriod(1), maxConsecutive("drive", 1))
      .solve(new LocalSolverClient());

    expect(result.status).toBe("FEASIBLE");
    expect(result.solution).toBeDefined();
    expect(violations).toEqual([]);
  });

  it("reports infeasibility without violations", async () => {
    const nurses = defineScenario({
      dimensions: { entities: 1, periods: 1, subPeriods: 2 },
      states: NURSE_STATES,
      rules: [cover("on"), maxWorkPerPeriod(1)],
    });

    const { result, violations } = await nurses.solve(new LocalSolverClient());

    expect(result.status).toBe("INFEASIBLE");
    expect(result.solution).toBeUndefined();
    expect(violations).toEqual([]);
  });

  it("compiles custom rules after the named ones", () => {
    const scenario = defineScenario({
      dimensions: { entities: 1, periods: 1, subPeriods: 1 },
      states: NURSE_STATES,
      rules: [],
      customRules: [
        {
          name: "always-on",
          compile: (b) => b.addLinear([{ var: b.grid.cell(0, 0, 0, "on"), coeff: 1 }], "==", 1),
        },
      ],
    });

    expect(scenario.compile().request.constraints).toEqual([
      { type: "linear", terms: [{ var: "cell:0:0:0:on", coeff: 1 }], op: "==", rhs: 1 },
    ]);
  });
});
