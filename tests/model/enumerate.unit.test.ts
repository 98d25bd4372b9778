import assert from "node:assert";
import { describe, expect, it } from "vitest";
import {
  enumerateSolutions,
  interestPredicate,
  iterateSolutions,
} from "../../src/model/enumerate.js";
import type { Solution } from "../../src/model/response.js";
import type { RuleConfigEntry } from "../../src/model/rules.js";
import { collectSolutions, compileWithRules, DRIVER_CORE, driverGrid } from "./helpers.js";

// Two drivers, three blocks: 16 schedules.
const RULES: RuleConfigEntry[] = [
  ...DRIVER_CORE,
  { name: "max-work", max: 3 },
  { name: "min-work", min: 1 },
  { name: "max-consecutive", state: "drive", max: 1 },
];

function smallRequest(solverOptions?: { timeLimitSeconds?: number; solutionLimit?: number }) {
  return compileWithRules(
    { ...driverGrid({ entities: 2, periods: 1, subPeriods: 3 }), solverOptions },
    RULES,
  );
}

describe("enumerateSolutions", () => {
  it("delivers every solution exactly once", () => {
    const { request, builder } = smallRequest();
    const { solutions, result } = collectSolutions(request);

    expect(result.status).toBe("COMPLETE");
    expect(result.statistics.solutions).toBe(16);
    expect(result.statistics.branches).toBe(17);
    expect(result.statistics.conflicts).toBe(1);
    expect(solutions.map((s) => s.index)).toEqual(Array.from({ length: 16 }, (_, i) => i + 1));
    expect(new Set(solutions.map((s) => s.trueVars().join(","))).size).toBe(16);
    for (const solution of solutions) {
      expect(builder.validateSolution(solution)).toEqual([]);
    }
  });

  it("gives the same count on a second run", () => {
    const { request } = smallRequest();
    expect(collectSolutions(request).result.statistics.solutions).toBe(16);
    expect(collectSolutions(request).result.statistics.solutions).toBe(16);
  });

  it("stops at the solution limit", () => {
    const { request } = smallRequest();
    const { result } = collectSolutions(request, { solutionLimit: 4 });

    expect(result.status).toBe("SOLUTION_LIMIT");
    expect(result.statistics).toMatchObject({ solutions: 4, branches: 4, conflicts: 0 });
  });

  it("reports the solution limit even when it equals the number of solutions", () => {
    const { request } = smallRequest();
    const { result } = collectSolutions(request, { solutionLimit: 16 });

    expect(result.status).toBe("SOLUTION_LIMIT");
    expect(result.statistics.branches).toBe(16);
  });

  it("takes the solution limit from the request options unless overridden", () => {
    const { request } = smallRequest({ solutionLimit: 3 });

    expect(collectSolutions(request).result.statistics.solutions).toBe(3);
    expect(collectSolutions(request, { solutionLimit: 5 }).result.statistics.solutions).toBe(5);
  });

  it("stops when the time budget elapses", () => {
    const { request } = smallRequest();
    let t = 0;
    const { result } = collectSolutions(request, { timeLimitSeconds: 1, now: () => (t += 400) });

    expect(result).toEqual({
      status: "TIMEOUT",
      statistics: { solutions: 2, conflicts: 0, branches: 2, wallTimeMs: 1600 },
    });
  });

  it("checks the budget before the first solver call", () => {
    const { request } = smallRequest();
    const { solutions, result } = collectSolutions(request, { timeLimitSeconds: 0, now: () => 0 });

    expect(solutions).toHaveLength(0);
    expect(result.status).toBe("TIMEOUT");
    expect(result.statistics.branches).toBe(0);
  });

  it("calls back only for the solutions of interest but keeps counting", () => {
    const { request } = smallRequest();
    const seen: number[] = [];
    const result = enumerateSolutions(request, (s) => seen.push(s.index), {
      solutionsOfInterest: [1, 3, 99],
    });

    expect(seen).toEqual([1, 3]);
    expect(result.statistics.solutions).toBe(16);
  });

  it("accepts a predicate for the solutions of interest", () => {
    const { request } = smallRequest();
    const seen: number[] = [];
    enumerateSolutions(request, (s) => seen.push(s.index), {
      solutionsOfInterest: (i) => i % 5 === 0,
    });

    expect(seen).toEqual([5, 10, 15]);
  });
});

describe("iterateSolutions", () => {
  it("yields lazily and returns the final result", () => {
    const { request } = smallRequest();
    const iterator = iterateSolutions(request, { solutionLimit: 2 });

    const first = iterator.next();
    assert(!first.done);
    expect(first.value.index).toBe(1);
    const second = iterator.next();
    assert(!second.done);
    expect(second.value.index).toBe(2);

    const last = iterator.next();
    assert(last.done);
    expect(last.value.status).toBe("SOLUTION_LIMIT");
    expect(last.value.statistics.solutions).toBe(2);
  });

  it("works with for...of", () => {
    const { request } = smallRequest();
    const seen: Solution[] = [];
    for (const solution of iterateSolutions(request)) {
      seen.push(solution);
      if (seen.length === 3) break;
    }
    expect(seen.map((s) => s.index)).toEqual([1, 2, 3]);
  });
});

describe("interestPredicate", () => {
  it("accepts everything by default", () => {
    expect(interestPredicate(undefined)(42)).toBe(true);
  });

  it("matches listed indices", () => {
    const predicate = interestPredicate(new Set([2]));
    expect(predicate(2)).toBe(true);
    expect(predicate(1)).toBe(false);
  });
});
