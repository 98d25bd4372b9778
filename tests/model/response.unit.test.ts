import { describe, expect, it, vi } from "vitest";
import type { SolverClient, SolverRequest, SolverResponse } from "../../src/client.types.js";
import { InvalidReferenceError } from "../../src/errors.js";
import { ConstraintModel } from "../../src/model/constraint-model.js";
import { DecisionGrid } from "../../src/model/grid.js";
import {
  decodeGrid,
  isWorking,
  parseSolverResponse,
  Solution,
  stateAt,
} from "../../src/model/response.js";
import { solveFirst } from "../../src/model/solve.js";
import { DRIVER_STATES } from "../../src/model/states.js";
import { not } from "../../src/model/utils.js";

describe("Solution", () => {
  const solution = Solution.fromValues({ a: 1, b: 0, c: 1 }, 4);

  it("reads values and literals", () => {
    expect(solution.index).toBe(4);
    expect(solution.size).toBe(3);
    expect(solution.value("b")).toBe(false);
    expect(solution.literal(not("b"))).toBe(true);
    expect(solution.trueVars()).toEqual(["a", "c"]);
    expect(solution.toValues()).toEqual({ a: 1, b: 0, c: 1 });
  });

  it("rejects variables outside the assignment", () => {
    expect(solution.has("z")).toBe(false);
    expect(() => solution.value("z")).toThrow(InvalidReferenceError);
  });
});

describe("parseSolverResponse", () => {
  it("wraps the values of a feasible response", () => {
    const result = parseSolverResponse({ status: "FEASIBLE", values: { x: 1 } });

    expect(result.status).toBe("FEASIBLE");
    expect(result.timedOut).toBe(false);
    expect(result.solution?.value("x")).toBe(true);
  });

  it("treats a timeout with values as a feasible solution", () => {
    const result = parseSolverResponse({
      status: "TIMEOUT",
      values: { x: 0 },
      statistics: { solveTimeMs: 10_000 },
    });

    expect(result.status).toBe("FEASIBLE");
    expect(result.timedOut).toBe(true);
    expect(result.solution?.value("x")).toBe(false);
  });

  it("keeps an empty timeout apart from infeasibility", () => {
    const timeout = parseSolverResponse({ status: "TIMEOUT" });
    const infeasible = parseSolverResponse({ status: "INFEASIBLE" });

    expect(timeout).toMatchObject({ status: "TIMEOUT", timedOut: true });
    expect(timeout.solution).toBeUndefined();
    expect(infeasible).toMatchObject({ status: "INFEASIBLE", timedOut: false });
    expect(infeasible.solution).toBeUndefined();
  });

  it("passes solver errors through", () => {
    const result = parseSolverResponse({ status: "ERROR", error: "bad model", values: { x: 1 } });

    expect(result.solution).toBeUndefined();
    expect(result.error).toBe("bad model");
  });
});

describe("grid decoding", () => {
  const model = new ConstraintModel();
  const grid = DecisionGrid.create(model, { entities: 2, periods: 1, subPeriods: 2 }, DRIVER_STATES);
  const on = new Set(["cell:0:0:0:drive", "cell:0:0:1:rest", "cell:1:0:0:free", "cell:1:0:1:free"]);
  const solution = new Solution(model.toRequest().variables.map((v) => [v.name, on.has(v.name)] as const));

  it("finds the state of a cell", () => {
    expect(stateAt(solution, grid, 0, 0, 1)).toBe("rest");
    expect(stateAt(solution, grid, 1, 0, 0)).toBe("free");
  });

  it("tells working entities apart", () => {
    expect(isWorking(solution, grid, 0, 0)).toBe(true);
    expect(isWorking(solution, grid, 1, 0)).toBe(false);
  });

  it("lists true cells in grid order", () => {
    expect(decodeGrid(solution, grid)).toEqual([
      { entity: 0, period: 0, subPeriod: 0, state: "drive" },
      { entity: 0, period: 0, subPeriod: 1, state: "rest" },
      { entity: 1, period: 0, subPeriod: 0, state: "free" },
      { entity: 1, period: 0, subPeriod: 1, state: "free" },
    ]);
  });
});

describe("solveFirst", () => {
  const model = new ConstraintModel({ solutionLimit: 2 });
  model.newBoolVar("x");
  const request = model.toRequest();

  it("sends the time budget with the request", async () => {
    const solve = vi.fn(
      async (_request: SolverRequest, _options?: { signal?: AbortSignal }): Promise<SolverResponse> => ({
        status: "OPTIMAL",
        values: { x: 1 },
      }),
    );
    const client: SolverClient = { solve };

    const result = await solveFirst(client, request, { timeLimitSeconds: 3 });

    expect(solve).toHaveBeenCalledWith(
      {
        variables: [{ type: "bool", name: "x" }],
        constraints: [],
        options: { solutionLimit: 2, timeLimitSeconds: 3 },
      },
      { signal: undefined },
    );
    expect(result.status).toBe("OPTIMAL");
    expect(result.solution?.trueVars()).toEqual(["x"]);
  });

  it("defaults the time budget to ten seconds", async () => {
    const solve = vi.fn(
      async (_request: SolverRequest): Promise<SolverResponse> => ({ status: "INFEASIBLE" }),
    );

    const result = await solveFirst({ solve }, request);

    expect(solve.mock.calls[0]?.[0].options?.timeLimitSeconds).toBe(10);
    expect(result.status).toBe("INFEASIBLE");
  });
});
