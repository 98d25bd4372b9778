import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import type { SolverRequest } from "../../src/client.types.js";
import { InvalidReferenceError } from "../../src/errors.js";
import { ConstraintModel, type LinearOp } from "../../src/model/constraint-model.js";
import { LocalSearch, LocalSolverClient, searchFirst } from "../../src/model/local-solver.js";
import { solveFirst } from "../../src/model/solve.js";
import { not } from "../../src/model/utils.js";
import { driverFreeDaysScenario } from "../../src/scenarios/driver-free-days.js";
import { collectSolutions } from "./helpers.js";

function linearModel(
  names: string[],
  terms: Array<[string, number]>,
  op: LinearOp,
  rhs: number,
): SolverRequest {
  const model = new ConstraintModel();
  for (const name of names) model.newBoolVar(name);
  model.addLinear(
    terms.map(([v, coeff]) => ({ var: v, coeff })),
    op,
    rhs,
  );
  return model.toRequest();
}

describe("linear constraints", () => {
  it.each([
    ["x + y + z == 2", linearModel(["x", "y", "z"], [["x", 1], ["y", 1], ["z", 1]], "==", 2), 3],
    ["2x + y <= 2", linearModel(["x", "y"], [["x", 2], ["y", 1]], "<=", 2), 3],
    ["x - y >= 0", linearModel(["x", "y"], [["x", 1], ["y", -1]], ">=", 0), 3],
    ["x - y == 1", linearModel(["x", "y"], [["x", 1], ["y", -1]], "==", 1), 1],
    ["x + y >= 3", linearModel(["x", "y"], [["x", 1], ["y", 1]], ">=", 3), 0],
    ["0x <= -1", linearModel(["x"], [["x", 0]], "<=", -1), 0],
    ["empty sum >= 0", linearModel(["x", "y"], [], ">=", 0), 4],
  ])("%s has the expected number of solutions", (_label, request, expected) => {
    const { result } = collectSolutions(request);
    expect(result.status).toBe("COMPLETE");
    expect(result.statistics.solutions).toBe(expected);
  });

  it("reads the solution of x - y == 1", () => {
    const { solutions } = collectSolutions(linearModel(["x", "y"], [["x", 1], ["y", -1]], "==", 1));
    expect(solutions.map((s) => s.toValues())).toEqual([{ x: 1, y: 0 }]);
  });
});

describe("LocalSearch", () => {
  it("encodes implications over negated literals", () => {
    const model = new ConstraintModel();
    model.newBoolVar("x");
    model.newBoolVar("y");
    model.addImplication(not("x"), "y");

    const { solutions } = collectSolutions(model.toRequest());
    expect(solutions).toHaveLength(3);
    expect(solutions.some((s) => !s.value("x") && !s.value("y"))).toBe(false);
  });

  it("counts one conflict for an unsatisfiable request", () => {
    const search = new LocalSearch(linearModel(["x"], [["x", 1]], ">=", 2));

    expect(search.next()).toBeUndefined();
    expect(search.next()).toBeUndefined();
    expect(search.branches).toBe(1);
    expect(search.conflicts).toBe(1);
    expect(search.exhausted).toBe(true);
  });

  it("yields the empty assignment once for a request without variables", () => {
    const search = new LocalSearch({ variables: [], constraints: [] });

    expect(search.next()).toEqual(new Map());
    expect(search.next()).toBeUndefined();
    expect(search.branches).toBe(1);
    expect(search.conflicts).toBe(0);
  });

  it("rejects constraints over undeclared variables", () => {
    const request: SolverRequest = {
      variables: [{ type: "bool", name: "x" }],
      constraints: [{ type: "implication", if: "x", then: { not: "z" } }],
    };
    expect(() => new LocalSearch(request)).toThrow(InvalidReferenceError);
  });
});

describe("searchFirst", () => {
  it("answers with one assignment and the calls it took", () => {
    expect(searchFirst(linearModel(["x"], [["x", 1]], "==", 1))).toEqual({
      status: "FEASIBLE",
      values: { x: 1 },
      statistics: { conflicts: 0, branches: 1 },
    });
  });

  it("answers INFEASIBLE after one unsatisfiable call", () => {
    expect(searchFirst(linearModel(["x"], [["x", 1]], ">=", 2))).toEqual({
      status: "INFEASIBLE",
      statistics: { conflicts: 1, branches: 1 },
    });
  });
});

describe("LocalSolverClient", () => {
  it("returns one feasible assignment with statistics", async () => {
    let t = 0;
    const client = new LocalSolverClient({ now: () => (t += 5) });

    const response = await client.solve(linearModel(["x", "y"], [["x", 1], ["y", 1]], "==", 1));

    expect(response.status).toBe("FEASIBLE");
    const values = response.values ?? {};
    expect(Object.keys(values).sort()).toEqual(["x", "y"]);
    expect((values.x ?? 0) + (values.y ?? 0)).toBe(1);
    expect(response.statistics).toEqual({ solveTimeMs: 5, conflicts: 0, branches: 1 });
  });

  it("reports a proof of infeasibility as INFEASIBLE", async () => {
    const response = await new LocalSolverClient().solve(
      linearModel(["x", "y"], [["x", 1], ["y", 1]], ">=", 3),
    );

    expect(response.status).toBe("INFEASIBLE");
    expect(response.values).toBeUndefined();
    expect(response.statistics?.conflicts).toBe(1);
  });

  it("rejects an aborted signal before solving", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new LocalSolverClient().solve(linearModel(["x"], [], ">=", 0), { signal: controller.signal }),
    ).rejects.toThrow();
  });

  it("validates the request", async () => {
    const request: SolverRequest = {
      variables: [{ type: "bool", name: "x" }],
      constraints: [{ type: "linear", terms: [{ var: "x", coeff: 1.5 }], op: "<=", rhs: 1 }],
    };
    await expect(new LocalSolverClient().solve(request)).rejects.toBeInstanceOf(ZodError);
  });

  it("rejects a constraint on an undeclared variable", async () => {
    const request: SolverRequest = {
      variables: [{ type: "bool", name: "x" }],
      constraints: [{ type: "implication", if: "x", then: "y" }],
    };
    await expect(new LocalSolverClient().solve(request)).rejects.toBeInstanceOf(
      InvalidReferenceError,
    );
  });

  it("stops a long search at the time limit", async () => {
    const { request } = driverFreeDaysScenario({ drivers: 12, days: 20, blocks: 16 }).compile();
    const started = performance.now();

    const result = await solveFirst(new LocalSolverClient(), request, { timeLimitSeconds: 0.2 });

    expect(result.status).toBe("TIMEOUT");
    expect(result.timedOut).toBe(true);
    expect(result.solution).toBeUndefined();
    expect(result.statistics?.branches).toBe(1);
    expect(performance.now() - started).toBeLessThan(5000);
  });

  it("answers TIMEOUT without values from the backend", async () => {
    const response = await new LocalSolverClient().solve({
      ...driverFreeDaysScenario({ drivers: 12, days: 20, blocks: 16 }).compile().request,
      options: { timeLimitSeconds: 0.05 },
    });

    expect(response.status).toBe("TIMEOUT");
    expect(response.values).toBeUndefined();
  });
});
