import { describe, expect, it } from "vitest";
import {
  DuplicateVariableError,
  InvalidReferenceError,
  ModelFrozenError,
} from "../../src/errors.js";
import { ConstraintModel } from "../../src/model/constraint-model.js";
import { not } from "../../src/model/utils.js";

describe("ConstraintModel", () => {
  it("returns an existing variable from boolVar", () => {
    const model = new ConstraintModel();
    expect(model.boolVar("a")).toBe("a");
    expect(model.boolVar("a")).toBe("a");
    expect(model.variableCount).toBe(1);
  });

  it("refuses to create a variable twice", () => {
    const model = new ConstraintModel();
    model.newBoolVar("a");
    expect(() => model.newBoolVar("a")).toThrow(DuplicateVariableError);
  });

  it("rejects variable names with spaces", () => {
    expect(() => new ConstraintModel().newBoolVar("a b")).toThrow(InvalidReferenceError);
  });

  it("emits linear and implication constraints in registration order", () => {
    const model = new ConstraintModel({ timeLimitSeconds: 5 });
    model.newBoolVar("a");
    model.newBoolVar("b");
    model.addLinear([{ var: "a", coeff: 1 }, { var: "b", coeff: 2 }], ">=", 1);
    model.addImplication("a", not("b"));

    expect(model.toRequest()).toEqual({
      variables: [
        { type: "bool", name: "a" },
        { type: "bool", name: "b" },
      ],
      constraints: [
        {
          type: "linear",
          terms: [
            { var: "a", coeff: 1 },
            { var: "b", coeff: 2 },
          ],
          op: ">=",
          rhs: 1,
        },
        { type: "implication", if: "a", then: { not: "b" } },
      ],
      options: { timeLimitSeconds: 5 },
    });
    expect(model.constraintCount).toBe(2);
  });

  it("rejects constraints over unknown variables", () => {
    const model = new ConstraintModel();
    model.newBoolVar("a");
    expect(() => model.addLinear([{ var: "z", coeff: 1 }], "<=", 1)).toThrow('Unknown variable "z"');
    expect(() => model.addImplication(not("z"), "a")).toThrow(InvalidReferenceError);
  });

  it("rejects fractional coefficients and bounds", () => {
    const model = new ConstraintModel();
    model.newBoolVar("a");
    expect(() => model.addLinear([{ var: "a", coeff: 0.5 }], "<=", 1)).toThrow(InvalidReferenceError);
    expect(() => model.addLinear([{ var: "a", coeff: 1 }], "<=", 1.5)).toThrow(InvalidReferenceError);
  });

  it("freezes once the request is emitted", () => {
    const model = new ConstraintModel();
    model.newBoolVar("a");
    const request = model.toRequest();

    expect(model.frozen).toBe(true);
    expect(model.toRequest()).toBe(request);
    expect(() => model.newBoolVar("b")).toThrow(ModelFrozenError);
    expect(() => model.addImplication("a", not("a"))).toThrow(
      "Cannot add a ⇒ ¬a: the model has already been compiled",
    );
  });
});
