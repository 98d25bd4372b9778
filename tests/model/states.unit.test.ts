import { describe, expect, it } from "vitest";
import {
  DuplicateStateNameError,
  InvalidDimensionError,
  InvalidReferenceError,
} from "../../src/errors.js";
import { defineStates, DRIVER_STATES, NURSE_STATES } from "../../src/model/states.js";

describe("defineStates", () => {
  it("keeps vocabulary order and splits out work states", () => {
    expect(DRIVER_STATES.names).toEqual(["free", "drive", "rest"]);
    expect(DRIVER_STATES.workStates.map((s) => s.name)).toEqual(["drive", "rest"]);
    expect(DRIVER_STATES.indexOf("rest")).toBe(2);
    expect(DRIVER_STATES.get("free").isWork).toBe(false);
  });

  it("treats the nurse vocabulary as a single work state", () => {
    expect(NURSE_STATES.names).toEqual(["on"]);
    expect(NURSE_STATES.workStates).toHaveLength(1);
  });

  it("answers membership without throwing", () => {
    expect(DRIVER_STATES.has("drive")).toBe(true);
    expect(DRIVER_STATES.has("fly")).toBe(false);
  });

  it("rejects unknown state lookups", () => {
    expect(() => DRIVER_STATES.get("fly")).toThrow(InvalidReferenceError);
    expect(() => DRIVER_STATES.indexOf("fly")).toThrow('Unknown state "fly"');
  });

  it("rejects duplicate names", () => {
    expect(() =>
      defineStates([
        { name: "on", isWork: true },
        { name: "on", isWork: false },
      ]),
    ).toThrow(DuplicateStateNameError);
  });

  it("rejects an empty vocabulary", () => {
    expect(() => defineStates([])).toThrow(InvalidDimensionError);
  });

  it("rejects names that cannot be part of a variable name", () => {
    expect(() => defineStates([{ name: "on call", isWork: true }])).toThrow(InvalidReferenceError);
  });
});
