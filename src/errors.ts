/**
 * Base class for errors raised while building or solving a model.
 *
 * @category Errors
 */
export class ShiftgridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShiftgridError";
  }
}

/**
 * Thrown when a grid dimension or state vocabulary is empty, negative, or not an integer.
 *
 * @category Errors
 */
export class InvalidDimensionError extends ShiftgridError {
  public readonly dimension: string;
  public readonly value: number;

  constructor(dimension: string, value: number) {
    super(`Dimension "${dimension}" must be a positive integer, got ${value}`);
    this.name = "InvalidDimensionError";
    this.dimension = dimension;
    this.value = value;
  }
}

/**
 * Thrown when a constraint or lookup references a variable, index, or state
 * the model does not declare.
 *
 * @category Errors
 */
export class InvalidReferenceError extends ShiftgridError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidReferenceError";
  }
}

/**
 * @category Errors
 */
export class DuplicateStateNameError extends ShiftgridError {
  public readonly stateName: string;

  constructor(stateName: string) {
    super(`State "${stateName}" is defined more than once`);
    this.name = "DuplicateStateNameError";
    this.stateName = stateName;
  }
}

/**
 * @category Errors
 */
export class DuplicateVariableError extends ShiftgridError {
  public readonly variableName: string;

  constructor(variableName: string) {
    super(`Variable "${variableName}" already exists`);
    this.name = "DuplicateVariableError";
    this.variableName = variableName;
  }
}

/**
 * Thrown when variables or constraints are added after the model was compiled
 * into a solver request.
 *
 * @category Errors
 */
export class ModelFrozenError extends ShiftgridError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the model has already been compiled`);
    this.name = "ModelFrozenError";
  }
}
