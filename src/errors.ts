export class GraphMutationError extends Error {
  name = "GraphMutationError";
}

export class GraphValidationError extends Error {
  name = "GraphValidationError";
}

export class InterpreterError extends Error {
  name = "InterpreterError";
}

export class MalformedScopeNestingError extends Error {
  name = "MalformedScopeNestingError";
}

export class IncompleteScopeBlockError extends Error {
  name = "IncompleteScopeBlockError";
}

export class UnsupportedOutputShapeError extends Error {
  name = "UnsupportedOutputShapeError";

  constructor(readonly shape: string) {
    super(`scope body output of kind "${shape}" is not supported`);
  }
}

export class OutputSpecificationMismatchError extends Error {
  name = "OutputSpecificationMismatchError";
}
